import { MEDIA_PERSPECTIVES, PERSPECTIVES } from '../collections/enums'
import type { MediaPerspective, Perspective } from '../collections/enums'
import type {
  CommentLikeRecord,
  CommentRecord,
  EvaluationRecord,
  IssueRecord,
  MediaSourceRecord,
  ScoreHistoryRecord,
  WatchHistoryRecord
} from '../collections/schemas'
import { debug } from '../logger'
import { compareStrings, toDayKey } from './dates'
import { indexById, uniqueSources } from './mediaSupport'
import type {
  CategoryWatchCount,
  CommentLikeDetail,
  DailyWatchCount,
  IssueWatchCount,
  KeywordPerspectiveCount,
  KeywordWatchSummary,
  MediaPerspectiveWeight,
  PerspectiveCount,
  ReportWindow,
  UserMonthlyReport
} from './types'

export const DEFAULT_REPORT_DAYS = 30

const DAY_MS = 24 * 60 * 60 * 1000
const UNKNOWN = 'unknown'

/** The `days` before `reference`, both ends included. */
export function reportWindow(days = DEFAULT_REPORT_DAYS, reference = new Date()): ReportWindow {
  return { start: new Date(reference.getTime() - days * DAY_MS), end: new Date(reference.getTime()), days }
}

type Timed<T> = { record: T; at: Date }

// Keeps one user's dated records inside the window. Undated records are dropped.
function within<T extends { id: string; userId?: string | null }>(
  userId: string,
  records: readonly T[],
  timeOf: (record: T) => Date | null,
  window: ReportWindow
): Timed<T>[] {
  const start = window.start.getTime()
  const end = window.end.getTime()
  const kept: Timed<T>[] = []
  for (const record of records) {
    if (record.userId !== userId) continue
    const at = timeOf(record)
    if (at && at.getTime() >= start && at.getTime() <= end) kept.push({ record, at })
  }
  return kept
}

function newestFirst<T extends { id: string }>(items: Timed<T>[]) {
  return items
    .sort((a, b) => b.at.getTime() - a.at.getTime() || compareStrings(a.record.id, b.record.id))
    .map((item) => item.record)
}

export function recentWatchHistory(
  userId: string,
  history: readonly WatchHistoryRecord[],
  window: ReportWindow
): WatchHistoryRecord[] {
  return newestFirst(within(userId, history, (r) => r.watchedAt, window))
}

export function recentEvaluations(
  userId: string,
  evaluations: readonly EvaluationRecord[],
  window: ReportWindow
): EvaluationRecord[] {
  return newestFirst(within(userId, evaluations, (r) => r.evaluatedAt, window))
}

export function recentCommentLikes(
  userId: string,
  likes: readonly CommentLikeRecord[],
  window: ReportWindow
): CommentLikeRecord[] {
  return newestFirst(within(userId, likes, (r) => r.likedAt, window))
}

// Oldest first, for drawing the journey over the window.
export function scoresInWindow(
  userId: string,
  history: readonly ScoreHistoryRecord[],
  window: ReportWindow
): ScoreHistoryRecord[] {
  return within(userId, history, (r) => r.createdAt, window)
    .sort((a, b) => a.at.getTime() - b.at.getTime() || compareStrings(a.record.id, b.record.id))
    .map((item) => item.record)
}

function tally<K>(keys: Iterable<K>) {
  const counts = new Map<K, number>()
  for (const key of keys) counts.set(key, (counts.get(key) ?? 0) + 1)
  return counts
}

/** Watches per issue, most watched first, with the issue's title and category. */
export function countWatchByIssue(watches: readonly WatchHistoryRecord[], issues: readonly IssueRecord[]): IssueWatchCount[] {
  const issuesById = indexById(issues)
  return Array.from(tally(watches.map((w) => w.issueId)), ([issueId, watchCount]) => {
    const issue = issuesById.get(issueId)
    return {
      issueId,
      issueTitle: issue ? issue.title : null,
      category: issue?.category ?? UNKNOWN,
      watchCount
    }
  }).sort((a, b) => b.watchCount - a.watchCount || compareStrings(a.issueId, b.issueId))
}

export function countWatchByCategory(watched: readonly IssueWatchCount[]): CategoryWatchCount[] {
  const totals = new Map<string, number>()
  for (const { category, watchCount } of watched) totals.set(category, (totals.get(category) ?? 0) + watchCount)
  return Array.from(totals, ([category, watchCount]) => ({ category, watchCount })).sort(
    (a, b) => b.watchCount - a.watchCount || compareStrings(a.category, b.category)
  )
}

// UTC days in calendar order; days without watches are absent.
export function countWatchByDay(watches: readonly WatchHistoryRecord[]): DailyWatchCount[] {
  const days: string[] = []
  for (const watch of watches) {
    if (watch.watchedAt) days.push(toDayKey(watch.watchedAt))
  }
  return Array.from(tally(days), ([date, watchCount]) => ({ date, watchCount })).sort((a, b) =>
    compareStrings(a.date, b.date)
  )
}

const PERSPECTIVE_ORDER: ReadonlyArray<Perspective | 'unknown'> = [...PERSPECTIVES, UNKNOWN]

export function countByPerspective(perspectives: Iterable<Perspective | null | undefined>): PerspectiveCount[] {
  const keys: Array<Perspective | 'unknown'> = []
  for (const perspective of perspectives) keys.push(perspective ?? UNKNOWN)
  return Array.from(tally(keys), ([perspective, count]) => ({ perspective, count })).sort(
    (a, b) => b.count - a.count || PERSPECTIVE_ORDER.indexOf(a.perspective) - PERSPECTIVE_ORDER.indexOf(b.perspective)
  )
}

/**
 * Joins each like to its comment and the comment's issue. Likes of comments
 * that are not in the export keep their own fields and nulls for the rest.
 */
export function commentLikeDetails(
  likes: readonly CommentLikeRecord[],
  comments: readonly CommentRecord[],
  issues: readonly IssueRecord[]
): CommentLikeDetail[] {
  const commentsById = indexById(comments)
  const issuesById = indexById(issues)
  const details: CommentLikeDetail[] = []
  for (const like of likes) {
    if (!like.likedAt) continue
    const comment = commentsById.get(like.commentId)
    const issue = comment ? issuesById.get(comment.issueId) : undefined
    details.push({
      likeId: like.id,
      likedAt: like.likedAt,
      likePerspective: like.perspective ?? UNKNOWN,
      commentId: like.commentId,
      commentContent: comment?.content ?? null,
      commentPerspective: comment?.perspective ?? UNKNOWN,
      issueId: comment ? comment.issueId : null,
      issueTitle: issue ? issue.title : null,
      category: issue?.category ?? UNKNOWN
    })
  }
  return details.sort((a, b) => b.likedAt.getTime() - a.likedAt.getTime() || compareStrings(a.likeId, b.likeId))
}

const MEDIA_ORDER: ReadonlyArray<MediaPerspective | 'unknown'> = [...MEDIA_PERSPECTIVES, UNKNOWN]

/**
 * Spreads each issue's watch count evenly over its sources and sums the
 * shares per media perspective. The media table's perspective wins over the
 * one embedded in the issue. Issues without sources contribute nothing.
 */
export function mediaPerspectiveMix(
  watched: readonly IssueWatchCount[],
  issues: readonly IssueRecord[],
  mediaSources: readonly MediaSourceRecord[]
): MediaPerspectiveWeight[] {
  const issuesById = indexById(issues)
  const mediaById = indexById(mediaSources)
  const totals = new Map<MediaPerspective | 'unknown', number>()
  for (const { issueId, watchCount } of watched) {
    const issue = issuesById.get(issueId)
    if (!issue) continue
    const sources = uniqueSources(issue.sources)
    if (sources.length === 0) continue
    const share = watchCount / sources.length
    for (const source of sources) {
      const perspective = mediaById.get(source.id)?.perspective ?? source.perspective ?? UNKNOWN
      totals.set(perspective, (totals.get(perspective) ?? 0) + share)
    }
  }
  return Array.from(totals, ([perspective, weightedCoverage]) => ({ perspective, weightedCoverage })).sort(
    (a, b) =>
      b.weightedCoverage - a.weightedCoverage || MEDIA_ORDER.indexOf(a.perspective) - MEDIA_ORDER.indexOf(b.perspective)
  )
}

/**
 * Keywords of the watched issues with the watches they drew and how many
 * issues carried them. Keywords below `minWatches` are left out.
 */
export function keywordWatchSummary(
  watched: readonly IssueWatchCount[],
  issues: readonly IssueRecord[],
  minWatches = 1
): KeywordWatchSummary[] {
  const issuesById = indexById(issues)
  const summary = new Map<string, KeywordWatchSummary>()
  for (const { issueId, watchCount } of watched) {
    for (const keyword of issuesById.get(issueId)?.keywords ?? []) {
      const current = summary.get(keyword)
      if (current) {
        current.watchTotal += watchCount
        current.issueCount++
      } else {
        summary.set(keyword, { keyword, watchTotal: watchCount, issueCount: 1 })
      }
    }
  }
  return Array.from(summary.values())
    .filter((k) => k.watchTotal >= minWatches)
    .sort((a, b) => b.watchTotal - a.watchTotal || b.issueCount - a.issueCount || compareStrings(a.keyword, b.keyword))
}

/** How the user evaluated the issues behind each keyword. */
export function keywordPerspectives(
  evaluations: readonly EvaluationRecord[],
  issues: readonly IssueRecord[]
): KeywordPerspectiveCount[] {
  const issuesById = indexById(issues)
  const counts = new Map<string, KeywordPerspectiveCount>()
  for (const evaluation of evaluations) {
    for (const keyword of issuesById.get(evaluation.issueId)?.keywords ?? []) {
      const key = `${keyword}|${evaluation.perspective}`
      const current = counts.get(key)
      if (current) current.count++
      else counts.set(key, { keyword, perspective: evaluation.perspective, count: 1 })
    }
  }
  return Array.from(counts.values()).sort(
    (a, b) =>
      b.count - a.count ||
      compareStrings(a.keyword, b.keyword) ||
      PERSPECTIVES.indexOf(a.perspective) - PERSPECTIVES.indexOf(b.perspective)
  )
}

export type UserReportInput = {
  watchHistory: readonly WatchHistoryRecord[]
  evaluations: readonly EvaluationRecord[]
  commentLikes: readonly CommentLikeRecord[]
  comments: readonly CommentRecord[]
  issues: readonly IssueRecord[]
  mediaSources: readonly MediaSourceRecord[]
  scoreHistory: readonly ScoreHistoryRecord[]
}

export function buildUserMonthlyReport(userId: string, window: ReportWindow, input: UserReportInput): UserMonthlyReport {
  const watches = recentWatchHistory(userId, input.watchHistory, window)
  const watchedIssues = countWatchByIssue(watches, input.issues)
  const evaluations = recentEvaluations(userId, input.evaluations, window)
  const likes = recentCommentLikes(userId, input.commentLikes, window)

  debug(`Report for ${userId}: ${watches.length} watches, ${evaluations.length} evaluations, ${likes.length} likes`)

  return {
    userId,
    window,
    totalWatches: watches.length,
    watchedIssues,
    watchByCategory: countWatchByCategory(watchedIssues),
    watchByDay: countWatchByDay(watches),
    evaluationCount: evaluations.length,
    evaluationsByPerspective: countByPerspective(evaluations.map((e) => e.perspective)),
    commentLikeCount: likes.length,
    commentLikesByPerspective: countByPerspective(likes.map((l) => l.perspective)),
    commentLikes: commentLikeDetails(likes, input.comments, input.issues),
    scores: scoresInWindow(userId, input.scoreHistory, window),
    mediaPerspectives: mediaPerspectiveMix(watchedIssues, input.issues, input.mediaSources),
    keywords: keywordWatchSummary(watchedIssues, input.issues),
    keywordPerspectives: keywordPerspectives(evaluations, input.issues)
  }
}
