import type { Category, MediaPerspective, Perspective } from '../collections/enums'
import type { ScoreHistoryRecord } from '../collections/schemas'

export type ScoreBucket = {
  // UTC calendar day, YYYY-MM-DD
  date: string
  category: Category
  // proportions of the day's summed scores; all zero when the sum is zero
  left: number
  center: number
  right: number
  sampleCount: number
}

export type TopicCount = {
  topicId: string
  topicName: string
  category: string | null
  subscriberCount: number
}

export type WordFrequency = {
  text: string
  value: number
}

export type MediaSupportPoint = {
  mediaId: string
  mediaName: string
  date: string
  timestamp: Date
  perspective: Perspective
  cumulativeSupport: number
}

export type MediaSupportSeries = {
  mediaId: string
  mediaName: string
  points: MediaSupportPoint[]
}

export type IssueEvaluationSummary = {
  issueId: string
  issueTitle: string
  leftCount: number
  centerCount: number
  rightCount: number
  totalCount: number
}

export type PreferenceShare = {
  preference: MediaPerspective | 'unknown'
  count: number
  share: number
}

export type UserActivity = {
  userId: string
  lastActivityAt: Date | null
  recordCount: number
}

export type JourneyPoint = {
  timestamp: Date
  date: string
  category: Category
  left: number
  center: number
  right: number
  // positive leans left, negative leans right
  lean: number
}

export type UserJourney = {
  userId: string
  recordCount: number
  firstActivityAt: Date | null
  lastActivityAt: Date | null
  points: JourneyPoint[]
}

export type ReportWindow = {
  start: Date
  end: Date
  days: number
}

export type IssueWatchCount = {
  issueId: string
  // null when the issue is not in the issues export
  issueTitle: string | null
  category: string
  watchCount: number
}

export type CategoryWatchCount = {
  category: string
  watchCount: number
}

export type DailyWatchCount = {
  date: string
  watchCount: number
}

export type PerspectiveCount = {
  perspective: Perspective | 'unknown'
  count: number
}

export type CommentLikeDetail = {
  likeId: string
  likedAt: Date
  likePerspective: Perspective | 'unknown'
  commentId: string
  commentContent: string | null
  commentPerspective: Perspective | 'unknown'
  issueId: string | null
  issueTitle: string | null
  category: string
}

export type MediaPerspectiveWeight = {
  perspective: MediaPerspective | 'unknown'
  // watches spread evenly over the sources of each watched issue
  weightedCoverage: number
}

export type KeywordWatchSummary = {
  keyword: string
  watchTotal: number
  issueCount: number
}

export type KeywordPerspectiveCount = {
  keyword: string
  perspective: Perspective
  count: number
}

export type UserMonthlyReport = {
  userId: string
  window: ReportWindow
  totalWatches: number
  watchedIssues: IssueWatchCount[]
  watchByCategory: CategoryWatchCount[]
  watchByDay: DailyWatchCount[]
  evaluationCount: number
  evaluationsByPerspective: PerspectiveCount[]
  commentLikeCount: number
  commentLikesByPerspective: PerspectiveCount[]
  commentLikes: CommentLikeDetail[]
  scores: ScoreHistoryRecord[]
  mediaPerspectives: MediaPerspectiveWeight[]
  keywords: KeywordWatchSummary[]
  keywordPerspectives: KeywordPerspectiveCount[]
}
