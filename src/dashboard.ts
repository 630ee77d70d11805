import { summarizeIssueEvaluations } from './aggregates/issueEvaluations'
import { compareMediaSupport } from './aggregates/mediaSupport'
import { preferenceDistribution } from './aggregates/preferences'
import { DEFAULT_RECENT_LIMIT, mostRecent } from './aggregates/recency'
import { aggregateScores } from './aggregates/scores'
import { countSubscribers, topTopics, topicWordFrequencies } from './aggregates/subscriptions'
import type {
  IssueEvaluationSummary,
  MediaSupportSeries,
  PreferenceShare,
  ScoreBucket,
  TopicCount,
  UserActivity,
  UserJourney,
  UserMonthlyReport,
  WordFrequency
} from './aggregates/types'
import { recentActiveUsers, userJourney } from './aggregates/userJourney'
import { buildUserMonthlyReport, DEFAULT_REPORT_DAYS, reportWindow } from './aggregates/userReport'
import type { LoadFailureReason, LoadOutcome } from './collections/loader'
import type { IssueRecord, MediaSourceRecord } from './collections/schemas'
import { COLLECTION_NAMES } from './collections/schemas'
import type { CollectionStore } from './collections/store'
import { InvalidParameterError, NotFoundError } from './errors'
import { warn } from './logger'

export const DEFAULT_TOPIC_LIMIT = 50
export const MAX_TOPIC_LIMIT = 200
export const DEFAULT_MEDIA_COMPARE_LIMIT = 5

export type CollectionFailure = {
  collection: string
  fileName: string
  reason: LoadFailureReason
  error: string
}

export type CollectionStatus = {
  collection: string
  fileName: string
  loaded: boolean
  records: number
  skipped: number
  reason?: LoadFailureReason
  error?: string
}

export type Unavailable = {
  success: false
  error: string
  failures: CollectionFailure[]
}

export type DashboardResult<T> = { success: true; data: T } | Unavailable

export type DashboardOptions = {
  recentLimit?: number
  mediaCompareLimit?: number
  // reference time for windowed reports
  now?: () => Date
}

function failuresOf(outcomes: LoadOutcome<unknown>[]): CollectionFailure[] {
  const failures: CollectionFailure[] = []
  for (const outcome of outcomes) {
    if (outcome.success) continue
    failures.push({
      collection: outcome.collection,
      fileName: outcome.fileName,
      reason: outcome.reason,
      error: outcome.error
    })
  }
  return failures
}

function unavailable(failures: CollectionFailure[]): Unavailable {
  const names = failures.map((f) => f.collection).join(', ')
  warn(`Dashboard query unavailable; failed to load ${names}`)
  return { success: false, error: `Failed to load ${names}`, failures }
}

/**
 * Read-side queries behind each dashboard page. A query whose collections
 * failed to load reports the failures instead of computing on partial data.
 * NotFoundError and InvalidParameterError propagate to the caller.
 */
export class DashboardService {
  readonly recentLimit: number
  readonly mediaCompareLimit: number
  private readonly now: () => Date

  constructor(
    private readonly store: CollectionStore,
    options: DashboardOptions = {}
  ) {
    this.recentLimit = options.recentLimit ?? DEFAULT_RECENT_LIMIT
    this.mediaCompareLimit = options.mediaCompareLimit ?? DEFAULT_MEDIA_COMPARE_LIMIT
    this.now = options.now ?? (() => new Date())
  }

  async collectionStatus(): Promise<CollectionStatus[]> {
    const outcomes = await Promise.all(COLLECTION_NAMES.map((name) => this.store.load(name)))
    return outcomes.map((outcome) =>
      outcome.success
        ? {
            collection: outcome.collection,
            fileName: outcome.fileName,
            loaded: true,
            records: outcome.data.length,
            skipped: outcome.skipped
          }
        : {
            collection: outcome.collection,
            fileName: outcome.fileName,
            loaded: false,
            records: 0,
            skipped: 0,
            reason: outcome.reason,
            error: outcome.error
          }
    )
  }

  async overallPreference(): Promise<DashboardResult<PreferenceShare[]>> {
    const users = await this.store.users()
    if (!users.success) return unavailable(failuresOf([users]))
    return { success: true, data: preferenceDistribution(users.data) }
  }

  async scoreTimeSeries(start: Date, end: Date): Promise<DashboardResult<ScoreBucket[]>> {
    if (Number.isNaN(start.getTime())) throw new InvalidParameterError('start', 'Invalid start date')
    if (Number.isNaN(end.getTime())) throw new InvalidParameterError('end', 'Invalid end date')
    if (start.getTime() > end.getTime()) throw new InvalidParameterError('start', 'start must not be after end')
    const history = await this.store.scoreHistory()
    if (!history.success) return unavailable(failuresOf([history]))
    return { success: true, data: aggregateScores(history.data, start, end) }
  }

  private async topicCounts(): Promise<DashboardResult<TopicCount[]>> {
    const [topics, subscriptions] = await Promise.all([this.store.topics(), this.store.subscriptions()])
    if (!topics.success || !subscriptions.success) return unavailable(failuresOf([topics, subscriptions]))
    return { success: true, data: countSubscribers(topics.data, subscriptions.data) }
  }

  async topTopics(top = DEFAULT_TOPIC_LIMIT): Promise<DashboardResult<TopicCount[]>> {
    const counts = await this.topicCounts()
    if (!counts.success) return counts
    return { success: true, data: topTopics(counts.data, Math.min(top, MAX_TOPIC_LIMIT)) }
  }

  async topicCloud(top = DEFAULT_TOPIC_LIMIT): Promise<DashboardResult<WordFrequency[]>> {
    const counts = await this.topicCounts()
    if (!counts.success) return counts
    return { success: true, data: topicWordFrequencies(counts.data, Math.min(top, MAX_TOPIC_LIMIT)) }
  }

  async recentIssues(limit = this.recentLimit): Promise<DashboardResult<IssueRecord[]>> {
    const issues = await this.store.issues()
    if (!issues.success) return unavailable(failuresOf([issues]))
    return { success: true, data: mostRecent(issues.data, limit) }
  }

  async issueEvaluation(issueId: string): Promise<DashboardResult<IssueEvaluationSummary>> {
    const [issues, evaluations] = await Promise.all([this.store.issues(), this.store.evaluations()])
    if (!issues.success || !evaluations.success) return unavailable(failuresOf([issues, evaluations]))
    return { success: true, data: summarizeIssueEvaluations(issueId, issues.data, evaluations.data) }
  }

  async recentUsers(limit = this.recentLimit): Promise<DashboardResult<UserActivity[]>> {
    const history = await this.store.scoreHistory()
    if (!history.success) return unavailable(failuresOf([history]))
    return { success: true, data: recentActiveUsers(history.data, limit) }
  }

  async userJourney(userId: string): Promise<DashboardResult<UserJourney>> {
    const history = await this.store.scoreHistory()
    if (!history.success) return unavailable(failuresOf([history]))
    return { success: true, data: userJourney(userId, history.data) }
  }

  async mediaSources(): Promise<DashboardResult<MediaSourceRecord[]>> {
    const media = await this.store.mediaSources()
    if (!media.success) return unavailable(failuresOf([media]))
    return { success: true, data: media.data }
  }

  async mediaSupport(mediaIds: readonly string[]): Promise<DashboardResult<MediaSupportSeries[]>> {
    const ids = Array.from(new Set(mediaIds.map((id) => id.trim()).filter(Boolean)))
    if (ids.length === 0) throw new InvalidParameterError('ids', 'At least one media id is required')
    if (ids.length > this.mediaCompareLimit) {
      throw new InvalidParameterError('ids', `At most ${this.mediaCompareLimit} media sources can be compared`)
    }

    const [evaluations, issues, media] = await Promise.all([
      this.store.evaluations(),
      this.store.issues(),
      this.store.mediaSources()
    ])
    if (!evaluations.success || !issues.success || !media.success) {
      return unavailable(failuresOf([evaluations, issues, media]))
    }
    return { success: true, data: compareMediaSupport(ids, evaluations.data, issues.data, media.data) }
  }

  /**
   * What one user watched, evaluated and liked over the `days` before the
   * reference time, with their score history over the same window.
   */
  async userMonthlyReport(
    userId: string,
    days = DEFAULT_REPORT_DAYS,
    reference = this.now()
  ): Promise<DashboardResult<UserMonthlyReport>> {
    if (!Number.isInteger(days) || days <= 0) {
      throw new InvalidParameterError('days', `days must be a positive integer, got '${days}'`)
    }
    if (Number.isNaN(reference.getTime())) throw new InvalidParameterError('reference', 'Invalid reference date')

    const [users, watchHistory, evaluations, commentLikes, comments, issues, mediaSources, scoreHistory] =
      await Promise.all([
        this.store.users(),
        this.store.watchHistory(),
        this.store.evaluations(),
        this.store.commentLikes(),
        this.store.comments(),
        this.store.issues(),
        this.store.mediaSources(),
        this.store.scoreHistory()
      ])
    if (
      !users.success ||
      !watchHistory.success ||
      !evaluations.success ||
      !commentLikes.success ||
      !comments.success ||
      !issues.success ||
      !mediaSources.success ||
      !scoreHistory.success
    ) {
      return unavailable(
        failuresOf([users, watchHistory, evaluations, commentLikes, comments, issues, mediaSources, scoreHistory])
      )
    }
    if (!users.data.some((u) => u.id === userId)) throw new NotFoundError('user', userId)

    return {
      success: true,
      data: buildUserMonthlyReport(userId, reportWindow(days, reference), {
        watchHistory: watchHistory.data,
        evaluations: evaluations.data,
        commentLikes: commentLikes.data,
        comments: comments.data,
        issues: issues.data,
        mediaSources: mediaSources.data,
        scoreHistory: scoreHistory.data
      })
    }
  }
}
