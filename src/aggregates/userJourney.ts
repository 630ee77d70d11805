import { CATEGORIES } from '../collections/enums'
import type { ScoreHistoryRecord } from '../collections/schemas'
import { NotFoundError } from '../errors'
import { toDayKey } from './dates'
import { DEFAULT_RECENT_LIMIT, mostRecentBy } from './recency'
import type { JourneyPoint, UserActivity, UserJourney } from './types'

function later(a: Date | null, b: Date | null) {
  if (!a) return b
  if (!b) return a
  return b.getTime() > a.getTime() ? b : a
}

export function recentActiveUsers(history: readonly ScoreHistoryRecord[], limit = DEFAULT_RECENT_LIMIT): UserActivity[] {
  const activity = new Map<string, UserActivity>()
  for (const record of history) {
    const current = activity.get(record.userId)
    if (current) {
      current.recordCount++
      current.lastActivityAt = later(current.lastActivityAt, record.createdAt)
    } else {
      activity.set(record.userId, { userId: record.userId, lastActivityAt: record.createdAt, recordCount: 1 })
    }
  }
  return mostRecentBy(
    Array.from(activity.values()),
    (a) => a.lastActivityAt,
    (a) => a.userId,
    limit
  )
}

/**
 * One user's raw category scores over time. Records without a timestamp
 * count towards recordCount but cannot be placed on the timeline.
 */
export function userJourney(userId: string, history: readonly ScoreHistoryRecord[]): UserJourney {
  const records = history.filter((r) => r.userId === userId)
  if (records.length === 0) throw new NotFoundError('user', userId)

  const dated: Array<ScoreHistoryRecord & { createdAt: Date }> = []
  for (const record of records) {
    const { createdAt } = record
    if (createdAt) dated.push({ ...record, createdAt })
  }
  dated.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())

  const points: JourneyPoint[] = []
  for (const record of dated) {
    for (const category of CATEGORIES) {
      const scores = record[category]
      if (!scores) continue
      points.push({
        timestamp: record.createdAt,
        date: toDayKey(record.createdAt),
        category,
        left: scores.left,
        center: scores.center,
        right: scores.right,
        lean: scores.left - scores.right
      })
    }
  }

  return {
    userId,
    recordCount: records.length,
    firstActivityAt: dated.length ? dated[0].createdAt : null,
    lastActivityAt: dated.length ? dated[dated.length - 1].createdAt : null,
    points
  }
}
