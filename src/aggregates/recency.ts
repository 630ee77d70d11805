import { compareStrings } from './dates'

export const DEFAULT_RECENT_LIMIT = 20

export type Dated = {
  id: string
  createdAt: Date | null
}

export function clampLimit(limit: number) {
  if (Number.isNaN(limit) || limit <= 0) return 0
  return Math.floor(limit)
}

function compareNewestFirst(a: Date | null, b: Date | null) {
  if (a && b) return b.getTime() - a.getTime()
  if (a) return -1
  if (b) return 1
  return 0
}

/**
 * Newest first, undated records last, ties broken by id ascending.
 */
export function mostRecentBy<T>(
  records: readonly T[],
  timestampOf: (record: T) => Date | null,
  idOf: (record: T) => string,
  limit = DEFAULT_RECENT_LIMIT
): T[] {
  return [...records]
    .sort((a, b) => compareNewestFirst(timestampOf(a), timestampOf(b)) || compareStrings(idOf(a), idOf(b)))
    .slice(0, clampLimit(limit))
}

export function mostRecent<T extends Dated>(records: readonly T[], limit = DEFAULT_RECENT_LIMIT): T[] {
  return mostRecentBy(
    records,
    (r) => r.createdAt,
    (r) => r.id,
    limit
  )
}
