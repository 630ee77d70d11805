import { CATEGORIES } from '../collections/enums'
import type { Category } from '../collections/enums'
import type { ScoreHistoryRecord } from '../collections/schemas'
import { debug, warn } from '../logger'
import { compareStrings, toDayKey } from './dates'
import type { ScoreBucket } from './types'

type ScoreSums = {
  date: string
  category: Category
  left: number
  center: number
  right: number
  sampleCount: number
}

function proportion(part: number, total: number) {
  return total > 0 ? part / total : 0
}

/**
 * Buckets political-score history by UTC day and category over
 * [startDate, endDate] (inclusive, compared on the record timestamp).
 * Days without records for a category produce no bucket.
 */
export function aggregateScores(history: readonly ScoreHistoryRecord[], startDate: Date, endDate: Date): ScoreBucket[] {
  const start = startDate.getTime()
  const end = endDate.getTime()
  if (start > end) {
    warn(`Score range starts after it ends: ${startDate.toISOString()} > ${endDate.toISOString()}`)
    return []
  }

  const groups = new Map<string, ScoreSums>()
  for (const record of history) {
    if (!record.createdAt) continue
    const at = record.createdAt.getTime()
    if (at < start || at > end) continue

    const date = toDayKey(record.createdAt)
    for (const category of CATEGORIES) {
      const scores = record[category]
      if (!scores) continue
      const key = `${date}|${category}`
      let group = groups.get(key)
      if (!group) {
        group = { date, category, left: 0, center: 0, right: 0, sampleCount: 0 }
        groups.set(key, group)
      }
      group.left += scores.left
      group.center += scores.center
      group.right += scores.right
      group.sampleCount++
    }
  }

  const buckets = Array.from(groups.values(), (g) => {
    const total = g.left + g.center + g.right
    return {
      date: g.date,
      category: g.category,
      left: proportion(g.left, total),
      center: proportion(g.center, total),
      right: proportion(g.right, total),
      sampleCount: g.sampleCount
    }
  })
  buckets.sort((a, b) => compareStrings(a.date, b.date) || compareStrings(a.category, b.category))

  debug(`Aggregated ${buckets.length} score buckets from ${history.length} history records`)
  return buckets
}
