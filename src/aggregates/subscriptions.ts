import type { SubscriptionRecord, TopicRecord } from '../collections/schemas'
import { debug, warn } from '../logger'
import { compareStrings } from './dates'
import { clampLimit } from './recency'
import type { TopicCount, WordFrequency } from './types'

/**
 * Left join of topics onto subscription counts. Topics nobody follows keep a
 * zero count; subscriptions to topics missing from the table are dropped.
 * Output follows topic table order.
 */
export function countSubscribers(topics: readonly TopicRecord[], subscriptions: readonly SubscriptionRecord[]): TopicCount[] {
  const known = new Map<string, TopicRecord>()
  for (const topic of topics) {
    if (known.has(topic.id)) {
      warn(`Duplicate topic id ${topic.id}; keeping the first definition`)
      continue
    }
    known.set(topic.id, topic)
  }

  const counts = new Map<string, number>()
  let orphans = 0
  for (const subscription of subscriptions) {
    if (!known.has(subscription.topicId)) {
      orphans++
      continue
    }
    counts.set(subscription.topicId, (counts.get(subscription.topicId) ?? 0) + 1)
  }
  if (orphans) warn(`Dropped ${orphans} subscriptions referencing unknown topics`)

  const result = Array.from(known.values(), (topic) => ({
    topicId: topic.id,
    topicName: topic.name,
    category: topic.category ?? null,
    subscriberCount: counts.get(topic.id) ?? 0
  }))
  debug(`Counted subscribers for ${result.length} topics`)
  return result
}

export function compareTopicCounts(a: TopicCount, b: TopicCount) {
  return b.subscriberCount - a.subscriberCount || compareStrings(a.topicId, b.topicId)
}

export function topTopics(counts: readonly TopicCount[], n: number): TopicCount[] {
  return [...counts].sort(compareTopicCounts).slice(0, clampLimit(n))
}

// Word-cloud input: the top n topic names weighted by subscriber count.
export function topicWordFrequencies(counts: readonly TopicCount[], n: number): WordFrequency[] {
  const weights = new Map<string, number>()
  for (const topic of topTopics(counts, n)) {
    const text = topic.topicName.trim()
    if (!text || topic.subscriberCount <= 0) continue
    weights.set(text, (weights.get(text) ?? 0) + topic.subscriberCount)
  }
  return Array.from(weights, ([text, value]) => ({ text, value }))
}
