/**
 * Zod schemas for the records of every exported collection.
 *
 * Schemas run after the extended-JSON wrappers have been unwrapped, so ids
 * are plain strings and dates are `Date | null` by the time they are checked.
 * Object schemas use .passthrough() so fields the dashboard does not read
 * are kept as they were exported.
 */

import { z } from 'zod'
import { warn } from '../logger'
import { isJsonObject, parseIdentifier } from '../mongo/extendedJson'
import type { RecordLayout } from '../mongo/extendedJson'
import { MEDIA_PERSPECTIVES, PERSPECTIVES, isMediaPerspective } from './enums'
import type { MediaPerspective } from './enums'

export const DEFAULT_SCORE = 50

const timestamp = z.date().nullable().default(null)
const perspective = z.enum(PERSPECTIVES)
const mediaPerspective = z.enum(MEDIA_PERSPECTIVES)

// --- prod.users.json ---

export const userSchema = z
  .object({
    id: z.string(),
    nickname: z.string().nullish(),
    // unrecognised preferences are counted as unknown
    politicalPreference: mediaPerspective.nullish().catch(null),
    createdAt: timestamp,
    updatedAt: timestamp
  })
  .passthrough()

export type UserRecord = z.infer<typeof userSchema>

// --- prod.userPoliticalScoreHistory.json ---

const score = z
  .number()
  .nullish()
  .transform((v) => v ?? DEFAULT_SCORE)

const scoreTripleSchema = z.object({ left: score, center: score, right: score })

// A category that is absent or unreadable contributes nothing for that record.
const categoryScores = scoreTripleSchema.optional().catch(undefined)

export const scoreHistorySchema = z
  .object({
    id: z.string(),
    userId: z.string(),
    createdAt: timestamp,
    politics: categoryScores,
    economy: categoryScores,
    society: categoryScores,
    culture: categoryScores,
    technology: categoryScores,
    international: categoryScores
  })
  .passthrough()

export type ScoreHistoryRecord = z.infer<typeof scoreHistorySchema>

// --- prod.topics.json ---

export const topicSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    category: z.string().nullish(),
    createdAt: timestamp,
    updatedAt: timestamp,
    deletedAt: timestamp
  })
  .passthrough()

export type TopicRecord = z.infer<typeof topicSchema>

// --- prod.userTopicSubscriptions.json ---

export const subscriptionSchema = z
  .object({
    id: z.string(),
    userId: z.string().nullish(),
    topicId: z.string(),
    subscribedAt: timestamp
  })
  .passthrough()

export type SubscriptionRecord = z.infer<typeof subscriptionSchema>

// --- prod.issues.json ---

export type IssueSource = {
  id: string
  name: string | null
  perspective: MediaPerspective | null
}

function toIssueSource(entry: unknown): IssueSource {
  if (isJsonObject(entry) && !('$oid' in entry)) {
    const name = typeof entry.name === 'string' ? entry.name : null
    const declared = entry.perspective
    return { id: parseIdentifier(entry._id ?? entry.id), name, perspective: isMediaPerspective(declared) ? declared : null }
  }
  return { id: parseIdentifier(entry), name: null, perspective: null }
}

// Issue sources are plain ids, {"$oid"} wrappers or embedded media summaries.
export function normalizeIssueSources(entries: unknown[]): IssueSource[] {
  const sources: IssueSource[] = []
  for (const entry of entries) {
    try {
      sources.push(toIssueSource(entry))
    } catch (e) {
      warn('Skipping unreadable issue source:', e instanceof Error ? e.message : e)
    }
  }
  return sources
}

// Trimmed, non-empty and unique, in export order.
export function normalizeKeywords(entries: unknown[]): string[] {
  const keywords = new Set<string>()
  for (const entry of entries) {
    if (typeof entry !== 'string') continue
    const keyword = entry.trim()
    if (keyword) keywords.add(keyword)
  }
  return Array.from(keywords)
}

export const issueSchema = z
  .object({
    id: z.string(),
    title: z.string().nullish().transform((v) => v ?? ''),
    category: z.string().nullish(),
    createdAt: timestamp,
    updatedAt: timestamp,
    sources: z.array(z.unknown()).nullish().transform((v) => normalizeIssueSources(v ?? [])),
    keywords: z.array(z.unknown()).nullish().catch(null).transform((v) => normalizeKeywords(v ?? []))
  })
  .passthrough()

export type IssueRecord = z.infer<typeof issueSchema>

// --- prod.userIssueEvaluations.json ---

export const evaluationSchema = z
  .object({
    id: z.string(),
    userId: z.string().nullish(),
    issueId: z.string(),
    perspective,
    evaluatedAt: timestamp
  })
  .passthrough()

export type EvaluationRecord = z.infer<typeof evaluationSchema>

// --- prod.mediaSources.json ---

export const mediaSourceSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    perspective: mediaPerspective.nullish().catch(null),
    createdAt: timestamp,
    updatedAt: timestamp
  })
  .passthrough()

export type MediaSourceRecord = z.infer<typeof mediaSourceSchema>

// --- prod.userWatchHistory.json ---

export const watchHistorySchema = z
  .object({
    id: z.string(),
    userId: z.string(),
    issueId: z.string(),
    watchedAt: timestamp
  })
  .passthrough()

export type WatchHistoryRecord = z.infer<typeof watchHistorySchema>

// --- prod.issueComments.json ---

export const commentSchema = z
  .object({
    id: z.string(),
    issueId: z.string(),
    content: z.string().nullish(),
    perspective: perspective.nullish().catch(null),
    createdAt: timestamp,
    updatedAt: timestamp
  })
  .passthrough()

export type CommentRecord = z.infer<typeof commentSchema>

// --- prod.userCommentLikes.json ---

export const commentLikeSchema = z
  .object({
    id: z.string(),
    userId: z.string(),
    commentId: z.string(),
    // perspective the user liked the comment from
    perspective: perspective.nullish().catch(null),
    likedAt: timestamp
  })
  .passthrough()

export type CommentLikeRecord = z.infer<typeof commentLikeSchema>

// --- registry ---

export type CollectionDefinition<T> = {
  name: string
  fileName: string
  layout: RecordLayout
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
}

function defineCollection<T>(
  name: string,
  fileName: string,
  layout: RecordLayout,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): CollectionDefinition<T> {
  return { name, fileName, layout, schema }
}

// userPoliticalPreferenceDetailHistory is deprecated and deliberately absent.
export const COLLECTIONS = {
  users: defineCollection('users', 'prod.users.json', { identifiers: [], dates: ['createdAt', 'updatedAt'] }, userSchema),
  scoreHistory: defineCollection(
    'scoreHistory',
    'prod.userPoliticalScoreHistory.json',
    { identifiers: ['userId'], dates: ['createdAt'] },
    scoreHistorySchema
  ),
  topics: defineCollection(
    'topics',
    'prod.topics.json',
    { identifiers: [], dates: ['createdAt', 'updatedAt', 'deletedAt'] },
    topicSchema
  ),
  subscriptions: defineCollection(
    'subscriptions',
    'prod.userTopicSubscriptions.json',
    { identifiers: ['userId', 'topicId'], dates: ['subscribedAt'] },
    subscriptionSchema
  ),
  issues: defineCollection('issues', 'prod.issues.json', { identifiers: [], dates: ['createdAt', 'updatedAt'] }, issueSchema),
  evaluations: defineCollection(
    'evaluations',
    'prod.userIssueEvaluations.json',
    { identifiers: ['userId', 'issueId'], dates: ['evaluatedAt'] },
    evaluationSchema
  ),
  mediaSources: defineCollection(
    'mediaSources',
    'prod.mediaSources.json',
    { identifiers: [], dates: ['createdAt', 'updatedAt'] },
    mediaSourceSchema
  ),
  watchHistory: defineCollection(
    'watchHistory',
    'prod.userWatchHistory.json',
    { identifiers: ['userId', 'issueId'], dates: ['watchedAt'] },
    watchHistorySchema
  ),
  comments: defineCollection(
    'comments',
    'prod.issueComments.json',
    { identifiers: ['issueId'], dates: ['createdAt', 'updatedAt'] },
    commentSchema
  ),
  commentLikes: defineCollection(
    'commentLikes',
    'prod.userCommentLikes.json',
    { identifiers: ['userId', 'commentId'], dates: ['likedAt'] },
    commentLikeSchema
  )
}

export type CollectionName = keyof typeof COLLECTIONS

export const COLLECTION_NAMES: readonly CollectionName[] = [
  'users',
  'scoreHistory',
  'topics',
  'subscriptions',
  'issues',
  'evaluations',
  'mediaSources',
  'watchHistory',
  'comments',
  'commentLikes'
]

export function toCollectionName(value: string): CollectionName | undefined {
  return COLLECTION_NAMES.find((name) => name === value)
}
