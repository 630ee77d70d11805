import {
  commentLikeSchema,
  commentSchema,
  evaluationSchema,
  issueSchema,
  mediaSourceSchema,
  scoreHistorySchema,
  subscriptionSchema,
  topicSchema,
  userSchema,
  watchHistorySchema
} from '../src/collections/schemas'

// Builders for already-decoded records; dates are given as ISO strings.

function at(value: string | null | undefined) {
  return value ? new Date(value) : null
}

type Scores = { left?: number; center?: number; right?: number }

export function historyRecord(id: string, userId: string, createdAt: string | null, scores: Record<string, Scores> = {}) {
  return scoreHistorySchema.parse({ id, userId, createdAt: at(createdAt), ...scores })
}

export function userRecord(id: string, politicalPreference?: string | null) {
  return userSchema.parse({ id, politicalPreference })
}

export function topicRecord(id: string, name: string, category?: string) {
  return topicSchema.parse({ id, name, category })
}

export function subscriptionRecord(id: string, topicId: string, userId = 'u-1') {
  return subscriptionSchema.parse({ id, topicId, userId })
}

export function issueRecord(
  id: string,
  sources: unknown[],
  createdAt: string | null = null,
  title = `Issue ${id}`,
  keywords: unknown[] = []
) {
  return issueSchema.parse({ id, title, sources, createdAt: at(createdAt), keywords })
}

export function evaluationRecord(
  id: string,
  issueId: string,
  perspective: string,
  evaluatedAt: string | null,
  userId?: string
) {
  return evaluationSchema.parse({ id, userId, issueId, perspective, evaluatedAt: at(evaluatedAt) })
}

export function mediaRecord(id: string, name: string, perspective: string | null) {
  return mediaSourceSchema.parse({ id, name, perspective })
}

export function watchRecord(id: string, userId: string, issueId: string, watchedAt: string | null) {
  return watchHistorySchema.parse({ id, userId, issueId, watchedAt: at(watchedAt) })
}

export function commentRecord(id: string, issueId: string, content: string | null, perspective?: string) {
  return commentSchema.parse({ id, issueId, content, perspective })
}

export function commentLikeRecord(id: string, userId: string, commentId: string, likedAt: string | null, perspective?: string) {
  return commentLikeSchema.parse({ id, userId, commentId, perspective, likedAt: at(likedAt) })
}
