import { describe, expect, it } from 'vitest'
import { commentLikeSchema, issueSchema, normalizeKeywords } from './schemas'

describe('issue keywords', () => {
  it('trims and drops empty or repeated keywords', () => {
    expect(normalizeKeywords([' wages', 'wages ', '', 7, 'labor'])).toEqual(['wages', 'labor'])
  })

  it('treats a missing or unreadable keyword list as empty', () => {
    expect(issueSchema.parse({ id: 'i1' }).keywords).toEqual([])
    expect(issueSchema.parse({ id: 'i1', keywords: 'wages' }).keywords).toEqual([])
  })
})

describe('comment likes', () => {
  it('keeps likes whose perspective is not recognised', () => {
    expect(commentLikeSchema.parse({ id: 'l1', userId: 'u1', commentId: 'c1', perspective: 'upbeat' })).toEqual({
      id: 'l1',
      userId: 'u1',
      commentId: 'c1',
      perspective: null,
      likedAt: null
    })
  })
})
