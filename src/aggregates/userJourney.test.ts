import { describe, expect, it } from 'vitest'
import { historyRecord } from '../../test/records'
import { NotFoundError } from '../errors'
import { recentActiveUsers, userJourney } from './userJourney'

const history = [
  historyRecord('h1', 'u1', '2024-07-02T00:00:00Z', { politics: { left: 70, center: 20, right: 10 } }),
  historyRecord('h2', 'u2', '2024-07-05T00:00:00Z', { economy: { left: 30, center: 30, right: 40 } }),
  historyRecord('h3', 'u1', '2024-07-01T00:00:00Z', {
    politics: { left: 40, center: 40, right: 20 },
    economy: { left: 10, center: 60, right: 30 }
  }),
  historyRecord('h4', 'u1', null, { politics: { left: 1, center: 1, right: 1 } }),
  historyRecord('h5', 'u3', null)
]

describe('recentActiveUsers', () => {
  it('orders users by their latest record', () => {
    expect(recentActiveUsers(history)).toEqual([
      { userId: 'u2', lastActivityAt: new Date('2024-07-05T00:00:00Z'), recordCount: 1 },
      { userId: 'u1', lastActivityAt: new Date('2024-07-02T00:00:00Z'), recordCount: 3 },
      { userId: 'u3', lastActivityAt: null, recordCount: 1 }
    ])
  })

  it('respects the limit', () => {
    expect(recentActiveUsers(history, 1).map((u) => u.userId)).toEqual(['u2'])
  })
})

describe('userJourney', () => {
  it('lists category scores in time order', () => {
    const journey = userJourney('u1', history)
    expect(journey.recordCount).toBe(3)
    expect(journey.firstActivityAt).toEqual(new Date('2024-07-01T00:00:00Z'))
    expect(journey.lastActivityAt).toEqual(new Date('2024-07-02T00:00:00Z'))
    expect(journey.points.map((p) => [p.date, p.category, p.lean])).toEqual([
      ['2024-07-01', 'politics', 20],
      ['2024-07-01', 'economy', -20],
      ['2024-07-02', 'politics', 60]
    ])
  })

  it('has no activity bounds when no record is dated', () => {
    const journey = userJourney('u3', history)
    expect(journey).toEqual({ userId: 'u3', recordCount: 1, firstActivityAt: null, lastActivityAt: null, points: [] })
  })

  it('throws for a user without history', () => {
    expect(() => userJourney('u9', history)).toThrow(NotFoundError)
  })
})
