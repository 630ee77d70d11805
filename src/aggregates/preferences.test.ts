import { describe, expect, it } from 'vitest'
import { userRecord } from '../../test/records'
import { preferenceDistribution } from './preferences'

describe('preferenceDistribution', () => {
  it('counts preferences in scale order with unknown last', () => {
    const users = [
      userRecord('u1', 'center_right'),
      userRecord('u2', 'left'),
      userRecord('u3', null),
      userRecord('u4', 'left'),
      userRecord('u5', 'libertarian')
    ]
    expect(preferenceDistribution(users)).toEqual([
      { preference: 'left', count: 2, share: 0.4 },
      { preference: 'center_right', count: 1, share: 0.2 },
      { preference: 'unknown', count: 2, share: 0.4 }
    ])
  })

  it('returns nothing without users', () => {
    expect(preferenceDistribution([])).toEqual([])
  })
})
