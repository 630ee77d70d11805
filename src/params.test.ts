import { describe, expect, it } from 'vitest'
import { InvalidParameterError } from './errors'
import { parseDayRange, parseIdList, parseLimit } from './params'

describe('parseDayRange', () => {
  it('covers the whole end day', () => {
    const { start, end } = parseDayRange('2024-03-01', '2024-03-02')
    expect(start.toISOString()).toBe('2024-03-01T00:00:00.000Z')
    expect(end.toISOString()).toBe('2024-03-02T23:59:59.999Z')
  })

  it('accepts a single day', () => {
    expect(parseDayRange('2024-03-01', '2024-03-01').end.toISOString()).toBe('2024-03-01T23:59:59.999Z')
  })

  it('rejects malformed or reversed dates', () => {
    expect(() => parseDayRange('2024-3-1', '2024-03-02')).toThrow(InvalidParameterError)
    expect(() => parseDayRange('2024-03-01T00:00:00Z', '2024-03-02')).toThrow("Invalid start date '2024-03-01T00:00:00Z', expected YYYY-MM-DD")
    expect(() => parseDayRange('2024-03-01', '2024-02-30')).toThrow('Invalid end date')
    expect(() => parseDayRange('2024-03-02', '2024-03-01')).toThrow('start 2024-03-02 is after end 2024-03-01')
    expect(() => parseDayRange(undefined, '2024-03-01')).toThrow('Missing start date')
  })
})

describe('parseLimit', () => {
  it('falls back when absent', () => {
    expect(parseLimit('limit', undefined, 20)).toBe(20)
    expect(parseLimit('limit', '', 20)).toBe(20)
  })

  it('accepts positive integers only', () => {
    expect(parseLimit('top', '150', 50)).toBe(150)
    expect(() => parseLimit('top', '0', 50)).toThrow("top must be a positive integer, got '0'")
    expect(() => parseLimit('top', '2.5', 50)).toThrow(InvalidParameterError)
    expect(() => parseLimit('top', '-1', 50)).toThrow(InvalidParameterError)
  })
})

describe('parseIdList', () => {
  it('splits and trims comma separated ids', () => {
    expect(parseIdList('m1, m2,,m3 ')).toEqual(['m1', 'm2', 'm3'])
    expect(parseIdList(undefined)).toEqual([])
  })
})
