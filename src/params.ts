import { InvalidParameterError } from './errors'
import { parseIsoDate } from './mongo/extendedJson'

const DAY_MS = 24 * 60 * 60 * 1000
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export type DayRange = {
  start: Date
  // last millisecond of the end day
  end: Date
}

function parseDay(name: string, value: string | undefined) {
  if (!value) throw new InvalidParameterError(name, `Missing ${name} date`)
  const day = DAY_PATTERN.test(value) ? parseIsoDate(value) : null
  if (!day) throw new InvalidParameterError(name, `Invalid ${name} date '${value}', expected YYYY-MM-DD`)
  return day
}

/**
 * Inclusive UTC day range from two YYYY-MM-DD strings. The end day is
 * covered up to its last millisecond.
 */
export function parseDayRange(start: string | undefined, end: string | undefined): DayRange {
  const from = parseDay('start', start)
  const to = parseDay('end', end)
  if (from.getTime() > to.getTime()) {
    throw new InvalidParameterError('start', `start ${start} is after end ${end}`)
  }
  return { start: from, end: new Date(to.getTime() + DAY_MS - 1) }
}

export function parseLimit(name: string, value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') return fallback
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new InvalidParameterError(name, `${name} must be a positive integer, got '${value}'`)
  }
  return Number(value)
}

// "a,b, c" -> ['a', 'b', 'c']
export function parseIdList(value: string | undefined): string[] {
  if (!value) return []
  return value
    .split(',')
    .map((id) => id.trim())
    .filter(Boolean)
}
