// MongoDB Extended JSON (relaxed mode, as written by `mongoexport --jsonArray`).
// Only the two wrappers the exports actually use are understood: {"$oid"} and {"$date"}.

import { MalformedIdentifierError } from '../errors'
import { warn } from '../logger'

export type JsonObject = { [key: string]: unknown }

export type ObjectIdWrapper = { $oid: string }
export type DateWrapper = { $date: unknown }

export type RecordLayout = {
  // reference fields holding another document's id (besides `_id`)
  identifiers: readonly string[]
  dates: readonly string[]
}

export type ParsedRecord = JsonObject & { id: string }

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function hasOnlyKey(value: JsonObject, key: string) {
  const keys = Object.keys(value)
  return keys.length === 1 && keys[0] === key
}

export function isObjectIdWrapper(value: unknown): value is ObjectIdWrapper {
  return isJsonObject(value) && hasOnlyKey(value, '$oid') && typeof value.$oid === 'string'
}

export function isDateWrapper(value: unknown): value is DateWrapper {
  return isJsonObject(value) && hasOnlyKey(value, '$date')
}

export function parseIdentifier(value: unknown): string {
  if (typeof value === 'string') return value
  if (isObjectIdWrapper(value)) return value.$oid
  throw new MalformedIdentifierError(value)
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}(?::?\d{2})?)?)?$/i

function normalizeZone(zone: string | undefined) {
  if (!zone || zone.toUpperCase() === 'Z') return 'Z'
  const digits = zone.slice(1).replace(':', '')
  const hours = digits.slice(0, 2)
  const minutes = digits.slice(2, 4) || '00'
  return `${zone[0]}${hours}:${minutes}`
}

/**
 * Parses an ISO-8601 date or date-time. A date-time without an offset is
 * read as UTC, matching how the exports are written.
 */
export function parseIsoDate(text: string): Date | null {
  const m = ISO_PATTERN.exec(text.trim())
  if (!m) return null
  const [, year, month, day, hour = '00', minute = '00', second = '00', fraction = '', zone] = m

  const y = Number(year)
  const mo = Number(month)
  const d = Number(day)
  const calendar = new Date(Date.UTC(y, mo - 1, d))
  if (calendar.getUTCFullYear() !== y || calendar.getUTCMonth() !== mo - 1 || calendar.getUTCDate() !== d) return null
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) return null

  const millis = fraction.slice(0, 3).padEnd(3, '0')
  const parsed = new Date(`${year}-${month}-${day}T${hour}:${minute}:${second}.${millis}${normalizeZone(zone)}`)
  return Number.isNaN(parsed.getTime()) ? null : parsed
}

/**
 * Never throws: anything that is not a readable date becomes null with a
 * warning, so one bad field does not reject its record.
 */
export function parseTimestamp(value: unknown, field = 'date'): Date | null {
  if (value === null || value === undefined) return null

  let text: unknown = value
  if (isDateWrapper(value)) text = value.$date

  if (typeof text === 'string') {
    const parsed = parseIsoDate(text)
    if (parsed) return parsed
  }

  warn(`Failed to parse ${field}:`, JSON.stringify(value))
  return null
}

export function parseRecord(raw: JsonObject, layout: RecordLayout): ParsedRecord {
  const { _id, ...rest } = raw
  const source = _id ?? rest.id
  if (source === undefined || source === null) throw new MalformedIdentifierError(source)

  const record: ParsedRecord = { ...rest, id: parseIdentifier(source) }
  for (const field of layout.identifiers) {
    const value = record[field]
    if (value === undefined || value === null) continue
    record[field] = parseIdentifier(value)
  }
  for (const field of layout.dates) {
    if (!(field in record)) continue
    record[field] = parseTimestamp(record[field], field)
  }
  return record
}
