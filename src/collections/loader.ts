import fs from 'fs/promises'
import path from 'path'
import type { ZodError } from 'zod'
import { debug, error, info, warn } from '../logger'
import { isJsonObject, parseRecord } from '../mongo/extendedJson'
import type { ParsedRecord } from '../mongo/extendedJson'
import type { CollectionDefinition } from './schemas'

export type LoadFailureReason = 'missing_file' | 'invalid_json' | 'invalid_shape' | 'read_error'

export type LoadSuccess<T> = {
  success: true
  collection: string
  fileName: string
  data: T[]
  // records dropped because they were not objects or failed their schema
  skipped: number
  // the file held no records at all
  empty: boolean
}

export type LoadFailure<T> = {
  success: false
  collection: string
  fileName: string
  data: T[]
  reason: LoadFailureReason
  error: string
}

export type LoadOutcome<T> = LoadSuccess<T> | LoadFailure<T>

function failure<T>(definition: CollectionDefinition<T>, reason: LoadFailureReason, message: string): LoadFailure<T> {
  return { success: false, collection: definition.name, fileName: definition.fileName, data: [], reason, error: message }
}

function describeZodError(err: ZodError) {
  return err.issues.map((i) => `${i.path.join('.') || '(record)'}: ${i.message}`).join('; ')
}

function errorMessage(e: unknown) {
  return e instanceof Error ? e.message : String(e)
}

function errorCode(e: unknown): unknown {
  return isJsonObject(e) ? e.code : undefined
}

/**
 * Decodes the text of one `mongoexport --jsonArray` file into a table.
 * Bad records are dropped one by one; only an undecodable file or a top
 * level that is not an array fails the whole load.
 */
export function parseCollection<T>(text: string, definition: CollectionDefinition<T>): LoadOutcome<T> {
  const { fileName } = definition
  const body = text.replace(/^\uFEFF/, '')

  if (!body.trim()) {
    info(`No records in ${fileName} (empty file)`)
    return { success: true, collection: definition.name, fileName, data: [], skipped: 0, empty: true }
  }

  let decoded: unknown
  try {
    decoded = JSON.parse(body)
  } catch (e) {
    error(`Invalid JSON in ${fileName}: ${errorMessage(e)}`)
    return failure(definition, 'invalid_json', `Invalid JSON in ${fileName}: ${errorMessage(e)}`)
  }

  if (!Array.isArray(decoded)) {
    error(`Expected a JSON array in ${fileName}, got ${decoded === null ? 'null' : typeof decoded}`)
    return failure(definition, 'invalid_shape', `Expected a JSON array of records in ${fileName}`)
  }

  if (decoded.length === 0) {
    info(`No records in ${fileName}`)
    return { success: true, collection: definition.name, fileName, data: [], skipped: 0, empty: true }
  }

  const data: T[] = []
  let skipped = 0
  decoded.forEach((raw: unknown, index) => {
    if (!isJsonObject(raw)) {
      warn(`Skipping record #${index} in ${fileName}: not an object`)
      skipped++
      return
    }
    let parsed: ParsedRecord
    try {
      parsed = parseRecord(raw, definition.layout)
    } catch (e) {
      warn(`Skipping record #${index} in ${fileName}: ${errorMessage(e)}`)
      skipped++
      return
    }
    const result = definition.schema.safeParse(parsed)
    if (!result.success) {
      warn(`Skipping record #${index} in ${fileName}: ${describeZodError(result.error)}`)
      skipped++
      return
    }
    data.push(result.data)
  })

  info(`Loaded ${data.length} records from ${fileName}` + (skipped ? ` (${skipped} skipped)` : ''))
  return { success: true, collection: definition.name, fileName, data, skipped, empty: false }
}

export async function loadCollection<T>(dataDir: string, definition: CollectionDefinition<T>): Promise<LoadOutcome<T>> {
  const filePath = path.join(dataDir, definition.fileName)
  debug('Loading collection', definition.name, 'from', filePath)

  let text: string
  try {
    text = await fs.readFile(filePath, 'utf-8')
  } catch (e) {
    if (errorCode(e) === 'ENOENT') {
      warn(`Data file not found: ${filePath}`)
      return failure(definition, 'missing_file', `Data file not found: ${definition.fileName}`)
    }
    error(`Failed to read ${filePath}: ${errorMessage(e)}`)
    return failure(definition, 'read_error', `Failed to read ${definition.fileName}: ${errorMessage(e)}`)
  }

  return parseCollection(text, definition)
}
