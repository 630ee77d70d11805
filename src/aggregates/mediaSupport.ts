import { toPerspectiveBucket } from '../collections/enums'
import type { MediaPerspective, Perspective } from '../collections/enums'
import type { EvaluationRecord, IssueRecord, IssueSource, MediaSourceRecord } from '../collections/schemas'
import { NotFoundError } from '../errors'
import { debug, warn } from '../logger'
import { toDayKey } from './dates'
import type { MediaSupportPoint, MediaSupportSeries } from './types'

type ResolvedMedia = {
  id: string
  name: string
  perspective: MediaPerspective
}

type SupportEvent = {
  mediaId: string
  mediaName: string
  perspective: Perspective
  timestamp: Date
}

export type MediaSupportOptions = {
  // restrict the computation to a single media source
  mediaId?: string
}

export function indexById<T extends { id: string }>(records: readonly T[]) {
  const byId = new Map<string, T>()
  for (const record of records) {
    if (!byId.has(record.id)) byId.set(record.id, record)
  }
  return byId
}

// The media table is authoritative; the summary embedded in the issue is
// only used for sources the table does not list.
function resolveMedia(source: IssueSource, mediaById: Map<string, MediaSourceRecord>): ResolvedMedia | null {
  const media = mediaById.get(source.id)
  const perspective = media?.perspective ?? source.perspective
  if (!perspective) return null
  return { id: source.id, name: media?.name ?? source.name ?? source.id, perspective }
}

export function uniqueSources(sources: readonly IssueSource[]) {
  const seen = new Set<string>()
  return sources.filter((s) => {
    if (seen.has(s.id)) return false
    seen.add(s.id)
    return true
  })
}

/**
 * Turns support events into running totals per (media, perspective), one
 * point per event. Events sharing a timestamp keep their input order.
 */
export function accumulateSupport(events: readonly SupportEvent[]): MediaSupportPoint[] {
  const ordered = [...events].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime())
  const totals = new Map<string, number>()
  return ordered.map((event) => {
    const key = `${event.mediaId}|${event.perspective}`
    const cumulativeSupport = (totals.get(key) ?? 0) + 1
    totals.set(key, cumulativeSupport)
    return { ...event, date: toDayKey(event.timestamp), cumulativeSupport }
  })
}

/**
 * An evaluation supports every source of its issue whose declared
 * perspective (folded to left/center/right) equals the perspective the user
 * chose. Returns cumulative support over time.
 */
export function calculateMediaSupport(
  evaluations: readonly EvaluationRecord[],
  issues: readonly IssueRecord[],
  mediaSources: readonly MediaSourceRecord[],
  options: MediaSupportOptions = {}
): MediaSupportPoint[] {
  const issuesById = indexById(issues)
  const mediaById = indexById(mediaSources)

  const events: SupportEvent[] = []
  let unknownIssues = 0
  let undated = 0
  let unresolved = 0

  for (const evaluation of evaluations) {
    const issue = issuesById.get(evaluation.issueId)
    if (!issue) {
      unknownIssues++
      continue
    }
    if (!evaluation.evaluatedAt) {
      undated++
      continue
    }
    for (const source of uniqueSources(issue.sources)) {
      if (options.mediaId !== undefined && source.id !== options.mediaId) continue
      const media = resolveMedia(source, mediaById)
      if (!media) {
        unresolved++
        continue
      }
      if (toPerspectiveBucket(media.perspective) !== evaluation.perspective) continue
      events.push({
        mediaId: media.id,
        mediaName: media.name,
        perspective: evaluation.perspective,
        timestamp: evaluation.evaluatedAt
      })
    }
  }

  if (unknownIssues) warn(`Skipped ${unknownIssues} evaluations referencing unknown issues`)
  if (undated) warn(`Skipped ${undated} evaluations without an evaluation time`)
  if (unresolved) warn(`Skipped ${unresolved} issue sources without a known perspective`)

  const points = accumulateSupport(events)
  debug(`Computed ${points.length} media support points from ${evaluations.length} evaluations`)
  return points
}

function mediaName(mediaId: string, issues: readonly IssueRecord[], mediaById: Map<string, MediaSourceRecord>) {
  const listed = mediaById.get(mediaId)
  if (listed) return listed.name
  for (const issue of issues) {
    const source = issue.sources.find((s) => s.id === mediaId)
    if (source) return source.name ?? mediaId
  }
  return null
}

/**
 * One independent support series per requested media source, in request
 * order. Capping how many sources are compared is left to the caller.
 */
export function compareMediaSupport(
  mediaIds: readonly string[],
  evaluations: readonly EvaluationRecord[],
  issues: readonly IssueRecord[],
  mediaSources: readonly MediaSourceRecord[]
): MediaSupportSeries[] {
  const mediaById = indexById(mediaSources)
  return Array.from(new Set(mediaIds), (mediaId) => {
    const name = mediaName(mediaId, issues, mediaById)
    if (name === null) throw new NotFoundError('media source', mediaId)
    return {
      mediaId,
      mediaName: name,
      points: calculateMediaSupport(evaluations, issues, mediaSources, { mediaId })
    }
  })
}
