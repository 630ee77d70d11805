#!/usr/bin/env node
import { DEFAULT_REPORT_DAYS } from './aggregates/userReport'
import { CollectionStore } from './collections/store'
import { loadConfig, loadEnv } from './config'
import { DashboardService, DEFAULT_TOPIC_LIMIT } from './dashboard'
import type { DashboardResult } from './dashboard'
import { DashboardError } from './errors'
import { parseDayRange, parseLimit } from './params'

type Output = (text: string) => void

function unwrap<T>(result: DashboardResult<T>): T {
  if (result.success) return result.data
  const details = result.failures.map((f) => `  ${f.fileName}: ${f.reason} (${f.error})`).join('\n')
  throw new Error(`${result.error}\n${details}`)
}

async function cmdStatus(service: DashboardService) {
  return service.collectionStatus()
}

async function cmdPreferences(service: DashboardService) {
  return unwrap(await service.overallPreference())
}

async function cmdScores(service: DashboardService, start: string, end: string) {
  if (!start || !end) throw new Error('Usage: scores <start YYYY-MM-DD> <end YYYY-MM-DD>')
  const range = parseDayRange(start, end)
  return unwrap(await service.scoreTimeSeries(range.start, range.end))
}

async function cmdTopics(service: DashboardService, top?: string) {
  return unwrap(await service.topTopics(parseLimit('top', top, DEFAULT_TOPIC_LIMIT)))
}

async function cmdIssues(service: DashboardService, limit?: string) {
  return unwrap(await service.recentIssues(parseLimit('limit', limit, service.recentLimit)))
}

async function cmdIssue(service: DashboardService, issueId: string) {
  if (!issueId) throw new Error('Usage: issue <issueId>')
  return unwrap(await service.issueEvaluation(issueId))
}

async function cmdUsers(service: DashboardService, limit?: string) {
  return unwrap(await service.recentUsers(parseLimit('limit', limit, service.recentLimit)))
}

async function cmdJourney(service: DashboardService, userId: string) {
  if (!userId) throw new Error('Usage: journey <userId>')
  return unwrap(await service.userJourney(userId))
}

async function cmdReport(service: DashboardService, userId: string, days?: string) {
  if (!userId) throw new Error('Usage: report <userId> [days]')
  return unwrap(await service.userMonthlyReport(userId, parseLimit('days', days, DEFAULT_REPORT_DAYS)))
}

async function cmdMedia(service: DashboardService, mediaIds: string[]) {
  if (mediaIds.length === 0) throw new Error('Usage: media <mediaId...>')
  return unwrap(await service.mediaSupport(mediaIds))
}

function printUsage(out: Output) {
  out('Usage: dashboard-data <command> [args]')
  out('Commands:')
  out('  status                 load status of every collection')
  out('  preferences            political preference distribution of users')
  out('  scores <start> <end>   daily score proportions per category (YYYY-MM-DD)')
  out('  topics [top]           most subscribed topics')
  out('  issues [limit]         most recent issues')
  out('  issue <issueId>        evaluation summary of one issue')
  out('  users [limit]          most recently active users')
  out('  journey <userId>       score history of one user')
  out('  report <userId> [days] activity of one user over the last days (default 30)')
  out('  media <mediaId...>     cumulative support per media source')
}

function createService() {
  loadEnv()
  const config = loadConfig()
  return new DashboardService(new CollectionStore(config.dataDir), {
    recentLimit: config.recentLimit,
    mediaCompareLimit: config.mediaCompareLimit
  })
}

/**
 * Runs one command and prints its result as JSON. Resolves to the process
 * exit code instead of exiting, so it can be driven from tests.
 */
async function main(
  argv: string[],
  service?: DashboardService,
  out: Output = (text) => console.log(text),
  err: Output = (text) => console.error(text)
): Promise<number> {
  const [cmd, ...args] = argv
  try {
    const svc = service ?? createService()
    let result: unknown
    if (cmd === 'status') result = await cmdStatus(svc)
    else if (cmd === 'preferences') result = await cmdPreferences(svc)
    else if (cmd === 'scores') result = await cmdScores(svc, args[0], args[1])
    else if (cmd === 'topics') result = await cmdTopics(svc, args[0])
    else if (cmd === 'issues') result = await cmdIssues(svc, args[0])
    else if (cmd === 'issue') result = await cmdIssue(svc, args[0])
    else if (cmd === 'users') result = await cmdUsers(svc, args[0])
    else if (cmd === 'journey') result = await cmdJourney(svc, args[0])
    else if (cmd === 'report') result = await cmdReport(svc, args[0], args[1])
    else if (cmd === 'media') result = await cmdMedia(svc, args)
    else {
      printUsage(out)
      return 1
    }
    out(JSON.stringify(result, null, 2))
    return 0
  } catch (e) {
    if (e instanceof DashboardError) err(`Error (${e.code}): ${e.message}`)
    else err(`Error: ${e instanceof Error ? e.message : String(e)}`)
    return 1
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then((code) => {
    process.exitCode = code
  })
}

export { main }
