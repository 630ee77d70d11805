import path from 'path'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { main } from './cli'
import { CollectionStore } from './collections/store'
import { DashboardService } from './dashboard'

const fixtures = path.resolve(__dirname, '../test/fixtures')

beforeEach(() => {
  vi.restoreAllMocks()
  vi.spyOn(console, 'info').mockImplementation(() => {})
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

async function run(argv: string[]) {
  const service = new DashboardService(new CollectionStore(fixtures), {
    mediaCompareLimit: 2,
    now: () => new Date('2024-04-10T00:00:00Z')
  })
  const out: string[] = []
  const err: string[] = []
  const code = await main(
    argv,
    service,
    (text) => out.push(text),
    (text) => err.push(text)
  )
  return { code, out, err }
}

describe('cli', () => {
  it('prints command results as JSON', async () => {
    const { code, out } = await run(['issue', 'i1'])
    expect(code).toBe(0)
    expect(JSON.parse(out[0])).toEqual({
      issueId: 'i1',
      issueTitle: 'Minimum wage increase',
      leftCount: 2,
      centerCount: 0,
      rightCount: 1,
      totalCount: 3
    })
  })

  it('passes limits through', async () => {
    const { out } = await run(['topics', '1'])
    expect(JSON.parse(out[0])).toEqual([{ topicId: 't1', topicName: 'Housing', category: 'society', subscriberCount: 2 }])
  })

  it('reads an inclusive day range', async () => {
    const { code, out } = await run(['scores', '2024-03-03', '2024-03-03'])
    expect(code).toBe(0)
    expect(JSON.parse(out[0])).toEqual([
      { date: '2024-03-03', category: 'politics', left: 80 / 150, center: 50 / 150, right: 20 / 150, sampleCount: 1 }
    ])
  })

  it('prints a user report', async () => {
    const { code, out } = await run(['report', 'u1', '5'])
    expect(code).toBe(0)
    expect(JSON.parse(out[0])).toMatchObject({
      window: { start: '2024-04-05T00:00:00.000Z', end: '2024-04-10T00:00:00.000Z', days: 5 },
      totalWatches: 2,
      watchByDay: [
        { date: '2024-04-06', watchCount: 1 },
        { date: '2024-04-07', watchCount: 1 }
      ],
      commentLikeCount: 2
    })
    expect(await run(['report'])).toEqual({ code: 1, out: [], err: ['Error: Usage: report <userId> [days]'] })
  })

  it('reports unknown ids', async () => {
    expect(await run(['journey', 'u9'])).toEqual({ code: 1, out: [], err: ["Error (not_found): user 'u9' not found"] })
  })

  it('reports bad arguments', async () => {
    expect((await run(['scores', '2024-03-01'])).err).toEqual(['Error: Usage: scores <start YYYY-MM-DD> <end YYYY-MM-DD>'])
    expect((await run(['media', 'm1', 'm2', 'm3'])).err).toEqual([
      'Error (invalid_parameter): At most 2 media sources can be compared'
    ])
    expect((await run(['users', 'ten'])).err).toEqual([
      "Error (invalid_parameter): limit must be a positive integer, got 'ten'"
    ])
  })

  it('prints usage for an unknown command', async () => {
    const { code, out } = await run(['bogus'])
    expect(code).toBe(1)
    expect(out[0]).toBe('Usage: dashboard-data <command> [args]')
  })
})
