import { beforeEach, describe, expect, it, vi } from 'vitest'
import { evaluationRecord, issueRecord, mediaRecord } from '../../test/records'
import { NotFoundError } from '../errors'
import { accumulateSupport, calculateMediaSupport, compareMediaSupport } from './mediaSupport'

beforeEach(() => {
  vi.restoreAllMocks()
  vi.spyOn(console, 'warn').mockImplementation(() => {})
})

describe('calculateMediaSupport', () => {
  it('credits a source whose perspective matches the evaluation', () => {
    const points = calculateMediaSupport(
      [evaluationRecord('e1', 'i1', 'left', '2024-04-01T10:00:00Z')],
      [issueRecord('i1', ['m1'])],
      [mediaRecord('m1', 'Morning Post', 'left')]
    )
    expect(points).toEqual([
      {
        mediaId: 'm1',
        mediaName: 'Morning Post',
        perspective: 'left',
        timestamp: new Date('2024-04-01T10:00:00Z'),
        date: '2024-04-01',
        cumulativeSupport: 1
      }
    ])
  })

  it('gives no support when the perspectives differ', () => {
    const points = calculateMediaSupport(
      [evaluationRecord('e1', 'i1', 'left', '2024-04-01T10:00:00Z')],
      [issueRecord('i1', ['m1'])],
      [mediaRecord('m1', 'Morning Post', 'right')]
    )
    expect(points).toEqual([])
  })

  it('folds leaning perspectives into left and right', () => {
    const points = calculateMediaSupport(
      [
        evaluationRecord('e1', 'i1', 'right', '2024-04-02T00:00:00Z'),
        evaluationRecord('e2', 'i1', 'left', '2024-04-01T00:00:00Z')
      ],
      [issueRecord('i1', [{ $oid: 'm1' }, 'm2'])],
      [mediaRecord('m1', 'Morning Post', 'center_left'), mediaRecord('m2', 'Evening Star', 'center_right')]
    )
    expect(points.map((p) => [p.mediaId, p.perspective, p.date, p.cumulativeSupport])).toEqual([
      ['m1', 'left', '2024-04-01', 1],
      ['m2', 'right', '2024-04-02', 1]
    ])
  })

  it('accumulates per media source and perspective in time order', () => {
    const points = calculateMediaSupport(
      [
        evaluationRecord('e3', 'i2', 'left', '2024-04-03T00:00:00Z'),
        evaluationRecord('e1', 'i1', 'left', '2024-04-01T00:00:00Z'),
        evaluationRecord('e2', 'i1', 'left', '2024-04-02T00:00:00Z')
      ],
      [issueRecord('i1', ['m1', 'm1']), issueRecord('i2', ['m1'])],
      [mediaRecord('m1', 'Morning Post', 'left')]
    )
    expect(points.map((p) => [p.date, p.cumulativeSupport])).toEqual([
      ['2024-04-01', 1],
      ['2024-04-02', 2],
      ['2024-04-03', 3]
    ])
  })

  it('falls back to the perspective embedded in the issue', () => {
    const points = calculateMediaSupport(
      [evaluationRecord('e1', 'i1', 'center', '2024-04-01T00:00:00Z')],
      [issueRecord('i1', [{ _id: { $oid: 'm9' }, name: 'Harbor Times', perspective: 'center' }])],
      []
    )
    expect(points.map((p) => [p.mediaId, p.mediaName, p.cumulativeSupport])).toEqual([['m9', 'Harbor Times', 1]])
  })

  it('skips unknown issues, undated evaluations and unresolved sources', () => {
    const points = calculateMediaSupport(
      [
        evaluationRecord('e1', 'missing', 'left', '2024-04-01T00:00:00Z'),
        evaluationRecord('e2', 'i1', 'left', null),
        evaluationRecord('e3', 'i1', 'left', '2024-04-01T00:00:00Z')
      ],
      [issueRecord('i1', ['m-unknown'])],
      []
    )
    expect(points).toEqual([])
    expect(console.warn).toHaveBeenCalledTimes(3)
  })
})

describe('accumulateSupport', () => {
  it('keeps input order for equal timestamps', () => {
    const timestamp = new Date('2024-04-01T00:00:00Z')
    const points = accumulateSupport([
      { mediaId: 'b', mediaName: 'B', perspective: 'left', timestamp },
      { mediaId: 'a', mediaName: 'A', perspective: 'left', timestamp },
      { mediaId: 'b', mediaName: 'B', perspective: 'left', timestamp }
    ])
    expect(points.map((p) => [p.mediaId, p.cumulativeSupport])).toEqual([
      ['b', 1],
      ['a', 1],
      ['b', 2]
    ])
  })
})

describe('compareMediaSupport', () => {
  const evaluations = [
    evaluationRecord('e1', 'i1', 'left', '2024-04-01T00:00:00Z'),
    evaluationRecord('e2', 'i1', 'right', '2024-04-02T00:00:00Z')
  ]
  const issues = [issueRecord('i1', ['m1', 'm2'])]
  const media = [mediaRecord('m1', 'Morning Post', 'left'), mediaRecord('m2', 'Evening Star', 'right')]

  it('returns one independent series per requested source', () => {
    const series = compareMediaSupport(['m2', 'm1', 'm2'], evaluations, issues, media)
    expect(series.map((s) => [s.mediaId, s.mediaName, s.points.length])).toEqual([
      ['m2', 'Evening Star', 1],
      ['m1', 'Morning Post', 1]
    ])
    expect(series[0].points[0].perspective).toBe('right')
  })

  it('rejects media ids nobody knows', () => {
    expect(() => compareMediaSupport(['m7'], evaluations, issues, media)).toThrow(NotFoundError)
    expect(() => compareMediaSupport(['m7'], evaluations, issues, media)).toThrow("media source 'm7' not found")
  })
})
