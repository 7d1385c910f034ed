import { describe, it, expect } from 'vitest'
import { ObjectId } from 'bson'
import { summarize, SUMMARY_PERCENTILES } from '../../../src/stats/summary'
import type { RawSeries } from '../../../src/types/metrics'

function rawSeries(values: number[]): RawSeries {
  return {
    _id: new ObjectId(),
    key: 'cpu.load',
    at: 28_333_333,
    values: values.map((value, i) => ({ at: new Date(1_700_000_000_000 + i * 1000), value })),
  }
}

describe('summarize', () => {
  it('keys the summary by the series key and bucket', () => {
    const summary = summarize(rawSeries([1, 2, 3]))
    expect(summary.key).toBe('cpu.load')
    expect(summary.at).toBe(28_333_333)
  })

  it('sorts observations before taking quantiles', () => {
    const summary = summarize(rawSeries([7, 3, 10, 1, 9, 2, 8, 4, 6, 5]))

    expect(summary.min).toBe(1)
    expect(summary.max).toBe(10)
    expect(summary.p25).toBe(3.25)
    expect(summary.p50).toBe(5.5)
    expect(summary.p75).toBe(7.75)
    expect(summary.p2).toBeCloseTo(1.18, 10)
    expect(summary.p9).toBeCloseTo(1.81, 10)
    expect(summary.p91).toBeCloseTo(9.19, 10)
    expect(summary.p98).toBeCloseTo(9.82, 10)
  })

  it('collapses to the single value of a one-point series', () => {
    const summary = summarize(rawSeries([4.5]))
    expect(summary).toEqual({
      key: 'cpu.load',
      at: 28_333_333,
      min: 4.5,
      max: 4.5,
      p2: 4.5,
      p9: 4.5,
      p25: 4.5,
      p50: 4.5,
      p75: 4.5,
      p91: 4.5,
      p98: 4.5,
    })
  })

  it('yields NaN statistics for a series without observations', () => {
    const summary = summarize(rawSeries([]))
    expect(summary.min).toBeNaN()
    expect(summary.p50).toBeNaN()
    expect(summary.max).toBeNaN()
  })

  it('is deterministic for the same snapshot', () => {
    const raw = rawSeries([0.1, 0.7, 0.3, 0.9, 0.2])
    expect(summarize(raw)).toEqual(summarize(raw))
  })

  it('stores the seven interior and outer percentiles', () => {
    expect(Object.values(SUMMARY_PERCENTILES)).toEqual([0.02, 0.09, 0.25, 0.5, 0.75, 0.91, 0.98])
  })
})
