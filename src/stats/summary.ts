/**
 * Seven-number summary of a raw series bucket.
 *
 * @see http://en.wikipedia.org/wiki/Seven-number_summary
 */

import type { RawSeries, SevenNumberSummary } from '../types/metrics'
import { quantile, sortAscending } from './quantile'

/**
 * Interior percentiles stored alongside min and max
 */
export const SUMMARY_PERCENTILES = {
  p2: 0.02,
  p9: 0.09,
  p25: 0.25,
  p50: 0.5,
  p75: 0.75,
  p91: 0.91,
  p98: 0.98,
} as const

export function summarize(raw: RawSeries): SevenNumberSummary {
  const sorted = sortAscending(raw.values.map((point) => point.value))

  return {
    key: raw.key,
    at: raw.at,
    min: quantile(0, sorted),
    max: quantile(1, sorted),
    p2: quantile(SUMMARY_PERCENTILES.p2, sorted),
    p9: quantile(SUMMARY_PERCENTILES.p9, sorted),
    p25: quantile(SUMMARY_PERCENTILES.p25, sorted),
    p50: quantile(SUMMARY_PERCENTILES.p50, sorted),
    p75: quantile(SUMMARY_PERCENTILES.p75, sorted),
    p91: quantile(SUMMARY_PERCENTILES.p91, sorted),
    p98: quantile(SUMMARY_PERCENTILES.p98, sorted),
  }
}
