/**
 * Metric Types
 *
 * Raw series documents live in `metrics.raw`; their seven-number summaries
 * are written to `metrics.summary`, one per (key, at) bucket.
 */

import { ObjectId } from 'bson'
import { z } from 'zod'

export const datapointSchema = z.object({
  at: z.date(),
  value: z.number(),
})

export const rawSeriesSchema = z.object({
  _id: z.instanceof(ObjectId),
  key: z.string(),
  at: z.number(),
  values: z.array(datapointSchema).default([]),
})

export type Datapoint = z.infer<typeof datapointSchema>

/**
 * A time bucket of observations for one metric key
 */
export type RawSeries = z.infer<typeof rawSeriesSchema>

/**
 * Seven-number summary of a raw series bucket
 *
 * @see http://en.wikipedia.org/wiki/Seven-number_summary
 */
export interface SevenNumberSummary {
  key: string
  at: number
  min: number
  max: number
  p2: number
  p9: number
  p25: number
  p50: number
  p75: number
  p91: number
  p98: number
}
