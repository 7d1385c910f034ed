/**
 * Store interfaces the recompute engine reads from and writes to
 */

import type { RawSeries, SevenNumberSummary } from '../types/metrics'

export interface EntityStore {
  /**
   * Load a raw series by its hex ObjectId.
   *
   * Resolves null when no such document exists; rejects on transport
   * failure.
   */
  findRawSeries(id: string): Promise<RawSeries | null>
}

export interface SummaryStore {
  /**
   * Insert or wholly replace the summary stored under (key, at)
   */
  upsertSummary(summary: SevenNumberSummary): Promise<void>
}
