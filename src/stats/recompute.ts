/**
 * Summary Recomputation Engine
 *
 * Reloads a raw series, derives its seven-number summary and upserts it
 * under (key, at). Running it twice over the same raw document writes the
 * same summary twice, which is what makes at-least-once delivery of oplog
 * entries safe.
 */

import {
  NotFoundError,
  PersistFailedError,
  SourceUnavailableError,
  isOplogStatsError,
  toError,
} from '../errors'
import { silentLogger, type Logger } from '../logging/logger'
import type { EntityStore, SummaryStore } from '../store/types'
import type { RawSeries, SevenNumberSummary } from '../types/metrics'
import { summarize } from './summary'

export class SummaryRecomputer {
  private readonly entities: EntityStore
  private readonly summaries: SummaryStore
  private readonly logger: Logger

  constructor(entities: EntityStore, summaries: SummaryStore, logger: Logger = silentLogger) {
    this.entities = entities
    this.summaries = summaries
    this.logger = logger
  }

  /**
   * Recompute and persist the summary for one raw series
   *
   * @throws NotFoundError when the series no longer exists
   * @throws SourceUnavailableError when the series could not be read
   * @throws PersistFailedError when the upsert failed
   */
  async recompute(id: string): Promise<SevenNumberSummary> {
    const raw = await this.load(id)
    const summary = summarize(raw)

    try {
      await this.summaries.upsertSummary(summary)
    } catch (error) {
      throw new PersistFailedError(summary.key, summary.at, { cause: toError(error) })
    }

    this.logger.debug(`summary ${summary.key}@${summary.at} updated from ${id}`, {
      values: raw.values.length,
      p50: summary.p50,
    })
    return summary
  }

  private async load(id: string): Promise<RawSeries> {
    let raw: RawSeries | null
    try {
      raw = await this.entities.findRawSeries(id)
    } catch (error) {
      if (isOplogStatsError(error)) {
        throw error
      }
      const cause = toError(error)
      throw new SourceUnavailableError(`could not load raw series ${id}: ${cause.message}`, { cause })
    }

    if (raw === null) {
      throw new NotFoundError(id)
    }
    return raw
  }
}
