/**
 * MongoDB-backed entity and summary stores
 *
 * Raw series are read from `metrics.raw` and validated before use.
 * Summaries are written to `metrics.summary` with a single replaceOne
 * upsert keyed on (key, at), which the server applies atomically.
 */

import { ObjectId } from 'bson'
import type { Document } from 'bson'
import type { MongoClient } from 'mongodb'
import { METRICS_DB, RAW_COLLECTION, SUMMARY_COLLECTION } from '../constants'
import { InvalidSeriesError } from '../errors'
import { rawSeriesSchema, type RawSeries, type SevenNumberSummary } from '../types/metrics'
import type { EntityStore, SummaryStore } from './types'

/**
 * Subset of `Collection` used to read raw series
 */
export interface RawSeriesCollection {
  findOne(filter: { _id: ObjectId }): Promise<Document | null>
}

/**
 * Subset of `Collection<SevenNumberSummary>` used to write summaries
 */
export interface SummaryCollection {
  replaceOne(
    filter: Pick<SevenNumberSummary, 'key' | 'at'>,
    replacement: SevenNumberSummary,
    options: { upsert: boolean }
  ): Promise<unknown>
}

export class MongoEntityStore implements EntityStore {
  constructor(private readonly raw: RawSeriesCollection) {}

  static fromClient(client: MongoClient): MongoEntityStore {
    return new MongoEntityStore(client.db(METRICS_DB).collection(RAW_COLLECTION))
  }

  async findRawSeries(id: string): Promise<RawSeries | null> {
    if (!ObjectId.isValid(id)) {
      return null
    }
    const document = await this.raw.findOne({ _id: new ObjectId(id) })
    if (document === null) {
      return null
    }
    return parseRawSeries(id, document)
  }
}

export class MongoSummaryStore implements SummaryStore {
  constructor(private readonly summaries: SummaryCollection) {}

  static fromClient(client: MongoClient): MongoSummaryStore {
    return new MongoSummaryStore(client.db(METRICS_DB).collection<SevenNumberSummary>(SUMMARY_COLLECTION))
  }

  async upsertSummary(summary: SevenNumberSummary): Promise<void> {
    await this.summaries.replaceOne({ key: summary.key, at: summary.at }, { ...summary }, { upsert: true })
  }
}

/**
 * Validate a raw series document read from storage
 *
 * @throws InvalidSeriesError naming the first offending field
 */
export function parseRawSeries(id: string, document: Document): RawSeries {
  const result = rawSeriesSchema.safeParse(document)
  if (!result.success) {
    const issue = result.error.issues[0]
    const where = issue.path.length > 0 ? issue.path.join('.') : 'document'
    throw new InvalidSeriesError(id, `${where}: ${issue.message}`)
  }
  return result.data
}
