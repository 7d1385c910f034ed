/**
 * MongoOplogSource - ChangeSource over a replica set's `local.oplog.rs`
 *
 * Tailing uses a tailable, await-data cursor in natural order, so the
 * server holds each getMore open until new entries land instead of the
 * client polling.
 *
 * @example
 * ```typescript
 * const client = await MongoClient.connect('mongodb://localhost')
 * const source = MongoOplogSource.fromClient(client)
 * const latest = await source.latest()
 * ```
 */

import type { Filter, FindOptions, MongoClient } from 'mongodb'
import { OPLOG_COLLECTION, OPLOG_DB } from '../constants'
import { toError } from '../errors'
import type { OplogEntry } from '../types/oplog'
import { buildOplogFilter } from './filter'
import type { ChangeSource, TailOptions, TailQuery } from './source'

/**
 * Cursor operations the source relies on
 */
export interface OplogCursor {
  next(): Promise<OplogEntry | null>
  close(): Promise<void>
}

/**
 * Subset of `Collection<OplogEntry>` the source relies on
 */
export interface OplogCollection {
  find(filter: Filter<OplogEntry>, options: FindOptions): OplogCursor
}

export interface MongoOplogSourceOptions {
  /** Upper bound the server waits on an idle getMore, in ms */
  maxAwaitTimeMS?: number
}

export class MongoOplogSource implements ChangeSource {
  private readonly oplog: OplogCollection
  private readonly maxAwaitTimeMS?: number

  constructor(oplog: OplogCollection, options: MongoOplogSourceOptions = {}) {
    this.oplog = oplog
    this.maxAwaitTimeMS = options.maxAwaitTimeMS
  }

  static fromClient(client: MongoClient, options?: MongoOplogSourceOptions): MongoOplogSource {
    return new MongoOplogSource(client.db(OPLOG_DB).collection<OplogEntry>(OPLOG_COLLECTION), options)
  }

  async latest(): Promise<OplogEntry | null> {
    const cursor = this.oplog.find({}, { sort: { $natural: -1 }, limit: 1 })
    try {
      return await cursor.next()
    } finally {
      await cursor.close()
    }
  }

  async *tail(query: TailQuery, options: TailOptions = {}): AsyncGenerator<OplogEntry> {
    const { signal } = options
    if (signal?.aborted) {
      return
    }

    const cursor = this.oplog.find(buildOplogFilter(query), {
      sort: { $natural: 1 },
      tailable: true,
      awaitData: true,
      ...(this.maxAwaitTimeMS !== undefined && { maxAwaitTimeMS: this.maxAwaitTimeMS }),
    })

    // Closing the cursor is the only way to wake a pending await-data getMore.
    let closing: Promise<Error | null> | null = null
    const close = (): Promise<Error | null> => {
      closing ??= cursor.close().then(
        () => null,
        (error: unknown) => toError(error)
      )
      return closing
    }
    const onAbort = (): void => {
      void close()
    }
    signal?.addEventListener('abort', onAbort, { once: true })

    try {
      while (!signal?.aborted) {
        let entry: OplogEntry | null
        try {
          entry = await cursor.next()
        } catch (error) {
          if (signal?.aborted) {
            return
          }
          throw error
        }
        if (entry === null) {
          return
        }
        yield entry
      }
    } finally {
      signal?.removeEventListener('abort', onAbort)
      const closeError = await close()
      if (closeError !== null && !signal?.aborted) {
        throw closeError
      }
    }
  }
}
