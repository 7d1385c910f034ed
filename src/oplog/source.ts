/**
 * ChangeSource - capability interface over an ordered, resumable log
 *
 * Any backend that can hand out its newest entry and tail entries after a
 * position in stored order can drive the pipeline: the MongoDB oplog in
 * production, an in-memory log in tests.
 */

import type { Timestamp } from 'bson'
import type { OplogEntry, OplogOperation } from '../types/oplog'

/**
 * Which entries a tail should deliver
 */
export interface TailQuery {
  /** Position to start after */
  after: Timestamp
  /** Also deliver the entry at `after` itself */
  inclusive?: boolean
  /** Only entries for this `<db>.<collection>` */
  namespace?: string
  /** Only entries with these operation codes */
  operations?: readonly OplogOperation[]
}

export interface TailOptions {
  /** Ends the tail quietly once aborted */
  signal?: AbortSignal
}

export interface ChangeSource {
  /**
   * Most recent entry in the log, or null when the log is empty
   */
  latest(): Promise<OplogEntry | null>

  /**
   * Entries matching the query in log order. Waits without polling while no
   * new entry is available and never completes on its own; it ends only on
   * abort or by throwing.
   */
  tail(query: TailQuery, options?: TailOptions): AsyncIterable<OplogEntry>
}
