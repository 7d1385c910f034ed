/**
 * Change Stream Filter
 *
 * Subscribes to a ChangeSource after a position, narrowed to one namespace
 * and a set of operation codes. Order is whatever order the source stored
 * the entries in.
 */

import type { Filter } from 'mongodb'
import type { Timestamp } from 'bson'
import { StreamBrokenError, isOplogStatsError, toError } from '../errors'
import { comparePositions, type OplogEntry, type OplogOperation } from '../types/oplog'
import type { ChangeSource, TailQuery } from './source'

/** Operations that can change a raw series */
export const WRITE_OPERATIONS: readonly OplogOperation[] = ['i', 'u']

export interface SubscribeOptions {
  after: Timestamp
  inclusive?: boolean
  namespace?: string
  operations?: readonly OplogOperation[]
  signal?: AbortSignal
}

/**
 * Translate a tail query into an oplog find filter
 */
export function buildOplogFilter(query: TailQuery): Filter<OplogEntry> {
  const filter: Filter<OplogEntry> = {
    ts: query.inclusive ? { $gte: query.after } : { $gt: query.after },
  }
  if (query.namespace !== undefined) {
    filter.ns = query.namespace
  }
  if (query.operations !== undefined) {
    filter.op = { $in: [...query.operations] }
  }
  return filter
}

/**
 * Evaluate a tail query against a single entry, for sources that filter in
 * process
 */
export function matchesTailQuery(entry: OplogEntry, query: TailQuery): boolean {
  const order = comparePositions(entry.ts, query.after)
  if (query.inclusive ? order < 0 : order <= 0) {
    return false
  }
  if (query.namespace !== undefined && entry.ns !== query.namespace) {
    return false
  }
  if (query.operations !== undefined && !query.operations.includes(entry.op)) {
    return false
  }
  return true
}

/**
 * Tail the source from `after` (exclusive unless `inclusive`).
 *
 * The returned sequence never completes while the signal is live: a source
 * error, or the source ending on its own, raises StreamBrokenError.
 */
export async function* subscribe(source: ChangeSource, options: SubscribeOptions): AsyncGenerator<OplogEntry> {
  const { signal } = options
  const query: TailQuery = {
    after: options.after,
    inclusive: options.inclusive,
    namespace: options.namespace,
    operations: options.operations,
  }

  try {
    for await (const entry of source.tail(query, { signal })) {
      yield entry
    }
  } catch (error) {
    if (signal?.aborted) {
      return
    }
    if (isOplogStatsError(error)) {
      throw error
    }
    const cause = toError(error)
    throw new StreamBrokenError(`oplog tail failed: ${cause.message}`, { cause })
  }

  if (!signal?.aborted) {
    throw new StreamBrokenError('oplog tail ended unexpectedly')
  }
}
