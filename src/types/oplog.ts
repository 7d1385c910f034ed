/**
 * Oplog Types
 *
 * Shape of a document in `local.oplog.rs`, the replica set's replicated log.
 *
 * @see https://www.mongodb.com/docs/manual/core/replica-set-oplog/
 */

import type { Document, Long, Timestamp } from 'bson'

/**
 * Oplog operation codes: insert, update, delete, command, no-op
 */
export type OplogOperation = 'i' | 'u' | 'd' | 'c' | 'n'

/**
 * A single oplog entry
 */
export interface OplogEntry {
  /** Log position: seconds plus an increment within the second */
  ts: Timestamp
  /** History id; dropped by servers from 4.2 on */
  h?: Long | number
  /** Oplog schema version */
  v: number
  op: OplogOperation
  /** `<db>.<collection>` the operation applied to */
  ns: string
  /** Inserted document, update description, or command */
  o: Document
  /** Selector of the updated document (updates only) */
  o2?: Document
}

/**
 * Order two oplog positions by seconds, then increment
 */
export function comparePositions(a: Timestamp, b: Timestamp): number {
  const bySeconds = a.getHighBitsUnsigned() - b.getHighBitsUnsigned()
  if (bySeconds !== 0) {
    return bySeconds
  }
  return a.getLowBitsUnsigned() - b.getLowBitsUnsigned()
}

/**
 * Render a position as `seconds:increment`
 */
export function formatPosition(ts: Timestamp): string {
  return `${ts.getHighBitsUnsigned()}:${ts.getLowBitsUnsigned()}`
}
