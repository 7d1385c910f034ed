/**
 * Identifier Extractor
 *
 * Maps an oplog entry to the hex ObjectId of the raw series it touched.
 * Inserts carry the id in the inserted document; updates carry it in the
 * selector (`o2`), since the update payload may be a partial `$set`.
 */

import { ObjectId } from 'bson'
import type { Document } from 'bson'
import type { OplogEntry } from '../types/oplog'

export type DropReason = 'missing-id' | 'unsupported-id-type' | 'unsupported-operation'

export type ExtractResult = { ok: true; id: string } | { ok: false; reason: DropReason }

export function extractEntityId(entry: OplogEntry): ExtractResult {
  switch (entry.op) {
    case 'i':
      return idFrom(entry.o)
    case 'u':
      return idFrom(entry.o2)
    default:
      return { ok: false, reason: 'unsupported-operation' }
  }
}

function idFrom(document: Document | undefined): ExtractResult {
  if (document === undefined || !('_id' in document)) {
    return { ok: false, reason: 'missing-id' }
  }
  const id: unknown = document._id
  if (!(id instanceof ObjectId)) {
    return { ok: false, reason: 'unsupported-id-type' }
  }
  return { ok: true, id: id.toHexString() }
}
