/**
 * Resume Point Resolver
 *
 * The newest oplog entry at startup marks where tailing begins. Resolve it
 * before subscribing and tail strictly after it: that entry was already
 * applied before we started watching.
 */

import type { Timestamp } from 'bson'
import { NoResumePointError, SourceUnavailableError, toError } from '../errors'
import type { OplogEntry } from '../types/oplog'
import type { ChangeSource } from './source'

export async function resolveResumePosition(source: ChangeSource): Promise<Timestamp> {
  let latest: OplogEntry | null
  try {
    latest = await source.latest()
  } catch (error) {
    const cause = toError(error)
    throw new SourceUnavailableError(`could not read latest oplog entry: ${cause.message}`, { cause })
  }

  if (latest === null) {
    throw new NoResumePointError()
  }
  return latest.ts
}
