/**
 * Oplog printer behind `oplog-stats tail`
 *
 * Prints every oplog entry, all namespaces and operations, starting with
 * the newest entry at startup. One relaxed Extended JSON document per line.
 */

import { EJSON } from 'bson'
import { resolveResumePosition } from '../oplog/resume'
import { subscribe } from '../oplog/filter'
import type { ChangeSource } from '../oplog/source'
import type { OplogEntry } from '../types/oplog'

export interface PrintOplogOptions {
  /** Receives each formatted line */
  write: (line: string) => void
  signal?: AbortSignal
}

export function formatOplogEntry(entry: OplogEntry): string {
  return EJSON.stringify(entry, { relaxed: true })
}

/**
 * Print entries until aborted. Resolves with the number printed.
 */
export async function printOplog(source: ChangeSource, options: PrintOplogOptions): Promise<number> {
  const after = await resolveResumePosition(source)
  let printed = 0
  for await (const entry of subscribe(source, { after, inclusive: true, signal: options.signal })) {
    options.write(formatOplogEntry(entry))
    printed++
  }
  return printed
}
