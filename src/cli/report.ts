import type { PipelineOutcome } from '../pipeline/tail-pipeline'
import { formatPosition } from '../types/oplog'

export type HaltedOutcome = Extract<PipelineOutcome, { status: 'halted' }>

/**
 * Describe a halted outcome: stage, error, the chain of causes and the
 * last oplog position seen
 */
export function describeHalt(outcome: HaltedOutcome): string {
  const lines = [`pipeline halted in ${outcome.stage} stage: ${outcome.error.message}`]
  let cause: unknown = outcome.error.cause
  while (cause instanceof Error) {
    lines.push(`  caused by: ${cause.message}`)
    cause = cause.cause
  }
  const { lastPosition } = outcome.stats
  if (lastPosition !== null) {
    lines.push(`  last oplog position: ${formatPosition(lastPosition)}`)
  }
  return lines.join('\n')
}
