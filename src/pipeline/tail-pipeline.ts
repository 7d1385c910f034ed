/**
 * TailPipeline - oplog to seven-number summaries
 *
 * Wires the pipeline stages together:
 *
 *   resolve resume point → subscribe → extract ids → recompute summaries
 *
 * Subscription, extraction and recomputation each run as their own loop,
 * connected by Handoff queues, so a slow recompute stalls extraction which
 * in turn stops pulling from the oplog cursor. Ids reach the recompute
 * loop in oplog order and are processed one at a time, so two edits of the
 * same series are always summarized in the order they happened.
 *
 * The first error from any stage halts the whole pipeline. `run()` never
 * rejects for a stage failure; it resolves with an outcome naming the stage
 * and the error, leaving the caller to decide whether to exit or restart
 * from a fresh resume point.
 *
 * @example
 * ```typescript
 * const pipeline = new TailPipeline({ source, entities, summaries, logger })
 * const outcome = await pipeline.run()
 * if (outcome.status === 'halted') {
 *   console.error(`halted in ${outcome.stage}: ${outcome.error.message}`)
 * }
 * ```
 */

import type { Timestamp } from 'bson'
import type { NotFoundPolicy } from '../config'
import { RAW_NAMESPACE } from '../constants'
import { NotFoundError, OplogStatsError } from '../errors'
import { silentLogger, type Logger } from '../logging/logger'
import { extractEntityId } from '../oplog/extractor'
import { WRITE_OPERATIONS, subscribe } from '../oplog/filter'
import { resolveResumePosition } from '../oplog/resume'
import type { ChangeSource } from '../oplog/source'
import { SummaryRecomputer } from '../stats/recompute'
import type { EntityStore, SummaryStore } from '../store/types'
import { formatPosition, type OplogEntry } from '../types/oplog'
import { Handoff } from './handoff'

// ============================================================================
// Types
// ============================================================================

export type PipelineStage = 'resume' | 'subscribe' | 'extract' | 'recompute'

export interface PipelineStats {
  /** Oplog entries delivered by the subscription */
  received: number
  /** Entries that yielded a raw series id */
  extracted: number
  /** Entries without a usable id */
  dropped: number
  /** Summaries written */
  recomputed: number
  /** Ids skipped because the series was gone (skip policy only) */
  skipped: number
  /** Position the pipeline resumed after */
  resumedAfter: Timestamp | null
  /** Position of the last entry received */
  lastPosition: Timestamp | null
}

export type PipelineOutcome =
  | { status: 'stopped'; stats: PipelineStats }
  | { status: 'halted'; stage: PipelineStage; error: OplogStatsError; stats: PipelineStats }

export interface TailPipelineOptions {
  source: ChangeSource
  entities: EntityStore
  summaries: SummaryStore
  /** Namespace whose writes trigger recomputes (default: metrics.raw) */
  namespace?: string
  /** What to do when a series vanished before it was loaded (default: 'halt') */
  onNotFound?: NotFoundPolicy
  /** Items each handoff may buffer ahead of its consumer (default: 0) */
  queueCapacity?: number
  logger?: Logger
  /** Stops the pipeline once aborted */
  signal?: AbortSignal
}

interface Halt {
  stage: PipelineStage
  error: OplogStatsError
}

// ============================================================================
// TailPipeline Class
// ============================================================================

export class TailPipeline {
  private readonly source: ChangeSource
  private readonly recomputer: SummaryRecomputer
  private readonly namespace: string
  private readonly onNotFound: NotFoundPolicy
  private readonly records: Handoff<OplogEntry>
  private readonly ids: Handoff<string>
  private readonly logger: Logger
  private readonly controller = new AbortController()
  private readonly externalSignal?: AbortSignal

  private started: boolean = false
  private halt: Halt | null = null
  private readonly stats: PipelineStats = {
    received: 0,
    extracted: 0,
    dropped: 0,
    recomputed: 0,
    skipped: 0,
    resumedAfter: null,
    lastPosition: null,
  }

  constructor(options: TailPipelineOptions) {
    this.source = options.source
    this.logger = options.logger ?? silentLogger
    this.recomputer = new SummaryRecomputer(options.entities, options.summaries, this.logger.child('recompute'))
    this.namespace = options.namespace ?? RAW_NAMESPACE
    this.onNotFound = options.onNotFound ?? 'halt'
    this.records = new Handoff<OplogEntry>(options.queueCapacity ?? 0)
    this.ids = new Handoff<string>(options.queueCapacity ?? 0)
    this.externalSignal = options.signal
  }

  /**
   * Run until stopped or until the first error. A pipeline runs once.
   */
  async run(): Promise<PipelineOutcome> {
    if (this.started) {
      throw new Error('TailPipeline.run() may only be called once')
    }
    this.started = true

    const onExternalAbort = (): void => this.stop()
    if (this.externalSignal?.aborted) {
      this.stop()
    }
    this.externalSignal?.addEventListener('abort', onExternalAbort, { once: true })

    try {
      await this.runStage('resume', async () => {
        this.stats.resumedAfter = await resolveResumePosition(this.source)
      })

      const resumedAfter = this.stats.resumedAfter
      if (this.halt === null && resumedAfter !== null) {
        this.logger.info(`tailing ${this.namespace} after ${formatPosition(resumedAfter)}`)
        await Promise.all([
          this.runStage('subscribe', () => this.subscribeStage(resumedAfter)),
          this.runStage('extract', () => this.extractStage()),
          this.runStage('recompute', () => this.recomputeStage()),
        ])
      }
    } finally {
      this.externalSignal?.removeEventListener('abort', onExternalAbort)
    }

    const stats = this.snapshot()
    if (this.halt !== null) {
      return { status: 'halted', stage: this.halt.stage, error: this.halt.error, stats }
    }
    this.logger.info('pipeline stopped', stats)
    return { status: 'stopped', stats }
  }

  /**
   * Stop tailing. Work already handed to a later stage is finished first.
   */
  stop(): void {
    this.controller.abort()
  }

  /**
   * Counters so far
   */
  getStats(): PipelineStats {
    return this.snapshot()
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async subscribeStage(after: Timestamp): Promise<void> {
    const entries = subscribe(this.source, {
      after,
      namespace: this.namespace,
      operations: WRITE_OPERATIONS,
      signal: this.controller.signal,
    })
    for await (const entry of entries) {
      this.stats.received++
      this.stats.lastPosition = entry.ts
      await this.records.put(entry)
    }
    this.records.close()
  }

  private async extractStage(): Promise<void> {
    for await (const entry of this.records) {
      const result = extractEntityId(entry)
      if (result.ok) {
        this.stats.extracted++
        await this.ids.put(result.id)
      } else {
        this.stats.dropped++
        this.logger.debug(`dropped ${entry.op} entry at ${formatPosition(entry.ts)}: ${result.reason}`)
      }
    }
    this.ids.close()
  }

  private async recomputeStage(): Promise<void> {
    for await (const id of this.ids) {
      try {
        await this.recomputer.recompute(id)
        this.stats.recomputed++
      } catch (error) {
        if (error instanceof NotFoundError && this.onNotFound === 'skip') {
          this.stats.skipped++
          this.logger.warn(`skipping ${id}: raw series no longer exists`)
          continue
        }
        throw error
      }
    }
  }

  // ==========================================================================
  // Private Methods
  // ==========================================================================

  private async runStage(stage: PipelineStage, body: () => Promise<void>): Promise<void> {
    try {
      await body()
    } catch (error) {
      this.fail(stage, error)
    }
  }

  /**
   * Record the first failure and tear every stage down. Later failures are
   * the teardown itself surfacing in the other stages.
   */
  private fail(stage: PipelineStage, error: unknown): void {
    if (this.halt !== null) {
      return
    }
    const cause = OplogStatsError.from(error)
    this.halt = { stage, error: cause }
    this.logger.error(`pipeline halted in ${stage} stage: ${cause.message}`)

    this.controller.abort()
    this.records.cancel(cause)
    this.ids.cancel(cause)
  }

  private snapshot(): PipelineStats {
    return { ...this.stats }
  }
}
