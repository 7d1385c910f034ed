/**
 * Error Classes
 *
 * Every failure the tailing pipeline can surface is an OplogStatsError
 * carrying a stable code. The orchestrator halts on the first one it sees
 * and reports the stage it came from.
 *
 * @module errors
 *
 * @example
 * ```typescript
 * import { NotFoundError } from './errors'
 *
 * try {
 *   await recomputer.recompute(id)
 * } catch (error) {
 *   if (error instanceof NotFoundError) {
 *     console.log(`series vanished: ${error.entityId}`)
 *   }
 * }
 * ```
 */

/**
 * Error codes used across the pipeline
 */
export const OplogStatsErrorCode = {
  /** The oplog is empty, so there is no position to resume after */
  NO_RESUME_POINT: 'NO_RESUME_POINT',
  /** The oplog or entity store could not be read */
  SOURCE_UNAVAILABLE: 'SOURCE_UNAVAILABLE',
  /** The tailing cursor died or errored */
  STREAM_BROKEN: 'STREAM_BROKEN',
  /** The raw series referenced by an oplog entry no longer exists */
  NOT_FOUND: 'NOT_FOUND',
  /** The raw series document does not have the expected shape */
  INVALID_SERIES: 'INVALID_SERIES',
  /** The summary upsert failed */
  PERSIST_FAILED: 'PERSIST_FAILED',
  /** Configuration did not validate */
  INVALID_CONFIG: 'INVALID_CONFIG',
  /** Anything else thrown inside a stage */
  INTERNAL: 'INTERNAL',
} as const

export type OplogStatsErrorCodeType = (typeof OplogStatsErrorCode)[keyof typeof OplogStatsErrorCode]

/**
 * Base error class for all pipeline errors.
 */
export class OplogStatsError extends Error {
  readonly code: OplogStatsErrorCodeType

  constructor(code: OplogStatsErrorCodeType, message: string, options?: { cause?: Error }) {
    super(`${code}: ${message}`, options?.cause ? { cause: options.cause } : undefined)

    this.name = 'OplogStatsError'
    this.code = code

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Wrap an arbitrary thrown value, keeping OplogStatsErrors as they are
   */
  static from(error: unknown): OplogStatsError {
    if (error instanceof OplogStatsError) {
      return error
    }
    const cause = toError(error)
    return new OplogStatsError(OplogStatsErrorCode.INTERNAL, cause.message, { cause })
  }

  toJSON(): { name: string; code: string; message: string; cause?: string } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      ...(this.cause instanceof Error && { cause: this.cause.message }),
    }
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Type guard for pipeline errors
 */
export function isOplogStatsError(error: unknown): error is OplogStatsError {
  return error instanceof OplogStatsError
}

export class NoResumePointError extends OplogStatsError {
  constructor() {
    super(OplogStatsErrorCode.NO_RESUME_POINT, 'oplog is empty, no position to resume after')
    this.name = 'NoResumePointError'
  }
}

export class SourceUnavailableError extends OplogStatsError {
  constructor(message: string, options?: { cause?: Error }) {
    super(OplogStatsErrorCode.SOURCE_UNAVAILABLE, message, options)
    this.name = 'SourceUnavailableError'
  }
}

export class StreamBrokenError extends OplogStatsError {
  constructor(message: string, options?: { cause?: Error }) {
    super(OplogStatsErrorCode.STREAM_BROKEN, message, options)
    this.name = 'StreamBrokenError'
  }
}

/**
 * Thrown when the raw series an oplog entry pointed at is gone by the time
 * it is loaded.
 */
export class NotFoundError extends OplogStatsError {
  readonly entityId: string

  constructor(entityId: string) {
    super(OplogStatsErrorCode.NOT_FOUND, `raw series ${entityId} not found`)
    this.name = 'NotFoundError'
    this.entityId = entityId
  }
}

export class InvalidSeriesError extends OplogStatsError {
  readonly entityId: string

  constructor(entityId: string, message: string) {
    super(OplogStatsErrorCode.INVALID_SERIES, `raw series ${entityId}: ${message}`)
    this.name = 'InvalidSeriesError'
    this.entityId = entityId
  }
}

export class PersistFailedError extends OplogStatsError {
  readonly key: string
  readonly at: number

  constructor(key: string, at: number, options?: { cause?: Error }) {
    const reason = options?.cause ? `: ${options.cause.message}` : ''
    super(OplogStatsErrorCode.PERSIST_FAILED, `summary upsert failed for ${key}@${at}${reason}`, options)
    this.name = 'PersistFailedError'
    this.key = key
    this.at = at
  }
}

export class InvalidConfigError extends OplogStatsError {
  constructor(message: string) {
    super(OplogStatsErrorCode.INVALID_CONFIG, message)
    this.name = 'InvalidConfigError'
  }
}
