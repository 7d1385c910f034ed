/**
 * oplog-stats - seven-number summaries maintained from the MongoDB oplog
 *
 * Main entry point for the package.
 */

// Types
export type { OplogEntry, OplogOperation } from './types/oplog'
export { comparePositions, formatPosition } from './types/oplog'
export type { Datapoint, RawSeries, SevenNumberSummary } from './types/metrics'
export { datapointSchema, rawSeriesSchema } from './types/metrics'
export {
  OPLOG_DB,
  OPLOG_COLLECTION,
  METRICS_DB,
  RAW_COLLECTION,
  SUMMARY_COLLECTION,
  RAW_NAMESPACE,
  DEFAULT_MONGO_URL,
} from './constants'

// Errors
export {
  OplogStatsError,
  OplogStatsErrorCode,
  NoResumePointError,
  SourceUnavailableError,
  StreamBrokenError,
  NotFoundError,
  InvalidSeriesError,
  PersistFailedError,
  InvalidConfigError,
  isOplogStatsError,
} from './errors'
export type { OplogStatsErrorCodeType } from './errors'

// Configuration and logging
export { loadConfig, configSchema } from './config'
export type { Config, ConfigOverrides, NotFoundPolicy } from './config'
export { createLogger, silentLogger } from './logging/logger'
export type { Logger, LogLevel, LogSink, LoggerOptions } from './logging/logger'

// Oplog
export type { ChangeSource, TailQuery, TailOptions } from './oplog/source'
export { MongoOplogSource } from './oplog/mongo-source'
export type { OplogCollection, OplogCursor, MongoOplogSourceOptions } from './oplog/mongo-source'
export { resolveResumePosition } from './oplog/resume'
export { subscribe, buildOplogFilter, matchesTailQuery, WRITE_OPERATIONS } from './oplog/filter'
export type { SubscribeOptions } from './oplog/filter'
export { extractEntityId } from './oplog/extractor'
export type { ExtractResult, DropReason } from './oplog/extractor'

// Statistics
export { quantile, sortAscending } from './stats/quantile'
export { summarize, SUMMARY_PERCENTILES } from './stats/summary'
export { SummaryRecomputer } from './stats/recompute'

// Stores
export type { EntityStore, SummaryStore } from './store/types'
export { MongoEntityStore, MongoSummaryStore, parseRawSeries } from './store/mongo-store'
export type { RawSeriesCollection, SummaryCollection } from './store/mongo-store'

// Pipeline
export { Handoff, HandoffClosedError } from './pipeline/handoff'
export { TailPipeline } from './pipeline/tail-pipeline'
export type {
  PipelineOutcome,
  PipelineStage,
  PipelineStats,
  TailPipelineOptions,
} from './pipeline/tail-pipeline'
