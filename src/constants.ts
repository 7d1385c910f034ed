/**
 * Fixed namespaces the pipeline reads and writes
 */

export const OPLOG_DB = 'local'
export const OPLOG_COLLECTION = 'oplog.rs'

export const METRICS_DB = 'metrics'
export const RAW_COLLECTION = 'raw'
export const SUMMARY_COLLECTION = 'summary'

/** Namespace whose inserts and updates trigger a recompute */
export const RAW_NAMESPACE = `${METRICS_DB}.${RAW_COLLECTION}`

export const DEFAULT_MONGO_URL = 'mongodb://localhost'
