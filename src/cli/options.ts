/**
 * CLI Options Module
 *
 * Argument parsing and help output for the oplog-stats command.
 *
 * @module cli/options
 *
 * @example
 * ```typescript
 * import { parseArgs, validateOptions, printHelp } from './options'
 *
 * const options = parseArgs(process.argv.slice(2))
 * if (options.help) {
 *   printHelp()
 *   process.exit(0)
 * }
 * validateOptions(options)
 * ```
 */

import { isLogLevel } from '../config'
import type { LogLevel } from '../logging/logger'

// ============================================================================
// Types
// ============================================================================

/**
 * `run` maintains summaries; `tail` prints the raw oplog.
 */
export type CLICommand = 'run' | 'tail'

export interface CLIOptions {
  command: CLICommand
  /** Connection string; falls back to MONGO_URL */
  mongoUrl?: string
  /** Explicit log level; falls back to LOG_LEVEL */
  logLevel?: string
  /** Shorthand for --log-level=debug */
  verbose: boolean
  /** Skip ids whose raw series vanished instead of halting */
  skipMissing: boolean
  help: boolean
  version: boolean
  /** Arguments that were not recognised */
  unknown: string[]
}

// ============================================================================
// Argument Parsing
// ============================================================================

/**
 * Parse command-line arguments into a CLIOptions object.
 *
 * @param args - Typically process.argv.slice(2)
 *
 * @example
 * ```typescript
 * const options = parseArgs(['tail', '--mongo-url', 'mongodb://db:27017'])
 * // options.command === 'tail'
 * // options.mongoUrl === 'mongodb://db:27017'
 * ```
 */
export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'run',
    verbose: false,
    skipMissing: false,
    help: false,
    version: false,
    unknown: [],
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]

    if (arg === 'run' || arg === 'tail') {
      options.command = arg
      continue
    }

    if (arg === '--help' || arg === '-h') {
      options.help = true
      continue
    }

    if (arg === '--version' || arg === '-V') {
      options.version = true
      continue
    }

    if (arg === '--verbose' || arg === '-v') {
      options.verbose = true
      continue
    }

    if (arg === '--skip-missing') {
      options.skipMissing = true
      continue
    }

    if (arg.startsWith('--mongo-url=')) {
      options.mongoUrl = arg.slice('--mongo-url='.length)
      continue
    }
    if (arg === '--mongo-url' || arg === '-u') {
      const nextArg = args[++i]
      if (nextArg) {
        options.mongoUrl = nextArg
      }
      continue
    }

    if (arg.startsWith('--log-level=')) {
      options.logLevel = arg.slice('--log-level='.length)
      continue
    }
    if (arg === '--log-level') {
      const nextArg = args[++i]
      if (nextArg) {
        options.logLevel = nextArg
      }
      continue
    }

    options.unknown.push(arg)
  }

  return options
}

// ============================================================================
// Option Validation
// ============================================================================

/**
 * Reject unknown arguments and log levels.
 *
 * @throws {Error} Describing the first problem found
 */
export function validateOptions(options: CLIOptions): void {
  if (options.unknown.length > 0) {
    throw new Error(`Unknown argument: ${options.unknown[0]}`)
  }

  if (options.logLevel !== undefined && !isLogLevel(options.logLevel)) {
    throw new Error(`Invalid log level: "${options.logLevel}". Expected one of debug, info, warn, error.`)
  }
}

/**
 * Log level requested on the command line, if any
 */
export function requestedLogLevel(options: CLIOptions): LogLevel | undefined {
  if (options.logLevel !== undefined && isLogLevel(options.logLevel)) {
    return options.logLevel
  }
  return options.verbose ? 'debug' : undefined
}

// ============================================================================
// Output Functions
// ============================================================================

export function printHelp(): void {
  console.log(`
Usage: oplog-stats [run|tail] [options]

Follow the MongoDB oplog and keep seven-number summaries of metrics.raw
up to date in metrics.summary.

Commands:
  run                   Maintain summaries (default)
  tail                  Print every oplog entry from the latest one on, as Extended JSON

Options:
  -u, --mongo-url <url> MongoDB connection string (env MONGO_URL, default: mongodb://localhost)
  --log-level <level>   debug, info, warn or error (env LOG_LEVEL, default: info)
  -v, --verbose         Same as --log-level=debug
  --skip-missing        Skip series deleted before they could be summarized (env ON_NOT_FOUND=skip)
  -V, --version         Print version and exit
  -h, --help            Show this help message

Examples:
  oplog-stats
  MONGO_URL=mongodb://db:27017/?replicaSet=rs0 oplog-stats --verbose
  oplog-stats tail --mongo-url mongodb://localhost:27017
`)
}
