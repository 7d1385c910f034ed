#!/usr/bin/env node
/**
 * oplog-stats CLI Entry Point
 *
 * Usage:
 *   oplog-stats [run|tail] [options]
 *
 * Any pipeline halt exits with status 1 after printing the failing stage and
 * its cause.
 *
 * @module cli
 */

import { MongoClient } from 'mongodb'
import { version } from '../../package.json'
import { loadConfig, type Config } from '../config'
import { toError } from '../errors'
import { createLogger, type Logger } from '../logging/logger'
import { MongoOplogSource } from '../oplog/mongo-source'
import { TailPipeline } from '../pipeline/tail-pipeline'
import { MongoEntityStore, MongoSummaryStore } from '../store/mongo-store'
import { parseArgs, printHelp, requestedLogLevel, validateOptions, type CLIOptions } from './options'
import { describeHalt } from './report'
import { printOplog } from './tail'

// ============================================================================
// ANSI Color Codes (no external dependencies)
// ============================================================================

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
}

function supportsColor(): boolean {
  if (process.env.NO_COLOR !== undefined) {
    return false
  }
  if (process.env.FORCE_COLOR !== undefined) {
    return true
  }
  return process.stderr.isTTY ?? false
}

const useColors = supportsColor()

function colorize(text: string, color: keyof typeof colors): string {
  if (!useColors) return text
  return `${colors[color]}${text}${colors.reset}`
}

// ============================================================================
// Output Functions
// ============================================================================

function printError(message: string): void {
  console.error(`${colorize('error:', 'red')} ${message}`)
}

// ============================================================================
// Commands
// ============================================================================

async function runPipeline(client: MongoClient, config: Config, logger: Logger, signal: AbortSignal): Promise<number> {
  const pipeline = new TailPipeline({
    source: MongoOplogSource.fromClient(client),
    entities: MongoEntityStore.fromClient(client),
    summaries: MongoSummaryStore.fromClient(client),
    onNotFound: config.onNotFound,
    logger: logger.child('pipeline'),
    signal,
  })

  const outcome = await pipeline.run()
  if (outcome.status === 'halted') {
    printError(describeHalt(outcome))
    return 1
  }
  logger.info(`stopped after ${outcome.stats.recomputed} recomputes`)
  return 0
}

async function runTail(client: MongoClient, signal: AbortSignal): Promise<number> {
  await printOplog(MongoOplogSource.fromClient(client), {
    write: (line) => console.log(line),
    signal,
  })
  return 0
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<number> {
  const options: CLIOptions = parseArgs(process.argv.slice(2))

  if (options.version) {
    console.log(`oplog-stats version ${version}`)
    return 0
  }
  if (options.help) {
    printHelp()
    return 0
  }

  let config: Config
  try {
    validateOptions(options)
    config = loadConfig(process.env, {
      mongoUrl: options.mongoUrl,
      logLevel: requestedLogLevel(options),
      onNotFound: options.skipMissing ? 'skip' : undefined,
    })
  } catch (error) {
    printError(toError(error).message)
    console.error(`Run ${colorize('oplog-stats --help', 'cyan')} for usage information.`)
    return 1
  }

  const logger = createLogger({ level: config.logLevel, scope: 'oplog-stats' })
  const controller = new AbortController()
  const shutdown = (signal: string): void => {
    logger.info(`received ${signal}, shutting down`)
    controller.abort()
  }
  process.once('SIGINT', () => shutdown('SIGINT'))
  process.once('SIGTERM', () => shutdown('SIGTERM'))

  const client = new MongoClient(config.mongoUrl)
  try {
    await client.connect()
    logger.debug('connected')
    return options.command === 'tail'
      ? await runTail(client, controller.signal)
      : await runPipeline(client, config, logger, controller.signal)
  } finally {
    await client.close()
  }
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    printError(toError(error).message)
    process.exit(1)
  }
)
