/**
 * Configuration
 *
 * Environment variables are read once at startup and validated with zod.
 * Explicit overrides (command-line flags) win over the environment.
 *
 * | Variable       | Default               |
 * |----------------|-----------------------|
 * | MONGO_URL      | mongodb://localhost   |
 * | LOG_LEVEL      | info                  |
 * | ON_NOT_FOUND   | halt                  |
 */

import { z } from 'zod'
import { DEFAULT_MONGO_URL } from './constants'
import { InvalidConfigError } from './errors'
import { LOG_LEVELS, type LogLevel } from './logging/logger'

const MONGO_URL_PATTERN = /^mongodb(\+srv)?:\/\/.+/

export const configSchema = z.object({
  mongoUrl: z
    .string()
    .regex(MONGO_URL_PATTERN, 'must start with mongodb:// or mongodb+srv://')
    .default(DEFAULT_MONGO_URL),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  onNotFound: z.enum(['halt', 'skip']).default('halt'),
})

export type Config = z.infer<typeof configSchema>

export type NotFoundPolicy = Config['onNotFound']

export interface ConfigOverrides {
  mongoUrl?: string
  logLevel?: LogLevel
  onNotFound?: NotFoundPolicy
}

/**
 * Build the process configuration from environment variables and overrides
 *
 * @throws InvalidConfigError listing every invalid field
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: ConfigOverrides = {}
): Config {
  const input = {
    mongoUrl: overrides.mongoUrl ?? emptyToUndefined(env.MONGO_URL),
    logLevel: overrides.logLevel ?? emptyToUndefined(env.LOG_LEVEL)?.toLowerCase(),
    onNotFound: overrides.onNotFound ?? emptyToUndefined(env.ON_NOT_FOUND)?.toLowerCase(),
  }

  const result = configSchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new InvalidConfigError(`invalid configuration (${issues.join('; ')})`)
  }
  return result.data
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim()
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}
