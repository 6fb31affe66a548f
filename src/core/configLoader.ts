/**
 * @module configLoader
 *
 * Loads the service configuration. Sources, later winning:
 *
 * 1. Defaults (`DEFAULT_CONFIG`)
 * 2. A JSON config file:
 *    - `configPath` option, else the `BLOGPOST_CONFIG` env var (must exist)
 *    - else `blogpost.config.json` in the working directory, if present
 * 3. Env vars: `DATABASE_URL`, `HOST`, `PORT`, `LOG_LEVEL`
 *
 * The merged result is validated; every bad field is reported in one
 * ConfigError.
 */

import { existsSync, readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { z } from 'zod'
import type { BlogpostConfig } from './types'
import { LOG_LEVELS } from './types'
import { ConfigError } from './errors'
import { zodErrorToFieldErrors } from './runtimeSchema'
import { DEFAULT_CONFIG } from '../config'

export const CONFIG_FILENAME = 'blogpost.config.json'

// ------------------------------------------------------------- Schemas --

const configSchema = z.object({
  database: z.object({
    url: z.string().min(1, 'must not be empty'),
  }),
  server: z.object({
    host: z.string().min(1, 'must not be empty'),
    port: z.number().int().min(0).max(65535),
  }),
  logLevel: z.enum(LOG_LEVELS),
})

/** A config file may set any subset of fields. */
const fileSchema = z.object({
  database: z.object({ url: z.unknown() }).partial().strict().optional(),
  server: z.object({ host: z.unknown(), port: z.unknown() }).partial().strict().optional(),
  logLevel: z.unknown().optional(),
}).strict()

type FileConfig = z.infer<typeof fileSchema>

export type LoadConfigOptions = {
  /** Explicit config file path (overrides `BLOGPOST_CONFIG`). */
  configPath?: string
  /** Directory relative paths resolve against. Default: `process.cwd()`. */
  cwd?: string
  /** Environment to read overrides from. Default: `process.env`. */
  env?: NodeJS.ProcessEnv
}

// ---------------------------------------------------- Path Resolution --

/**
 * Resolve the config file path, or undefined when none applies.
 * An explicitly named file must exist; the default file is optional.
 */
export const resolveConfigPath = (options: LoadConfigOptions = {}): string | undefined => {
  const cwd = options.cwd ?? process.cwd()
  const env = options.env ?? process.env
  const explicit = options.configPath ?? env.BLOGPOST_CONFIG

  if (explicit) {
    const abs = resolve(cwd, explicit)
    if (!existsSync(abs)) {
      throw new ConfigError(`Config file not found: '${abs}'`)
    }
    return abs
  }

  const candidate = resolve(cwd, CONFIG_FILENAME)
  return existsSync(candidate) ? candidate : undefined
}

// -------------------------------------------------------------- Helpers --

const formatIssues = (error: z.ZodError): string =>
  zodErrorToFieldErrors(error)
    .map(({ field, message }) => `${field}: ${message}`)
    .join('; ')

const readConfigFile = (abs: string): FileConfig => {
  let raw: unknown
  try {
    raw = JSON.parse(readFileSync(abs, 'utf8'))
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    throw new ConfigError(`Failed to load config from '${abs}': ${msg}`)
  }

  const result = fileSchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigError(`Invalid config file '${abs}': ${formatIssues(result.error)}`)
  }

  return result.data
}

/**
 * Env values are strings; PORT becomes a number (NaN fails validation).
 * A blank PORT counts as unset.
 */
const readEnv = (env: NodeJS.ProcessEnv) => {
  const port = env.PORT?.trim()

  return {
    url: env.DATABASE_URL || undefined,
    host: env.HOST || undefined,
    port: port ? Number(port) : undefined,
    logLevel: env.LOG_LEVEL || undefined,
  }
}

// -------------------------------------------------------- Public API --

/**
 * Load and validate the configuration.
 *
 * @throws ConfigError if a named config file is missing or unreadable, or
 *   the merged config is invalid
 */
export const loadConfig = (options: LoadConfigOptions = {}): BlogpostConfig => {
  const env = options.env ?? process.env
  const path = resolveConfigPath(options)
  const file: FileConfig = path ? readConfigFile(path) : {}
  const fromEnv = readEnv(env)

  const merged = {
    database: {
      url: fromEnv.url ?? file.database?.url ?? DEFAULT_CONFIG.database.url,
    },
    server: {
      host: fromEnv.host ?? file.server?.host ?? DEFAULT_CONFIG.server.host,
      port: fromEnv.port ?? file.server?.port ?? DEFAULT_CONFIG.server.port,
    },
    logLevel: fromEnv.logLevel ?? file.logLevel ?? DEFAULT_CONFIG.logLevel,
  }

  const result = configSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(result.error)}`)
  }

  return result.data
}
