#!/usr/bin/env node

/**
 * blogpost server
 *
 * Usage:
 *   blogpost [--config <path>]
 *
 * Reads blogpost.config.json from the working directory (or the file named
 * by --config / BLOGPOST_CONFIG), applies env overrides, opens the database,
 * applies pending migrations, and serves the API until SIGINT or SIGTERM.
 */

import type { FastifyInstance } from 'fastify'
import type { Logger } from 'pino'
import { loadConfig } from '../src/core/configLoader'
import { connect } from '../src/connect'
import { buildApp } from '../src/fastify/app'
import { createLogger } from '../src/logger'

// --------------------------------------------------------------- Helpers --

const usage = () => {
  console.log(`
  blogpost — blog post API server

  Usage:
    blogpost [options]

  Options:
    --config <path>   Path to a JSON config file (default: blogpost.config.json)
    --help            Show this help message

  Environment:
    BLOGPOST_CONFIG   Config file path (same as --config)
    DATABASE_URL      SQLite file path, or :memory:
    HOST, PORT        Listen address
    LOG_LEVEL         fatal | error | warn | info | debug | trace | silent
`)
}

/**
 * Parse CLI arguments.
 */
const parseArgs = (argv: string[]) => {
  const args = argv.slice(2)

  const configIdx = args.indexOf('--config')
  const configArg = args[configIdx + 1]
  const configPath = configIdx !== -1 && configArg ? configArg : undefined

  const help = args.includes('--help') || args.includes('-h')

  return { configPath, help }
}

const onShutdown = (app: FastifyInstance, logger: Logger) => {
  let closing = false

  return (signal: NodeJS.Signals) => {
    if (closing) return
    closing = true
    logger.info({ signal }, 'shutting down')

    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'shutdown failed')
        process.exit(1)
      }
    )
  }
}

// ---------------------------------------------------------------- Main --

// Replaced once config is loaded; config errors are logged at the default level.
let logger: Logger = createLogger('info')

const main = async () => {
  const { configPath, help } = parseArgs(process.argv)

  if (help) {
    usage()
    process.exit(0)
  }

  const config = loadConfig({ configPath })
  logger = createLogger(config.logLevel)

  const db = connect({ url: config.database.url })
  logger.info({ database: config.database.url }, 'database ready')

  const app = await buildApp({ db, logger })

  try {
    await app.listen({ host: config.server.host, port: config.server.port })
  } catch (err) {
    await app.close()
    throw err
  }

  const shutdown = onShutdown(app, logger)
  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
}

main().catch((err: unknown) => {
  logger.fatal({ err }, 'failed to start')
  process.exit(1)
})
