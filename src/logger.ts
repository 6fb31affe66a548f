import { pino, type Logger } from 'pino'
import type { LogLevel } from './core/types'

/**
 * The process logger. Fastify adopts it as its request logger, so request
 * lines and startup lines share one stream and one level.
 */
export const createLogger = (level: LogLevel): Logger =>
  pino({
    name: 'blogpost',
    level,
  })
