/**
 * Builds the Fastify application around a connected instance.
 *
 * The instance's stores are decorated onto Fastify so routes reach them via
 * `fastify.stores`; closing the app disconnects the database.
 *
 * @example
 * const db = connect({ url: ':memory:' })
 * const app = await buildApp({ db })
 * const res = await app.inject({ method: 'GET', url: '/posts' })
 * await app.close()
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify'
import type { BlogpostInstance } from '../core/types'
import { errorHandler } from './errorHandler'
import { postRoutes } from './routes/posts'
import './types'

export type AppOptions = {
  db: BlogpostInstance
  /** Logger for requests and errors. Omit for a silent app. */
  logger?: FastifyBaseLogger
}

// Bodies are checked as sent: a number or an array is not a string.
const ajv = { customOptions: { coerceTypes: false } }

export const buildApp = async ({ db, logger }: AppOptions): Promise<FastifyInstance> => {
  const fastify: FastifyInstance = logger
    ? Fastify({ loggerInstance: logger, ajv })
    : Fastify({ logger: false, ajv })

  fastify.decorate('stores', db.stores)
  fastify.setErrorHandler(errorHandler)
  fastify.addHook('onClose', async () => {
    await db.disconnect()
  })

  await fastify.register(postRoutes)

  return fastify
}
