import type { Stores } from '../core/types'

declare module 'fastify' {
  interface FastifyInstance {
    stores: Stores
  }
}
