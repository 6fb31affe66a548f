import { describe, it, expect } from 'vitest'
import { createLogger } from '../logger'
import { connect } from '../connect'
import { buildApp } from '../fastify/app'

describe('createLogger', () => {
  it('creates a logger at the requested level', () => {
    expect(createLogger('warn').level).toBe('warn')
    expect(createLogger('silent').level).toBe('silent')
  })

  it('is adopted by the Fastify app as its request logger', async () => {
    const logger = createLogger('silent')
    const app = await buildApp({ db: connect({ url: ':memory:' }), logger })

    expect(app.log.level).toBe('silent')
    const res = await app.inject({ method: 'GET', url: '/posts' })
    expect(res.statusCode).toBe(200)

    await app.close()
  })
})
