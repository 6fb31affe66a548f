import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import type { FastifyInstance } from 'fastify'
import { connect } from '../../connect'
import { buildApp } from '../app'
import type { BlogpostInstance } from '../../core/types'

let db: BlogpostInstance
let app: FastifyInstance

const createPost = (payload: Record<string, unknown>) =>
  app.inject({ method: 'POST', url: '/posts', payload })

const listPosts = () => app.inject({ method: 'GET', url: '/posts' })

beforeEach(async () => {
  db = connect({ url: ':memory:' })
  app = await buildApp({ db })
})

afterEach(async () => {
  await app.close()
})

describe('GET /posts', () => {
  it('returns an empty array when there are no posts', async () => {
    const res = await listPosts()
    expect(res.statusCode).toBe(200)
    expect(res.json()).toEqual([])
  })

  it('returns posts in insertion order', async () => {
    await createPost({ title: 'First', content: 'one' })
    await createPost({ title: 'Second', content: 'two' })

    const res = await listPosts()
    expect(res.json().map((p: { title: string }) => p.title)).toEqual(['First', 'Second'])
  })
})

describe('POST /posts', () => {
  it('creates a post and lists it back', async () => {
    const res = await createPost({ title: 'My First Blog Post', content: 'This is the content...' })

    expect(res.statusCode).toBe(201)
    expect(res.headers.location).toBe('/posts?id=1')

    const created = res.json()
    expect(created.id).toBe(1)
    expect(created.title).toBe('My First Blog Post')
    expect(created.content).toBe('This is the content...')
    expect(created.createdAt).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/)

    const list = await listPosts()
    expect(list.json()).toEqual([created])
  })

  it('keeps a client-supplied createdAt', async () => {
    const res = await createPost({ title: 'Dated', content: 'x', createdAt: '2023-12-31T23:59:59Z' })
    expect(res.statusCode).toBe(201)
    expect(res.json().createdAt).toBe('2023-12-31T23:59:59.000Z')
  })

  it('ignores a client-supplied id', async () => {
    const res = await createPost({ id: 42, title: 'Mine', content: 'x' })
    expect(res.statusCode).toBe(201)
    expect(res.json().id).toBe(1)
  })

  it('rejects malformed JSON with 400', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/posts',
      headers: { 'content-type': 'application/json' },
      payload: '{"title": ',
    })

    expect(res.statusCode).toBe(400)
    expect(res.json().error).toBe('Bad Request')
  })

  it('rejects a missing title with 400', async () => {
    const res = await createPost({ content: 'No title' })

    expect(res.statusCode).toBe(400)
    expect(res.json().errors).toEqual([
      { field: 'title', message: "must have required property 'title'" },
    ])
  })

  it('rejects a title longer than 200 characters with 400', async () => {
    const res = await createPost({ title: 'a'.repeat(201), content: 'x' })

    expect(res.statusCode).toBe(400)
    expect(res.json().errors).toEqual([
      { field: 'title', message: 'must NOT have more than 200 characters' },
    ])
  })

  it('rejects empty content with 400', async () => {
    const res = await createPost({ title: 'Empty', content: '' })

    expect(res.statusCode).toBe(400)
    expect(res.json().errors[0].field).toBe('content')
  })

  it('rejects an invalid createdAt with 400', async () => {
    const res = await createPost({ title: 'Bad date', content: 'x', createdAt: 'not-a-date' })

    expect(res.statusCode).toBe(400)
    expect(res.json().errors[0].field).toBe('createdAt')
  })

  it('rejects a title or content of the wrong type without coercing it', async () => {
    const numeric = await createPost({ title: 123, content: true })
    expect(numeric.statusCode).toBe(400)
    expect(numeric.json().errors).toEqual([{ field: 'title', message: 'must be string' }])

    const array = await createPost({ title: ['x'], content: 'y' })
    expect(array.statusCode).toBe(400)
    expect(array.json().errors).toEqual([{ field: 'title', message: 'must be string' }])

    expect((await listPosts()).json()).toEqual([])
  })

  it('counts title length in characters, not UTF-16 units', async () => {
    const longest = await createPost({ title: '😀'.repeat(200), content: 'x' })
    expect(longest.statusCode).toBe(201)
    expect(longest.json().title).toBe('😀'.repeat(200))

    const tooLong = await createPost({ title: '😀'.repeat(201), content: 'x' })
    expect(tooLong.statusCode).toBe(400)
    expect(tooLong.json().errors).toEqual([
      { field: 'title', message: 'must NOT have more than 200 characters' },
    ])
  })

  it('writes nothing when the body is rejected', async () => {
    await createPost({ content: 'No title' })
    await createPost({ title: 'a'.repeat(201), content: 'x' })
    await createPost({ title: 'Empty', content: '' })

    expect((await listPosts()).json()).toEqual([])
  })

  it('rejects a non-JSON content type with 415', async () => {
    const res = await app.inject({
      method: 'POST',
      url: '/posts',
      headers: { 'content-type': 'application/xml' },
      payload: '<post><title>x</title></post>',
    })

    expect(res.statusCode).toBe(415)
    expect(res.json().error).toBe('Unsupported Media Type')
  })
})

describe('store failures', () => {
  it('responds 500 without leaking the driver error', async () => {
    await db.disconnect()

    const res = await listPosts()
    expect(res.statusCode).toBe(500)
    expect(res.json()).toEqual({
      statusCode: 500,
      error: 'Internal Server Error',
      message: 'Internal Server Error',
    })
  })
})
