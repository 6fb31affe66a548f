import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { eq } from 'drizzle-orm'
import { connect } from '../../../connect'
import { ValidationError } from '../../../core/errors'
import type { BlogpostInstance } from '../../../core/types'
import type { PostStore } from '../post.store'
import { postsTable } from '../post.schema'

const ISO_UTC = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/

let db: BlogpostInstance
let posts: PostStore

beforeEach(() => {
  db = connect({ url: ':memory:' })
  posts = db.stores.posts
})

afterEach(async () => {
  await db.disconnect()
})

describe('create', () => {
  it('assigns an id and a createdAt', async () => {
    const post = await posts.create({ title: 'My First Blog Post', content: 'This is the content...' })

    expect(post.id).toBe(1)
    expect(post.title).toBe('My First Blog Post')
    expect(post.content).toBe('This is the content...')
    expect(post.createdAt).toMatch(ISO_UTC)
  })

  it('defaults createdAt to the insert time', async () => {
    const post = await posts.create({ title: 'Now', content: 'Timestamped by the store' })
    expect(Math.abs(Date.parse(post.createdAt) - Date.now())).toBeLessThan(5000)
  })

  it('assigns a new id to every post', async () => {
    const first = await posts.create({ title: 'One', content: 'a' })
    const second = await posts.create({ title: 'Two', content: 'b' })
    expect(second.id).toBe(first.id + 1)
  })

  it('never reuses an id, even after a row is deleted', async () => {
    await posts.create({ title: 'One', content: 'a' })
    const second = await posts.create({ title: 'Two', content: 'b' })
    db.drizzle.delete(postsTable).where(eq(postsTable.id, second.id)).run()

    const third = await posts.create({ title: 'Three', content: 'c' })
    expect(third.id).toBe(3)
  })

  it('keeps a client-supplied createdAt, normalized to UTC', async () => {
    const post = await posts.create({ title: 'Dated', content: 'x', createdAt: '2024-01-15T12:30:00Z' })
    expect(post.createdAt).toBe('2024-01-15T12:30:00.000Z')
  })

  it('ignores a client-supplied id', async () => {
    const input = { id: 99, title: 'Mine', content: 'x' }
    const post = await posts.create(input)
    expect(post.id).toBe(1)
  })

  it('rejects a title longer than 200 characters and writes nothing', async () => {
    await expect(posts.create({ title: 'a'.repeat(201), content: 'x' })).rejects.toThrow(ValidationError)
    expect(await posts.findAll()).toEqual([])
  })

  it('counts title length in characters, not UTF-16 units', async () => {
    const post = await posts.create({ title: '😀'.repeat(200), content: 'x' })
    expect(post.title).toBe('😀'.repeat(200))

    await expect(posts.create({ title: '😀'.repeat(201), content: 'x' })).rejects.toThrow(
      'Validation failed: Title must be at most 200 characters'
    )
    expect(await posts.findAll()).toHaveLength(1)
  })

  it('rejects empty content and writes nothing', async () => {
    await expect(posts.create({ title: 'Empty', content: '' })).rejects.toThrow(
      'Validation failed: Content cannot be empty'
    )
    expect(await posts.findAll()).toEqual([])
  })
})

describe('create with force', () => {
  it('lets the table constraints reject an empty title', async () => {
    const result = posts.create({ title: '', content: 'x' }, { force: true })

    await expect(result).rejects.toThrow(ValidationError)
    await expect(result).rejects.toMatchObject({
      errors: [{ field: 'title', message: 'Title must be between 1 and 200 characters' }],
    })
    expect(await posts.findAll()).toEqual([])
  })

  it('lets the table constraints reject an over-long title', async () => {
    await expect(
      posts.create({ title: 'a'.repeat(201), content: 'x' }, { force: true })
    ).rejects.toMatchObject({
      errors: [{ field: 'title', message: 'Title must be between 1 and 200 characters' }],
    })
  })

  it('lets the table constraints reject empty content', async () => {
    await expect(
      posts.create({ title: 'Empty', content: '' }, { force: true })
    ).rejects.toMatchObject({
      errors: [{ field: 'content', message: 'Content cannot be empty' }],
    })
  })
})

describe('findAll', () => {
  it('returns an empty array when there are no posts', async () => {
    expect(await posts.findAll()).toEqual([])
  })

  it('returns every inserted post, in insertion order', async () => {
    const created = [
      await posts.create({ title: 'First', content: 'one', createdAt: '2024-01-01T00:00:00.000Z' }),
      await posts.create({ title: 'Second', content: 'two', createdAt: '2024-01-02T00:00:00.000Z' }),
      await posts.create({ title: 'Third', content: 'three' }),
    ]

    const all = await posts.findAll()
    expect(all).toHaveLength(3)
    expect(all).toEqual(created)
    expect(all[0]).toEqual({
      id: 1,
      title: 'First',
      content: 'one',
      createdAt: '2024-01-01T00:00:00.000Z',
    })
  })

  it('supports limit and offset', async () => {
    for (const title of ['a', 'b', 'c']) {
      await posts.create({ title, content: title })
    }

    expect((await posts.findAll({ limit: 2 })).map(p => p.title)).toEqual(['a', 'b'])
    expect((await posts.findAll({ offset: 1 })).map(p => p.title)).toEqual(['b', 'c'])
    expect((await posts.findAll({ limit: 1, offset: 1 })).map(p => p.title)).toEqual(['b'])
  })
})

describe('schemas', () => {
  it('exposes the insert and select runtime schemas', () => {
    expect(posts.schemas.insert.toJsonSchema().required).toEqual(['title', 'content'])
    expect(posts.schemas.select.toJsonSchema().required).toEqual(['id', 'title', 'content', 'createdAt'])
  })
})
