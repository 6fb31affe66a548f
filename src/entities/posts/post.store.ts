/**
 * The post store: the only component that reads or writes `blog_posts`.
 *
 * @example
 * const posts = createPostStore(db.drizzle)
 * const post = await posts.create({ title: 'Hello', content: 'First post' })
 * const all = await posts.findAll()
 */

import { asc } from 'drizzle-orm'
import type { Database, FindOptions } from '../../core/types'
import { StoreError } from '../../core/errors'
import { translateConstraintError } from '../../core/constraints'
import {
  postsTable,
  postSchemas,
  postConstraints,
  type Post,
  type PostInput,
  type PostSchemas,
} from './post.schema'

const NO_LIMIT = Number.MAX_SAFE_INTEGER

export type CreateOptions = {
  /** Skip runtime schema validation; the database constraints still apply. Default: false. */
  force?: boolean
}

export type PostStore = {
  schemas: PostSchemas
  findAll: (opts?: FindOptions) => Promise<Post[]>
  create: (input: PostInput, opts?: CreateOptions) => Promise<Post>
}

export const createPostStore = (db: Database): PostStore => {
  /**
   * All posts in insertion order.
   */
  const findAll = async (opts: FindOptions = {}): Promise<Post[]> => {
    let q = db.select().from(postsTable).orderBy(asc(postsTable.id)).$dynamic()

    // SQLite rejects OFFSET without LIMIT.
    if (opts.limit !== undefined || opts.offset !== undefined) q = q.limit(opts.limit ?? NO_LIMIT)
    if (opts.offset !== undefined) q = q.offset(opts.offset)

    return q
  }

  /**
   * Insert one post and return it with its assigned `id` and `createdAt`.
   *
   * @throws ValidationError if the input fails the insert schema or a table constraint
   */
  const create = async (input: PostInput, opts: CreateOptions = {}): Promise<Post> => {
    const { createdAt, ...values } = opts.force ? input : postSchemas.insert.validate(input)

    let rows: Post[]
    try {
      rows = await db
        .insert(postsTable)
        .values(createdAt === undefined ? values : { ...values, createdAt })
        .returning()
    } catch (err) {
      throw translateConstraintError(err, postConstraints) ?? err
    }

    const row = rows[0]
    if (!row) {
      throw new StoreError(
        "create(): INSERT into 'blog_posts' succeeded but returned no rows."
      )
    }

    return row
  }

  return {
    schemas: postSchemas,
    findAll,
    create,
  }
}
