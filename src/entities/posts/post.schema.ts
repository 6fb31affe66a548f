/**
 * The blog post entity: Drizzle table, runtime schemas, and the constraint
 * names the database reports when a write violates the schema.
 *
 * The DDL for this table lives in the migration list (`src/migrate/migrations.ts`);
 * the column names and CHECK constraint names here must match it.
 */

import { sql } from 'drizzle-orm'
import { integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'
import { z } from 'zod'
import { buildJsonSchema, createRuntimeSchema } from '../../core/runtimeSchema'
import type { ConstraintMap } from '../../core/constraints'

export const TITLE_MAX_LENGTH = 200

/** ISO-8601 UTC with millisecond precision, e.g. 2024-05-01T09:30:00.000Z */
export const NOW_ISO = sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`

export const postsTable = sqliteTable('blog_posts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title', { length: TITLE_MAX_LENGTH }).notNull(),
  content: text('content').notNull(),
  createdAt: text('created_at').notNull().default(NOW_ISO),
})

export type Post = typeof postsTable.$inferSelect

// ------------------------------------------------------------ Schemas --

/** Characters as Ajv `maxLength` and SQLite `length()` count them. */
const codePoints = (value: string) => [...value].length

const insertZod = z.object({
  title: z
    .string({ required_error: 'Title is required', invalid_type_error: 'Title must be a string' })
    .min(1, 'Title cannot be empty')
    .refine(value => codePoints(value) <= TITLE_MAX_LENGTH, {
      message: `Title must be at most ${TITLE_MAX_LENGTH} characters`,
    }),
  content: z
    .string({ required_error: 'Content is required', invalid_type_error: 'Content must be a string' })
    .min(1, 'Content cannot be empty'),
  createdAt: z
    .string({ invalid_type_error: 'createdAt must be a string' })
    .datetime({ offset: true, message: 'createdAt must be an ISO-8601 date-time' })
    .transform(value => new Date(value).toISOString())
    .optional(),
})

const selectZod = z.object({
  id: z.number().int(),
  title: z.string(),
  content: z.string(),
  createdAt: z.string(),
})

/** What callers may pass to `create()`. */
export type PostInput = z.input<typeof insertZod>

/** Validated insert values: unknown keys dropped, `createdAt` normalized. */
export type PostValues = z.output<typeof insertZod>

export const postSchemas = {
  insert: createRuntimeSchema(insertZod, opts =>
    buildJsonSchema(
      {
        title: { type: 'string', minLength: 1, maxLength: TITLE_MAX_LENGTH },
        content: { type: 'string', minLength: 1 },
        createdAt: { type: 'string', format: 'date-time' },
      },
      ['title', 'content'],
      opts
    )
  ),
  select: createRuntimeSchema(selectZod, opts =>
    buildJsonSchema(
      {
        id: { type: 'integer' },
        title: { type: 'string' },
        content: { type: 'string' },
        createdAt: { type: 'string', format: 'date-time' },
      },
      ['id', 'title', 'content', 'createdAt'],
      opts
    )
  ),
}

export type PostSchemas = typeof postSchemas

// -------------------------------------------------------- Constraints --

export const postConstraints: ConstraintMap = {
  title_length: { field: 'title', message: `Title must be between 1 and ${TITLE_MAX_LENGTH} characters` },
  content_not_empty: { field: 'content', message: 'Content cannot be empty' },
  'blog_posts.title': { field: 'title', message: 'Title is required' },
  'blog_posts.content': { field: 'content', message: 'Content is required' },
  'blog_posts.created_at': { field: 'createdAt', message: 'createdAt cannot be null' },
}
