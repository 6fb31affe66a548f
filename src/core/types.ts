/**
 * blogpost — Core Type Definitions
 *
 * Shared TypeScript types: runtime schema contracts, validation results,
 * configuration shapes, and the connection instance.
 */

import type { ZodType, ZodTypeDef } from 'zod'
import type { BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import type { PostStore } from '../entities/posts/post.store'

// --------------------------------------------------------- Runtime Schema --

/** A single validation error entry. */
export type FieldError = {
  field: string
  message: string
}

/** Result from `tryValidate()`, which never throws. */
export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldError[] }

/** JSON Schema options. */
export type JsonSchemaOptions = {
  additionalProperties?: boolean
}

/** A JSON Schema property definition (the subset the entities use). */
export type JsonSchemaProperty = {
  type: 'string' | 'integer' | 'number' | 'boolean'
  format?: 'date-time'
  minLength?: number
  maxLength?: number
}

/** A plain JSON Schema object. */
export type JsonSchema = {
  type: 'object'
  properties: Record<string, JsonSchemaProperty>
  required?: string[]
  additionalProperties?: boolean
}

/**
 * RuntimeSchema wraps a Zod schema and its JSON Schema counterpart.
 * `TInput` is what callers may pass; `T` is what validation returns.
 */
export type RuntimeSchema<T, TInput = T> = {
  /** Validate input. Throws `ValidationError` on failure. Returns typed data on success. */
  validate: (input: unknown) => T
  /** Validate input without throwing. */
  tryValidate: (input: unknown) => ValidationResult<T>
  /** Generate a JSON Schema object (for Fastify/Ajv). */
  toJsonSchema: (opts?: JsonSchemaOptions) => JsonSchema
  /** The underlying Zod schema for advanced composition. */
  zod: ZodType<T, ZodTypeDef, TInput>
}

// ----------------------------------------------------------- Find Options --

/** Options accepted by store read operations. */
export type FindOptions = {
  limit?: number
  offset?: number
}

// ---------------------------------------------------------------- Config --

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

/** Options for `connect()`. */
export type ConnectConfig = {
  /** SQLite file path, or ':memory:'. */
  url: string
  /** Apply pending migrations on connect. Default: true. */
  migrate?: boolean
}

/** Full configuration for the service. */
export type BlogpostConfig = {
  database: { url: string }
  server: { host: string; port: number }
  logLevel: LogLevel
}

// -------------------------------------------------------------- Instance --

export type Database = BetterSQLite3Database

/** The instance returned by `connect()`. */
export type BlogpostInstance = {
  /** Raw Drizzle instance (escape hatch). */
  drizzle: Database
  /** Live stores, one per entity. */
  stores: Stores
  /** Close the database connection. Safe to call more than once. */
  disconnect: () => Promise<void>
}

export type Stores = {
  posts: PostStore
}
