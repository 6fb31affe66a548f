/**
 * blogpost — Main Entry Point
 *
 * Re-exports the public API: `connect` opens the database and builds the
 * stores, `buildApp` wraps them in a Fastify application.
 *
 * @example
 * import { connect, buildApp } from 'blogpost'
 * const db = connect({ url: './blog.db' })
 * const app = await buildApp({ db })
 * await app.listen({ port: 3000 })
 */

// ------------------------------------------------------------ Connection --

export { connect } from './connect'

// ------------------------------------------------------------------ HTTP --

export { buildApp } from './fastify/app'
export type { AppOptions } from './fastify/app'
export { postRoutes, POSTS_PATH } from './fastify/routes/posts'
export { errorHandler } from './fastify/errorHandler'

// ------------------------------------------------------- Configuration --

export { defineConfig, DEFAULT_CONFIG } from './config'
export { loadConfig, resolveConfigPath, CONFIG_FILENAME } from './core/configLoader'
export type { LoadConfigOptions } from './core/configLoader'
export { createLogger } from './logger'

// -------------------------------------------------------------- Entities --

export { createPostStore } from './entities/posts/post.store'
export type { PostStore, CreateOptions } from './entities/posts/post.store'
export { postsTable, postSchemas, TITLE_MAX_LENGTH } from './entities/posts/post.schema'
export type { Post, PostInput, PostValues } from './entities/posts/post.schema'

// ------------------------------------------------------------ Migrations --

export { migrate, status } from './migrate/commands'
export { migrations } from './migrate/migrations'
export type { Migration } from './migrate/migrations'

// ---------------------------------------------------------------- Errors --

export { ValidationError, ConfigError, StoreError } from './core/errors'

// ----------------------------------------------------------------- Types --

export type {
  BlogpostConfig,
  BlogpostInstance,
  ConnectConfig,
  Database,
  FieldError,
  FindOptions,
  JsonSchema,
  JsonSchemaOptions,
  LogLevel,
  RuntimeSchema,
  Stores,
  ValidationResult,
} from './core/types'
