/**
 * @module connect
 *
 * Opens the SQLite database, wraps it in Drizzle, applies pending
 * migrations, and builds the stores. The returned instance owns the
 * connection: nothing else opens or closes it.
 */

import Database from 'better-sqlite3'
import { drizzle } from 'drizzle-orm/better-sqlite3'
import type { BlogpostInstance, ConnectConfig } from './core/types'
import { ConfigError, StoreError } from './core/errors'
import { migrate } from './migrate/commands'
import { createPostStore } from './entities/posts/post.store'

const MEMORY_URL = ':memory:'

const messageOf = (err: unknown): string =>
  err instanceof Error ? err.message : String(err)

/**
 * Open the SQLite file. File databases use WAL so readers never wait on
 * the single writer.
 */
const openDatabase = (url: string): Database.Database => {
  let sqlite: Database.Database
  try {
    sqlite = new Database(url)
  } catch (err) {
    throw new StoreError(`Failed to open database at '${url}': ${messageOf(err)}`, { cause: err })
  }

  if (url !== MEMORY_URL) {
    sqlite.pragma('journal_mode = WAL')
  }

  return sqlite
}

// -------------------------------------------------------- Public API --

/**
 * Connect to the database and build the stores.
 *
 * @throws ConfigError if `url` is missing
 * @throws StoreError if the database cannot be opened or migrated
 *
 * @example
 * const db = connect({ url: './blog.db' })
 * await db.stores.posts.create({ title: 'Hello', content: '...' })
 * await db.disconnect()
 *
 * @example
 * // In-memory, for tests
 * const db = connect({ url: ':memory:' })
 */
export const connect = (config: ConnectConfig): BlogpostInstance => {
  if (!config.url) {
    throw new ConfigError('`url` is required in connection config')
  }

  const sqlite = openDatabase(config.url)
  const db = drizzle(sqlite)

  if (config.migrate !== false) {
    try {
      migrate(db)
    } catch (err) {
      sqlite.close()
      throw new StoreError(`Failed to migrate database at '${config.url}': ${messageOf(err)}`, { cause: err })
    }
  }

  let disconnected = false
  const disconnect = async () => {
    if (disconnected) return
    disconnected = true
    sqlite.close()
  }

  return {
    drizzle: db,
    stores: {
      posts: createPostStore(db),
    },
    disconnect,
  }
}
