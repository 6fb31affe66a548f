/**
 * @module commands
 *
 * Applies the migration list to a live connection and reports its state.
 * Applied migrations are journaled in `_migrations`; each migration's
 * statements and its journal row commit in one transaction.
 *
 * @example
 * import { migrate, status } from 'blogpost'
 *
 * status(db.drizzle)    // { applied: [], pending: ['0001_create_blog_posts'] }
 * migrate(db.drizzle)   // { applied: ['0001_create_blog_posts'] }
 */

import { sql } from 'drizzle-orm'
import { sqliteTable, text } from 'drizzle-orm/sqlite-core'
import type { Database } from '../core/types'
import { NOW_ISO } from '../entities/posts/post.schema'
import { migrations as defaultMigrations, type Migration } from './migrations'

// --------------------------------------------------------------- Types --

type MigrationResult = {
  /** Names applied by this call, in order. */
  applied: string[]
}

type MigrationStatus = {
  applied: string[]
  pending: string[]
}

// ------------------------------------------------------------ Journal --

const journal = sqliteTable('_migrations', {
  name: text('name').primaryKey(),
  appliedAt: text('applied_at').notNull(),
})

const ensureJournal = (db: Database) => {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL
    )
  `)
}

const journalExists = (db: Database): boolean =>
  db.get<{ count: number }>(
    sql`SELECT count(*) AS count FROM sqlite_master WHERE type = 'table' AND name = '_migrations'`
  ).count > 0

const appliedNames = (db: Database): Set<string> =>
  new Set(db.select({ name: journal.name }).from(journal).all().map(row => row.name))

// --------------------------------------------------------- Public API --

/**
 * Apply every migration not yet recorded in the journal.
 * Idempotent: a second call applies nothing.
 *
 * @throws the driver's error if a statement fails; that migration is rolled back
 */
export const migrate = (
  db: Database,
  migrations: Migration[] = defaultMigrations
): MigrationResult => {
  ensureJournal(db)
  const done = appliedNames(db)
  const applied: string[] = []

  for (const migration of migrations) {
    if (done.has(migration.name)) continue

    db.transaction((tx) => {
      for (const statement of migration.statements) {
        tx.run(sql.raw(statement))
      }
      tx.insert(journal).values({ name: migration.name, appliedAt: NOW_ISO }).run()
    })

    applied.push(migration.name)
  }

  return { applied }
}

/**
 * Report applied and pending migrations. Read-only.
 */
export const status = (
  db: Database,
  migrations: Migration[] = defaultMigrations
): MigrationStatus => {
  const done = journalExists(db) ? appliedNames(db) : new Set<string>()

  return {
    applied: migrations.filter(m => done.has(m.name)).map(m => m.name),
    pending: migrations.filter(m => !done.has(m.name)).map(m => m.name),
  }
}
