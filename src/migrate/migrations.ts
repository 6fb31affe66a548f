/**
 * Schema migrations, applied in order. Append only: an applied migration is
 * recorded by name and never runs again, so editing one has no effect on
 * databases that already ran it.
 */

export type Migration = {
  name: string
  statements: string[]
}

export const migrations: Migration[] = [
  {
    name: '0001_create_blog_posts',
    statements: [
      `CREATE TABLE blog_posts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        title TEXT NOT NULL CONSTRAINT title_length CHECK (length(title) BETWEEN 1 AND 200),
        content TEXT NOT NULL CONSTRAINT content_not_empty CHECK (length(content) >= 1),
        created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
      )`,
    ],
  },
]
