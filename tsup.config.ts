import { defineConfig } from 'tsup'

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    blogpost: 'bin/blogpost.ts',
  },
  format: ['esm'],
  target: 'node20',
  dts: false,
  splitting: true,
  clean: true,
  outDir: 'dist',
  external: [
    // Native driver, never bundled
    'better-sqlite3',
    'drizzle-orm',
    'drizzle-orm/better-sqlite3',
    'drizzle-orm/sqlite-core',
    'fastify',
    'pino',
    'zod',
  ],
  treeshake: true,
})
