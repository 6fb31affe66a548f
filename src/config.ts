/**
 * blogpost — Configuration
 *
 * Provides `defineConfig()` for typed config objects and the defaults that
 * `loadConfig()` starts from.
 *
 * @example
 * import { defineConfig } from 'blogpost'
 *
 * export default defineConfig({
 *   database: { url: './data/blog.db' },
 *   server: { host: '0.0.0.0', port: 8080 },
 *   logLevel: 'debug',
 * })
 */

import type { BlogpostConfig } from './core/types'

/**
 * Identity function: returns the config as-is, with full type checking.
 */
export const defineConfig = (config: BlogpostConfig): BlogpostConfig => config

export const DEFAULT_CONFIG = defineConfig({
  database: { url: './blog.db' },
  server: { host: '127.0.0.1', port: 3000 },
  logLevel: 'info',
})
