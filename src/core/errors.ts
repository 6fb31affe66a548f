/**
 * blogpost — Error Types
 *
 * ValidationError accumulates every field error before throwing, so callers
 * receive all problems in a single catch.
 */

import type { FieldError } from './types'

/**
 * Thrown when input validation fails, either by the runtime schema or by a
 * constraint the database schema enforces.
 *
 * @example
 * try {
 *   await posts.create({ title: '', content: 'x' })
 * } catch (err) {
 *   if (err instanceof ValidationError) {
 *     console.log(err.errors)
 *     // [{ field: 'title', message: 'Title cannot be empty' }]
 *   }
 * }
 */
export class ValidationError extends Error {
  readonly errors: FieldError[]

  constructor(errors: FieldError[]) {
    const count = errors.length
    const summary = count === 1 && errors[0]
      ? errors[0].message
      : `${count} validation error(s)`

    super(`Validation failed: ${summary}`)
    this.name = 'ValidationError'
    this.errors = errors
  }
}

/**
 * Thrown when configuration is invalid (bad port, unknown log level,
 * unreadable config file).
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when the database cannot be opened or migrated, or when a store
 * operation returns no row where one is required.
 */
export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'StoreError'
  }
}
