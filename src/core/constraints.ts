/**
 * @module constraints
 *
 * Translates SQLite constraint failures into `ValidationError`s. The schema's
 * CHECK and NOT NULL constraints are the last line of input validation; when
 * one fires, callers get the same error type the runtime schema throws.
 *
 * SQLite reports failures as:
 * - `CHECK constraint failed: <constraint_name>`
 * - `NOT NULL constraint failed: <table>.<column>`
 */

import type { FieldError } from './types'
import { ValidationError } from './errors'

/** Map of constraint name (CHECK) or `table.column` (NOT NULL) to the error to report. */
export type ConstraintMap = Record<string, FieldError>

type SqliteFailure = { code: string; message: string }

const FAILURE_PATTERN = /^(?:CHECK|NOT NULL) constraint failed: (.+)$/

/** Drivers and query builders may wrap the driver error; follow `cause` a few levels. */
const MAX_CAUSE_DEPTH = 5

/**
 * Find the underlying SQLite constraint error, if any, in an error's cause chain.
 */
export const findConstraintFailure = (err: unknown): SqliteFailure | null => {
  let current: unknown = err

  for (let depth = 0; depth < MAX_CAUSE_DEPTH && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string' && current.code.startsWith('SQLITE_CONSTRAINT')) {
      return { code: current.code, message: current.message }
    }
    current = current.cause
  }

  return null
}

/**
 * Translate a SQLite constraint failure into a ValidationError.
 * Returns null when `err` is not a constraint failure, so the caller can rethrow it.
 */
export const translateConstraintError = (
  err: unknown,
  constraints: ConstraintMap
): ValidationError | null => {
  const failure = findConstraintFailure(err)
  if (!failure) return null

  const name = FAILURE_PATTERN.exec(failure.message)?.[1]
  const known = name !== undefined ? constraints[name] : undefined

  return new ValidationError([
    known ?? { field: 'unknown', message: failure.message },
  ])
}
