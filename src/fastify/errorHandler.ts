/**
 * Maps errors to HTTP responses:
 *
 * - Ajv body validation (`error.validation`) → 400 with field errors
 * - `ValidationError` from a store → 400 with field errors
 * - Other client errors Fastify raises (malformed JSON, empty body,
 *   unsupported media type) → their own 4xx status
 * - Everything else → 500, logged, with a generic body
 */

import { STATUS_CODES } from 'node:http'
import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify'
import type { FieldError } from '../core/types'
import { ValidationError } from '../core/errors'

type AjvIssue = NonNullable<FastifyError['validation']>[number]

export const errorSchema = {
  type: 'object',
  properties: {
    statusCode: { type: 'integer' },
    error: { type: 'string' },
    message: { type: 'string' },
    errors: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          field: { type: 'string' },
          message: { type: 'string' },
        },
      },
    },
  },
} as const

/**
 * Convert an Ajv issue to a FieldError. `/title` → `title`; a missing
 * property has an empty path and names itself in `params`.
 */
const ajvIssueToFieldError = (issue: AjvIssue): FieldError => {
  const path = issue.instancePath.replace(/^\//, '').replace(/\//g, '.')
  const missing = issue.params.missingProperty

  return {
    field: path || (typeof missing === 'string' ? missing : 'body'),
    message: issue.message ?? 'is invalid',
  }
}

const badRequest = (reply: FastifyReply, message: string, errors: FieldError[]) =>
  reply.code(400).send({
    statusCode: 400,
    error: 'Bad Request',
    message,
    errors,
  })

export const errorHandler = (
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
) => {
  if (error instanceof ValidationError) {
    return badRequest(reply, error.message, error.errors)
  }

  if (error.validation) {
    return badRequest(reply, error.message, error.validation.map(ajvIssueToFieldError))
  }

  const statusCode = error.statusCode ?? 500

  if (statusCode >= 400 && statusCode < 500) {
    return reply.code(statusCode).send({
      statusCode,
      error: STATUS_CODES[statusCode] ?? 'Error',
      message: error.message,
    })
  }

  request.log.error({ err: error }, 'request failed')

  return reply.code(500).send({
    statusCode: 500,
    error: 'Internal Server Error',
    message: 'Internal Server Error',
  })
}
