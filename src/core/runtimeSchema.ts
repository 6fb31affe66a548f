/**
 * blogpost — RuntimeSchema
 *
 * Wraps a Zod schema and a JSON Schema factory behind one interface, so the
 * HTTP edge (Ajv, through Fastify) and the store (Zod) validate against the
 * same contract.
 *
 * @example
 * // Validate (throws ValidationError on failure)
 * const input = posts.schemas.insert.validate(body)
 *
 * // Try validate (never throws)
 * const result = posts.schemas.insert.tryValidate(body)
 * if (!result.success) console.log(result.errors)
 *
 * // JSON Schema for Fastify
 * app.post('/posts', { schema: { body: posts.schemas.insert.toJsonSchema() } })
 */

import type { ZodError, ZodType, ZodTypeDef } from 'zod'
import type {
  FieldError,
  JsonSchema,
  JsonSchemaOptions,
  JsonSchemaProperty,
  RuntimeSchema,
  ValidationResult,
} from './types'
import { ValidationError } from './errors'

// ------------------------------------------------------------ Helpers --

/**
 * Convert a ZodError into FieldError entries.
 */
export const zodErrorToFieldErrors = (zodError: ZodError): FieldError[] =>
  zodError.issues.map(issue => ({
    field: issue.path.join('.') || 'unknown',
    message: issue.message,
  }))

// --------------------------------------------------------- JSON Schema --

/**
 * Build a JSON Schema object from property definitions.
 *
 * Unknown keys are rejected unless `additionalProperties` is set; Fastify's
 * Ajv instance strips them instead (`removeAdditional`).
 */
export const buildJsonSchema = (
  properties: Record<string, JsonSchemaProperty>,
  required: string[],
  opts: JsonSchemaOptions = {}
): JsonSchema => {
  const schema: JsonSchema = {
    type: 'object',
    properties: { ...properties },
    additionalProperties: opts.additionalProperties ?? false,
  }

  if (required.length > 0) {
    schema.required = [...required]
  }

  return schema
}

// --------------------------------------------------------- Factory --

/**
 * Create a RuntimeSchema wrapping a Zod schema and a JSON Schema factory.
 */
export const createRuntimeSchema = <T, TInput = T>(
  zodSchema: ZodType<T, ZodTypeDef, TInput>,
  jsonSchemaFactory: (opts?: JsonSchemaOptions) => JsonSchema
): RuntimeSchema<T, TInput> => ({

  validate(input: unknown): T {
    const result = zodSchema.safeParse(input)

    if (result.success) return result.data

    throw new ValidationError(zodErrorToFieldErrors(result.error))
  },

  tryValidate(input: unknown): ValidationResult<T> {
    const result = zodSchema.safeParse(input)

    if (result.success) {
      return { success: true, data: result.data }
    }

    return {
      success: false,
      errors: zodErrorToFieldErrors(result.error),
    }
  },

  toJsonSchema(opts?: JsonSchemaOptions): JsonSchema {
    return jsonSchemaFactory(opts)
  },

  zod: zodSchema,
})
