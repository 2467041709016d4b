import type { z, ZodTypeAny } from 'zod'
import { ValidationError } from '../errors.js'

export function toValidationError(error: z.ZodError): ValidationError {
  return new ValidationError(
    error.issues.map((issue) => ({
      path: issue.path.join('.') || '(root)',
      message: issue.message
    }))
  )
}

/** Parses request input against a schema, throwing a 422 on mismatch. */
export function parse<S extends ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw toValidationError(result.error)
  }
  return result.data
}
