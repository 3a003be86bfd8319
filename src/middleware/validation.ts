import { z, ZodError, ZodTypeAny } from 'zod';
import { SchemaValidationError } from '../errors/index.js';

/**
 * Validation Middleware
 *
 * Request validation using Zod schemas, called by controllers on
 * `req.body`, `req.query` and `req.params`. Failures become a
 * SchemaValidationError so the error handler answers 400 in the usual shape.
 */

/**
 * Flatten Zod issues into `{ path, message }` pairs
 */
export function formatZodIssues(error: ZodError): Array<{ path: string; message: string }> {
  return error.issues.map(issue => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
}

/**
 * Parse a value against a schema, throwing SchemaValidationError on mismatch.
 * The first issue becomes the error message so clients see something specific.
 *
 * @example
 * ```typescript
 * const { url, mode } = parseWith(videoInfoSchema, req.body);
 * ```
 */
export function parseWith<S extends ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const errors = formatZodIssues(result.error);
  const first = errors[0];
  throw new SchemaValidationError(errors, first ? first.message : undefined);
}
