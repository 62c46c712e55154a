import type { z, ZodTypeAny } from 'zod';
import { RequestValidationError } from '../errors';

/**
 * Parses a request value with a zod schema, throwing a RequestValidationError
 * (HTTP 422) listing every issue when it does not match.
 */
export function parseRequest<Schema extends ZodTypeAny>(schema: Schema, value: unknown): z.output<Schema> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(result.error.issues);
  }
  return result.data;
}
