import { z, ZodTypeAny } from 'zod';
import { DecodeError } from '../framework/errors';

/**
 * Parses a value against a schema, converting zod issues into a DecodeError.
 */
export function decode<S extends ZodTypeAny>(schema: S, value: unknown, what: string): z.infer<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new DecodeError(what, result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    })));
  }
  return result.data;
}
