/**
 * Request Validation
 * Layer: Interfaces (HTTP)
 *
 * Checks a request part (query, params, body) against a Zod schema and
 * returns the parsed, coerced value — the controller gets typed data or never
 * runs. On failure a ValidationError (400) is thrown; Express 5 forwards it to
 * the global error handler.
 *
 *   const input = validate(searchQuerySchema, req.query);
 *
 * The parsed value is returned rather than written back onto `req`, because
 * Express 5 exposes `req.query` through a getter.
 */
import { ValidationError } from '@shared/errors/AppError';
import type { z } from 'zod/v4';

export function validate<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (!result.success) {
    const messages = result.error.issues.map((issue) => issue.message).join('; ');
    throw new ValidationError(messages);
  }

  return result.data;
}
