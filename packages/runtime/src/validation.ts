// Input parsing helpers

import type { z } from 'zod';
import { InvalidConstructionArgumentError } from './errors.js';

/**
 * Parse a construction input, converting the first zod issue into an
 * InvalidConstructionArgumentError.
 */
export function parseInput<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  fieldPrefix?: string
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw InvalidConstructionArgumentError.fromZodError(result.error, fieldPrefix);
  }
  return result.data;
}
