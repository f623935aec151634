/**
 * Input validation helpers shared by every registry
 */

import { z } from 'zod';
import { fromZodError } from './errors.js';

/** Unix seconds */
export const TimestampSchema = z.number().int().nonnegative();

export const NonEmptyStringSchema = (reason: string) => z.string().min(1, { message: reason });

/**
 * Parse untrusted input or throw INVALID_INPUT
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw fromZodError(result.error);
  }
  return result.data;
}
