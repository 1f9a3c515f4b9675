/**
 * zod building blocks for binding string-valued configuration
 */

import { z } from 'zod';

/**
 * "true"/"false" in any casing
 */
export const configBoolean = z
  .string()
  .trim()
  .toLowerCase()
  .refine((value) => value === 'true' || value === 'false', { message: 'Expected true or false' })
  .transform((value) => value === 'true');

/**
 * Non-negative integer written as a string
 */
export const configInteger = z.coerce.number().int().nonnegative();
