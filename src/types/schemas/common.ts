/**
 * Common Zod schema primitives
 */

import { z } from 'zod';

/**
 * Non-empty string validator
 */
export const NonEmptyString = z.string().trim().min(1, 'Cannot be empty');

/**
 * Positive integer validator (upstream identifiers)
 */
export const PositiveInteger = z
  .number()
  .int('Must be an integer')
  .positive('Must be a positive integer');

/**
 * Four-digit season year
 */
export const SeasonYear = z
  .number()
  .int('Must be an integer')
  .min(1000, 'Season must be a 4-digit year (YYYY)')
  .max(9999, 'Season must be a 4-digit year (YYYY)');

/**
 * Calendar date in YYYY-MM-DD form that names a real day
 */
export const IsoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must be in YYYY-MM-DD format')
  .refine((value) => {
    const parsed = new Date(`${value}T00:00:00Z`);
    return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
  }, 'Date must be in YYYY-MM-DD format');

/**
 * Count of matches for last/next (at most two digits)
 */
export const MatchCount = z
  .number()
  .int('Must be an integer')
  .min(1, 'Must be at least 1')
  .max(99, 'Must be 2 digits or less');
