/**
 * Zod schema exports
 *
 * @example
 * ```typescript
 * import { FixturesGetInputSchema } from 'sports-data-mediator';
 *
 * const result = FixturesGetInputSchema.safeParse({ date: '2025-03-01' });
 * if (!result.success) {
 *   console.error(result.error.issues);
 * }
 * ```
 */

// Common primitives
export * from './common.js';

// Config schemas
export * from './config.js';

// Upstream response schemas
export * from './api-sports.js';

// Tool input schemas
export * from './tools.js';
