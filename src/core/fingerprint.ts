/**
 * Query Fingerprinting
 *
 * Derives the cache / in-flight key of a query from its family and
 * parameters. Parameter order, absent values and number-vs-string spelling of
 * the same value do not change the key, because the upstream receives every
 * parameter as a query-string value anyway.
 */

import { createHash } from 'node:crypto';
import type { QueryFamily, QueryFingerprint, QueryParams } from '../types/query.js';

/**
 * Drop absent values, stringify the rest and sort by parameter name.
 */
export function normalizeParams(params: QueryParams): Array<[string, string]> {
  const entries: Array<[string, string]> = [];

  for (const [name, value] of Object.entries(params)) {
    if (value === undefined || value === null) {
      continue;
    }
    entries.push([name, String(value)]);
  }

  return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
}

/**
 * Build the fingerprint of a query.
 *
 * The key is `<family>:<sha256 of the canonical parameter string>`, so keys
 * of one family share a prefix.
 */
export function createFingerprint(family: QueryFamily, params: QueryParams): QueryFingerprint {
  const canonical = JSON.stringify(normalizeParams(params));
  const digest = createHash('sha256').update(`${family}\n${canonical}`).digest('hex');

  return {
    key: `${family}:${digest}`,
    family,
    canonical,
  };
}
