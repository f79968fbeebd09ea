/**
 * Freshness Classifier
 *
 * Maps a fetched result to the TTL class it may be cached under. Fixtures
 * need the result, not just the request: the same query is permanent once
 * every match in it is over and uncacheable while any of them is in play.
 *
 * | Data                               | TTL class   |
 * |------------------------------------|-------------|
 * | Teams / venues                     | LONG        |
 * | Fixtures, all completed            | PERMANENT   |
 * | Fixtures, scheduled or mixed       | MEDIUM      |
 * | Live query, or any match in play   | NONE        |
 * | Head-to-head fixtures              | as fixtures |
 * | Team statistics                    | MEDIUM      |
 * | League standings                   | MEDIUM      |
 * | Match predictions                  | MEDIUM      |
 */

import { z } from 'zod';
import { TtlClass } from '../types/cache.js';
import type { QueryFamily, QueryParams } from '../types/query.js';

export type FreshnessClassifier = (
  family: QueryFamily,
  params: QueryParams,
  payload: unknown
) => TtlClass;

/** Short status codes of matches that will not change any more */
export const COMPLETED_STATUS_CODES: ReadonlySet<string> = new Set([
  'FT',
  'AET',
  'PEN',
  'PST',
  'CANC',
  'ABD',
  'AWD',
  'WO',
]);

/** Short status codes of matches currently being played */
export const IN_PLAY_STATUS_CODES: ReadonlySet<string> = new Set([
  '1H',
  'HT',
  '2H',
  'ET',
  'BT',
  'P',
  'SUSP',
  'INT',
  'LIVE',
]);

const COMPLETED_LABELS: ReadonlySet<string> = new Set([
  'match finished',
  'match finished after extra time',
  'match finished after penalty',
  'match postponed',
  'match cancelled',
  'match abandoned',
  'technical loss',
  'walkover',
]);

const IN_PLAY_LABELS: ReadonlySet<string> = new Set([
  'in play',
  'in progress',
  'first half, kick off',
  'halftime',
  'second half, 2nd half started',
  'extra time',
  'break time',
  'penalty in progress',
  'match suspended',
  'match interrupted',
]);

const FixtureStatusEnvelopeSchema = z.object({
  response: z.array(
    z.object({
      fixture: z
        .object({
          status: z
            .object({
              short: z.string().nullish(),
              long: z.string().nullish(),
            })
            .nullish(),
        })
        .nullish(),
    })
  ),
});

type MatchPhase = 'completed' | 'in_play' | 'scheduled';

function phaseOf(short: string | null | undefined, long: string | null | undefined): MatchPhase {
  const code = short?.trim().toUpperCase();
  if (code) {
    if (COMPLETED_STATUS_CODES.has(code)) return 'completed';
    if (IN_PLAY_STATUS_CODES.has(code)) return 'in_play';
  }

  const label = long?.trim().toLowerCase();
  if (label) {
    if (COMPLETED_LABELS.has(label)) return 'completed';
    if (IN_PLAY_LABELS.has(label)) return 'in_play';
  }

  return 'scheduled';
}

function classifyFixtures(params: QueryParams, payload: unknown): TtlClass {
  const live = params['live'];
  if (live !== undefined && live !== null && String(live).length > 0) {
    return TtlClass.NONE;
  }

  const parsed = FixtureStatusEnvelopeSchema.safeParse(payload);
  if (!parsed.success || parsed.data.response.length === 0) {
    return TtlClass.MEDIUM;
  }

  const phases = parsed.data.response.map((item) =>
    phaseOf(item.fixture?.status?.short, item.fixture?.status?.long)
  );

  if (phases.includes('in_play')) {
    return TtlClass.NONE;
  }
  if (phases.every((phase) => phase === 'completed')) {
    return TtlClass.PERMANENT;
  }
  return TtlClass.MEDIUM;
}

/**
 * Default classifier for the sports-data query families.
 */
export const classifyFreshness: FreshnessClassifier = (family, params, payload) => {
  switch (family) {
    case 'teams':
      return TtlClass.LONG;
    case 'fixtures':
    case 'head2head':
      return classifyFixtures(params, payload);
    case 'team_statistics':
    case 'standings':
    case 'predictions':
      return TtlClass.MEDIUM;
  }
};
