/**
 * fixtures_get: matches by id, date, league, team or status.
 *
 * Live queries are never cached; see the freshness classifier.
 */

import type { ApiSportsEnvelope, FixtureItem } from '../types/schemas/api-sports.js';
import { FixtureItemSchema } from '../types/schemas/api-sports.js';
import { FixturesGetInputSchema } from '../types/schemas/tools.js';
import type { ToolContext, ToolDefinition } from './base.js';
import { defineTool, parseResponseItems, validateItems } from './base.js';

export interface ScorePair {
  home: number | null;
  away: number | null;
}

export interface FixtureSide {
  id: number | null;
  name: string | null;
  logo: string | null;
  winner: boolean | null;
}

export interface FixtureSummary {
  id: number | null;
  referee: string | null;
  timezone: string | null;
  date: string | null;
  timestamp: number | null;
  venue: { id: number | null; name: string | null; city: string | null } | null;
  status: { long: string | null; short: string | null; elapsed: number | null };
  league: {
    id: number | null;
    name: string | null;
    country: string | null;
    logo: string | null;
    flag: string | null;
    season: number | null;
    round: string | null;
  };
  teams: { home: FixtureSide; away: FixtureSide };
  goals: ScorePair;
  score: {
    halftime: ScorePair;
    fulltime: ScorePair;
    extratime: ScorePair | null;
    penalty: ScorePair | null;
  };
}

export interface FixturesGetResult {
  fixtures: FixtureSummary[];
  count: number;
}

type PairInput = { home?: number | null; away?: number | null } | null | undefined;
type SideInput = {
  id?: number | null;
  name?: string | null;
  logo?: string | null;
  winner?: boolean | null;
} | null | undefined;

function pair(value: PairInput): ScorePair {
  return { home: value?.home ?? null, away: value?.away ?? null };
}

function side(value: SideInput): FixtureSide {
  return {
    id: value?.id ?? null,
    name: value?.name ?? null,
    logo: value?.logo ?? null,
    winner: value?.winner ?? null,
  };
}

export function shapeFixture(item: FixtureItem): FixtureSummary {
  const fixture = item.fixture;
  const league = item.league;
  const score = item.score;

  return {
    id: fixture?.id ?? null,
    referee: fixture?.referee ?? null,
    timezone: fixture?.timezone ?? null,
    date: fixture?.date ?? null,
    timestamp: fixture?.timestamp ?? null,
    venue: fixture?.venue
      ? {
          id: fixture.venue.id ?? null,
          name: fixture.venue.name ?? null,
          city: fixture.venue.city ?? null,
        }
      : null,
    status: {
      long: fixture?.status?.long ?? null,
      short: fixture?.status?.short ?? null,
      elapsed: fixture?.status?.elapsed ?? null,
    },
    league: {
      id: league?.id ?? null,
      name: league?.name ?? null,
      country: league?.country ?? null,
      logo: league?.logo ?? null,
      flag: league?.flag ?? null,
      season: league?.season ?? null,
      round: league?.round ?? null,
    },
    teams: {
      home: side(item.teams?.home),
      away: side(item.teams?.away),
    },
    goals: pair(item.goals),
    score: {
      halftime: pair(score?.halftime),
      fulltime: pair(score?.fulltime),
      extratime: score?.extratime ? pair(score.extratime) : null,
      penalty: score?.penalty ? pair(score.penalty) : null,
    },
  };
}

export function shapeFixtures(envelope: ApiSportsEnvelope): FixturesGetResult {
  const fixtures = parseResponseItems(envelope, FixtureItemSchema, 'fixture').map(shapeFixture);
  return { fixtures, count: fixtures.length };
}

export function createFixturesGetTool(
  context: ToolContext
): ToolDefinition<typeof FixturesGetInputSchema, FixturesGetResult> {
  return defineTool(context, {
    name: 'fixtures_get',
    description:
      'Retrieve football fixtures (matches) by id, date, league, season, team, status or live state',
    inputSchema: FixturesGetInputSchema,
    family: 'fixtures',
    toParams: (input) => input,
    validate: validateItems(FixtureItemSchema, 'fixture'),
    shape: shapeFixtures,
  });
}
