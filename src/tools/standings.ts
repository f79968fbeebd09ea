/**
 * standings: league table for one season.
 */

import { UpstreamError } from '../api/errors.js';
import type { ApiSportsEnvelope, StandingRow } from '../types/schemas/api-sports.js';
import { StandingsItemSchema } from '../types/schemas/api-sports.js';
import { StandingsInputSchema } from '../types/schemas/tools.js';
import type { ToolContext, ToolDefinition } from './base.js';
import { defineTool, parseResponseItems, validateItems } from './base.js';

type StatBlock = Record<string, unknown> | null;

export interface StandingSummary {
  rank: number | null;
  team: { id: number | null; name: string | null; logo: string | null };
  points: number | null;
  goalsDiff: number | null;
  group: string | null;
  form: string | null;
  status: string | null;
  description: string | null;
  all: StatBlock;
  home: StatBlock;
  away: StatBlock;
  update: string | null;
}

export interface StandingsResult {
  league: {
    id: number | null;
    name: string | null;
    country: string | null;
    logo: string | null;
    flag: string | null;
    season: number | null;
  };
  standings: StandingSummary[];
  count: number;
}

export const NO_STANDINGS_MESSAGE = 'No standings found for the specified parameters';

export function shapeStanding(row: StandingRow): StandingSummary {
  return {
    rank: row.rank ?? null,
    team: {
      id: row.team?.id ?? null,
      name: row.team?.name ?? null,
      logo: row.team?.logo ?? null,
    },
    points: row.points ?? null,
    goalsDiff: row.goalsDiff ?? null,
    group: row.group ?? null,
    form: row.form ?? null,
    status: row.status ?? null,
    description: row.description ?? null,
    all: row.all ?? null,
    home: row.home ?? null,
    away: row.away ?? null,
    update: row.update ?? null,
  };
}

export function shapeStandings(envelope: ApiSportsEnvelope): StandingsResult {
  const league = parseResponseItems(envelope, StandingsItemSchema, 'standings')[0]?.league;
  if (!league) {
    throw new UpstreamError(NO_STANDINGS_MESSAGE, { status: 200 });
  }

  const standings = (league.standings ?? []).map(shapeStanding);
  return {
    league: {
      id: league.id ?? null,
      name: league.name ?? null,
      country: league.country ?? null,
      logo: league.logo ?? null,
      flag: league.flag ?? null,
      season: league.season ?? null,
    },
    standings,
    count: standings.length,
  };
}

export function createStandingsTool(
  context: ToolContext
): ToolDefinition<typeof StandingsInputSchema, StandingsResult> {
  return defineTool(context, {
    name: 'standings',
    description: 'Get the league table for a league and season, optionally for one team',
    inputSchema: StandingsInputSchema,
    family: 'standings',
    toParams: (input) => input,
    validate: validateItems(StandingsItemSchema, 'standings'),
    shape: shapeStandings,
  });
}
