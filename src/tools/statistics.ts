/**
 * team_statistics: season statistics of one team in one league.
 */

import { UpstreamError } from '../api/errors.js';
import type { ApiSportsEnvelope, TeamStatisticsItem } from '../types/schemas/api-sports.js';
import { TeamStatisticsItemSchema } from '../types/schemas/api-sports.js';
import { TeamStatisticsInputSchema } from '../types/schemas/tools.js';
import type { ToolContext, ToolDefinition } from './base.js';
import { defineTool, parseResponseItems } from './base.js';

type StatBlock = Record<string, unknown> | null;

export interface TeamStatisticsSummary {
  league: {
    id: number | null;
    name: string | null;
    country: string | null;
    logo: string | null;
    flag: string | null;
    season: number | null;
  };
  team: { id: number | null; name: string | null; logo: string | null };
  form: string | null;
  fixtures: StatBlock;
  goals: StatBlock;
  biggest: StatBlock;
  clean_sheet: StatBlock;
  failed_to_score: StatBlock;
  penalty: StatBlock;
  lineups: Array<Record<string, unknown>>;
  cards: StatBlock;
}

export interface TeamStatisticsResult {
  statistics: TeamStatisticsSummary;
}

export const NO_STATISTICS_MESSAGE = 'No statistics found for the specified parameters';

export function shapeStatisticsItem(item: TeamStatisticsItem): TeamStatisticsSummary {
  return {
    league: {
      id: item.league?.id ?? null,
      name: item.league?.name ?? null,
      country: item.league?.country ?? null,
      logo: item.league?.logo ?? null,
      flag: item.league?.flag ?? null,
      season: item.league?.season ?? null,
    },
    team: {
      id: item.team?.id ?? null,
      name: item.team?.name ?? null,
      logo: item.team?.logo ?? null,
    },
    form: item.form ?? null,
    fixtures: item.fixtures ?? null,
    goals: item.goals ?? null,
    biggest: item.biggest ?? null,
    clean_sheet: item.clean_sheet ?? null,
    failed_to_score: item.failed_to_score ?? null,
    penalty: item.penalty ?? null,
    lineups: item.lineups ?? [],
    cards: item.cards ?? null,
  };
}

/**
 * The statistics endpoint answers with a single object, or with an empty
 * list when nothing matches.
 */
export function parseStatisticsItems(envelope: ApiSportsEnvelope): TeamStatisticsItem[] {
  const response = envelope.response;
  return Array.isArray(response) || response === undefined || response === null
    ? parseResponseItems(envelope, TeamStatisticsItemSchema, 'statistics')
    : parseResponseItems({ ...envelope, response: [response] }, TeamStatisticsItemSchema, 'statistics');
}

export function shapeStatistics(envelope: ApiSportsEnvelope): TeamStatisticsResult {
  const first = parseStatisticsItems(envelope)[0];
  if (!first) {
    throw new UpstreamError(NO_STATISTICS_MESSAGE, { status: 200 });
  }
  return { statistics: shapeStatisticsItem(first) };
}

export function createTeamStatisticsTool(
  context: ToolContext
): ToolDefinition<typeof TeamStatisticsInputSchema, TeamStatisticsResult> {
  return defineTool(context, {
    name: 'team_statistics',
    description: 'Get statistics for a football team in a league and season',
    inputSchema: TeamStatisticsInputSchema,
    family: 'team_statistics',
    toParams: (input) => input,
    validate: (envelope) => {
      parseStatisticsItems(envelope);
    },
    shape: shapeStatistics,
  });
}
