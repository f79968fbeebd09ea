/**
 * teams_search: look up teams and their home venue.
 */

import type { ApiSportsEnvelope, TeamItem } from '../types/schemas/api-sports.js';
import { TeamItemSchema } from '../types/schemas/api-sports.js';
import { TeamsSearchInputSchema } from '../types/schemas/tools.js';
import type { ToolContext, ToolDefinition } from './base.js';
import { defineTool, parseResponseItems, validateItems } from './base.js';

export interface VenueSummary {
  id: number | null;
  name: string | null;
  address: string | null;
  city: string | null;
  capacity: number | null;
  surface: string | null;
  image: string | null;
}

export interface TeamSummary {
  id: number | null;
  name: string | null;
  code: string | null;
  country: string | null;
  founded: number | null;
  national: boolean;
  logo: string | null;
  venue: VenueSummary | null;
}

export interface TeamsSearchResult {
  teams: TeamSummary[];
  count: number;
}

export function shapeTeam(item: TeamItem): TeamSummary {
  const team = item.team;
  const venue = item.venue;

  return {
    id: team?.id ?? null,
    name: team?.name ?? null,
    code: team?.code ?? null,
    country: team?.country ?? null,
    founded: team?.founded ?? null,
    national: team?.national ?? false,
    logo: team?.logo ?? null,
    venue: venue
      ? {
          id: venue.id ?? null,
          name: venue.name ?? null,
          address: venue.address ?? null,
          city: venue.city ?? null,
          capacity: venue.capacity ?? null,
          surface: venue.surface ?? null,
          image: venue.image ?? null,
        }
      : null,
  };
}

export function shapeTeams(envelope: ApiSportsEnvelope): TeamsSearchResult {
  const teams = parseResponseItems(envelope, TeamItemSchema, 'team').map(shapeTeam);
  return { teams, count: teams.length };
}

export function createTeamsSearchTool(
  context: ToolContext
): ToolDefinition<typeof TeamsSearchInputSchema, TeamsSearchResult> {
  return defineTool(context, {
    name: 'teams_search',
    description: 'Search for football teams and retrieve their information',
    inputSchema: TeamsSearchInputSchema,
    family: 'teams',
    toParams: (input) => input,
    validate: validateItems(TeamItemSchema, 'team'),
    shape: shapeTeams,
  });
}
