/**
 * head2head: fixtures between two teams, with a win/draw tally.
 *
 * Only finished matches with a known score count towards the tally.
 */

import type { ApiSportsEnvelope } from '../types/schemas/api-sports.js';
import { FixtureItemSchema } from '../types/schemas/api-sports.js';
import { Head2HeadInputSchema } from '../types/schemas/tools.js';
import type { ToolContext, ToolDefinition } from './base.js';
import { defineTool, parseResponseItems, validateItems } from './base.js';
import type { FixtureSummary } from './fixtures.js';
import { shapeFixture } from './fixtures.js';

export interface Head2HeadTally {
  team1_wins: number;
  team2_wins: number;
  draws: number;
  total_games: number;
}

export interface Head2HeadResult {
  fixtures: FixtureSummary[];
  count: number;
  statistics: Head2HeadTally;
}

/** Statuses of matches decided on the pitch */
const DECIDED_STATUS_CODES: ReadonlySet<string> = new Set(['FT', 'AET', 'PEN']);

/**
 * Count wins and draws from the point of view of the first team in `h2h`.
 */
export function tallyHead2Head(fixtures: readonly FixtureSummary[], h2h: string): Head2HeadTally {
  const team1 = Number(h2h.split('-')[0]);
  const tally: Head2HeadTally = { team1_wins: 0, team2_wins: 0, draws: 0, total_games: 0 };

  for (const fixture of fixtures) {
    const { home, away } = fixture.goals;
    if (!fixture.status.short || !DECIDED_STATUS_CODES.has(fixture.status.short)) {
      continue;
    }
    if (home === null || away === null) {
      continue;
    }

    if (home === away) {
      tally.draws++;
    } else {
      const winner = home > away ? fixture.teams.home.id : fixture.teams.away.id;
      if (winner === team1) {
        tally.team1_wins++;
      } else {
        tally.team2_wins++;
      }
    }
    tally.total_games++;
  }

  return tally;
}

export function shapeHead2Head(envelope: ApiSportsEnvelope, h2h: string): Head2HeadResult {
  const fixtures = parseResponseItems(envelope, FixtureItemSchema, 'fixture').map(shapeFixture);
  return {
    fixtures,
    count: fixtures.length,
    statistics: tallyHead2Head(fixtures, h2h),
  };
}

export function createHead2HeadTool(
  context: ToolContext
): ToolDefinition<typeof Head2HeadInputSchema, Head2HeadResult> {
  return defineTool(context, {
    name: 'head2head',
    description: 'Get head-to-head fixtures between two teams and a summary of their results',
    inputSchema: Head2HeadInputSchema,
    family: 'head2head',
    toParams: (input) => input,
    validate: validateItems(FixtureItemSchema, 'fixture'),
    shape: (envelope, input) => shapeHead2Head(envelope, input.h2h),
  });
}
