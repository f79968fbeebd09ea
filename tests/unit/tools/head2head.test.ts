import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { shapeHead2Head } from '../../../src/tools/head2head.js';
import { createToolHarness } from '../../helpers/tool-harness.js';
import type { ToolHarness } from '../../helpers/tool-harness.js';

function match(
  id: number,
  short: string,
  homeId: number,
  awayId: number,
  goals: { home: number | null; away: number | null }
): Record<string, unknown> {
  return {
    fixture: { id, status: { short } },
    teams: { home: { id: homeId }, away: { id: awayId } },
    goals,
  };
}

const meetings = [
  match(1, 'FT', 33, 34, { home: 2, away: 1 }),
  match(2, 'AET', 34, 33, { home: 1, away: 0 }),
  match(3, 'PEN', 33, 34, { home: 1, away: 1 }),
  match(4, 'NS', 34, 33, { home: null, away: null }),
  match(5, 'FT', 34, 33, { home: 0, away: 2 }),
];

describe('head2head', () => {
  let harness: ToolHarness;

  beforeEach(() => {
    harness = createToolHarness();
  });

  afterEach(() => {
    harness.dispose();
  });

  it('returns the meetings with a tally for the first team', async () => {
    harness.upstream.mockResolvedValue({ results: 5, response: meetings });

    const result = await harness.tools.head2head.handler({ h2h: '33-34', last: 5 });

    expect(result).toMatchObject({
      count: 5,
      statistics: { team1_wins: 2, team2_wins: 1, draws: 1, total_games: 4 },
      request_id: 'req-1',
    });
    expect(result).toHaveProperty('fixtures.4.teams.away', {
      id: 33,
      name: null,
      logo: null,
      winner: null,
    });
    expect(harness.upstream).toHaveBeenCalledWith(
      'head2head',
      { h2h: '33-34', last: 5 },
      expect.any(AbortSignal)
    );
  });

  it('rejects an h2h value that is not two team ids', async () => {
    const result = await harness.tools.head2head.handler({ h2h: '33' });

    expect(result).toEqual({
      error: "Validation error on field 'h2h': h2h parameter must be in format 'team1-team2' (e.g., '33-34')",
      code: 'ValidationError',
      retry_later: false,
      request_id: 'req-1',
    });
    expect(harness.upstream).not.toHaveBeenCalled();
  });

  it('validates optional dates', async () => {
    const result = await harness.tools.head2head.handler({ h2h: '33-34', from_date: '2024-13-01' });

    expect(result).toMatchObject({
      error: "Validation error on field 'from_date': Date must be in YYYY-MM-DD format",
      retry_later: false,
    });
  });

  it('reuses a settled history from the cache', async () => {
    harness.upstream.mockResolvedValue({ response: [meetings[0]] });

    await harness.tools.head2head.handler({ h2h: '33-34', season: 2023 });
    await harness.tools.head2head.handler({ h2h: '33-34', season: 2023 });

    expect(harness.upstream).toHaveBeenCalledOnce();
  });

  describe('shapeHead2Head', () => {
    it('tallies from the point of view of the first id', () => {
      const result = shapeHead2Head({ response: meetings }, '34-33');

      expect(result.statistics).toEqual({ team1_wins: 1, team2_wins: 2, draws: 1, total_games: 4 });
    });

    it('tallies nothing for an empty history', () => {
      expect(shapeHead2Head({ response: [] }, '33-34')).toEqual({
        fixtures: [],
        count: 0,
        statistics: { team1_wins: 0, team2_wins: 0, draws: 0, total_games: 0 },
      });
    });
  });
});
