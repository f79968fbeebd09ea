import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NO_STANDINGS_MESSAGE, shapeStandings } from '../../../src/tools/standings.js';
import { createToolHarness } from '../../helpers/tool-harness.js';
import type { ToolHarness } from '../../helpers/tool-harness.js';

const leader = {
  rank: 1,
  team: { id: 33, name: 'Northfield' },
  points: 82,
  goalsDiff: 40,
  form: 'WWDWW',
  all: { played: 38, win: 25 },
};

const runnerUp = {
  rank: 2,
  team: { id: 40, name: 'Southbay' },
  points: 80,
};

const shapedLeader = {
  rank: 1,
  team: { id: 33, name: 'Northfield', logo: null },
  points: 82,
  goalsDiff: 40,
  group: null,
  form: 'WWDWW',
  status: null,
  description: null,
  all: { played: 38, win: 25 },
  home: null,
  away: null,
  update: null,
};

describe('standings', () => {
  let harness: ToolHarness;

  beforeEach(() => {
    harness = createToolHarness();
  });

  afterEach(() => {
    harness.dispose();
  });

  it('shapes the first group of a grouped table', async () => {
    harness.upstream.mockResolvedValue({
      results: 1,
      response: [
        {
          league: {
            id: 39,
            name: 'Premier',
            country: 'England',
            season: 2024,
            standings: [[leader, runnerUp]],
          },
        },
      ],
    });

    const result = await harness.tools.standings.handler({ league: 39, season: 2024 });

    expect(result).toMatchObject({
      league: { id: 39, name: 'Premier', country: 'England', logo: null, flag: null, season: 2024 },
      count: 2,
      request_id: 'req-1',
    });
    expect(result).toHaveProperty('standings.0', shapedLeader);
    expect(result).toHaveProperty('standings.1.team', { id: 40, name: 'Southbay', logo: null });
    expect(harness.upstream).toHaveBeenCalledWith(
      'standings',
      { league: 39, season: 2024 },
      expect.any(AbortSignal)
    );
  });

  it('passes the optional team through', async () => {
    harness.upstream.mockResolvedValue({ response: [{ league: { id: 39, standings: [[leader]] } }] });

    await harness.tools.standings.handler({ league: 39, season: 2024, team: 33 });

    expect(harness.upstream).toHaveBeenCalledWith(
      'standings',
      { league: 39, season: 2024, team: 33 },
      expect.any(AbortSignal)
    );
  });

  it('serves a repeated request from the cache', async () => {
    harness.upstream.mockResolvedValue({ response: [{ league: { id: 39, standings: [[leader]] } }] });

    await harness.tools.standings.handler({ league: 39, season: 2024 });
    const second = await harness.tools.standings.handler({ season: 2024, league: 39 });

    expect(second).toMatchObject({ count: 1 });
    expect(harness.upstream).toHaveBeenCalledOnce();
  });

  it('requires a season', async () => {
    const result = await harness.tools.standings.handler({ league: 39 });

    expect(result).toEqual({
      error: "Validation error on field 'season': Required",
      code: 'ValidationError',
      retry_later: false,
      request_id: 'req-1',
    });
    expect(harness.upstream).not.toHaveBeenCalled();
  });

  it('reports an empty result as an upstream error', async () => {
    harness.upstream.mockResolvedValue({ results: 0, response: [] });

    const result = await harness.tools.standings.handler({ league: 39, season: 1890 });

    expect(result).toEqual({
      error: NO_STANDINGS_MESSAGE,
      code: 'UpstreamError',
      retry_later: false,
      request_id: 'req-1',
    });
  });

  describe('shapeStandings', () => {
    it('accepts a flat table', () => {
      const result = shapeStandings({ response: [{ league: { id: 39, standings: [leader, runnerUp] } }] });

      expect(result.count).toBe(2);
      expect(result.standings[0]).toEqual(shapedLeader);
    });

    it('returns an empty table when the league has no standings', () => {
      expect(shapeStandings({ response: [{ league: { id: 39 } }] })).toEqual({
        league: { id: 39, name: null, country: null, logo: null, flag: null, season: null },
        standings: [],
        count: 0,
      });
    });
  });
});
