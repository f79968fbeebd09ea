import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { NO_STATISTICS_MESSAGE, shapeStatistics } from '../../../src/tools/statistics.js';
import { UpstreamError } from '../../../src/api/errors.js';
import { createToolHarness } from '../../helpers/tool-harness.js';
import type { ToolHarness } from '../../helpers/tool-harness.js';

const statistics = {
  league: { id: 39, name: 'Premier', season: 2023 },
  team: { id: 33, name: 'Northfield' },
  form: 'WWD',
  fixtures: { played: { home: 2, away: 1, total: 3 } },
};

const shapedStatistics = {
  league: { id: 39, name: 'Premier', country: null, logo: null, flag: null, season: 2023 },
  team: { id: 33, name: 'Northfield', logo: null },
  form: 'WWD',
  fixtures: { played: { home: 2, away: 1, total: 3 } },
  goals: null,
  biggest: null,
  clean_sheet: null,
  failed_to_score: null,
  penalty: null,
  lineups: [],
  cards: null,
};

describe('team_statistics', () => {
  let harness: ToolHarness;

  beforeEach(() => {
    harness = createToolHarness();
  });

  afterEach(() => {
    harness.dispose();
  });

  it('shapes a single-object response', async () => {
    harness.upstream.mockResolvedValue({ results: 11, response: statistics });

    const result = await harness.tools.teamStatistics.handler({ league: 39, season: 2023, team: 33 });

    expect(result).toEqual({ statistics: shapedStatistics, request_id: 'req-1' });
    expect(harness.upstream).toHaveBeenCalledWith(
      'team_statistics',
      { league: 39, season: 2023, team: 33 },
      expect.any(AbortSignal)
    );
  });

  it('requires league, season and team', async () => {
    const result = await harness.tools.teamStatistics.handler({ league: 39, season: 2023 });

    expect(result).toEqual({
      error: "Validation error on field 'team': Required",
      code: 'ValidationError',
      retry_later: false,
      request_id: 'req-1',
    });
  });

  it('rejects a season that is not a 4-digit year', async () => {
    const result = await harness.tools.teamStatistics.handler({ league: 39, season: 23, team: 33 });

    expect(result).toMatchObject({
      error: "Validation error on field 'season': Season must be a 4-digit year (YYYY)",
    });
  });

  it('reports an empty result as a non-retryable upstream error', async () => {
    harness.upstream.mockResolvedValue({ results: 0, response: [] });

    const result = await harness.tools.teamStatistics.handler({ league: 39, season: 2023, team: 999 });

    expect(result).toEqual({
      error: NO_STATISTICS_MESSAGE,
      code: 'UpstreamError',
      retry_later: false,
      request_id: 'req-1',
    });
  });

  describe('shapeStatistics', () => {
    it('accepts the statistics wrapped in a list', () => {
      expect(shapeStatistics({ response: [statistics] })).toEqual({ statistics: shapedStatistics });
    });

    it('throws when nothing matched', () => {
      expect(() => shapeStatistics({ response: [] })).toThrow(new UpstreamError(NO_STATISTICS_MESSAGE));
    });

    it('rejects malformed statistics', () => {
      expect(() => shapeStatistics({ response: { form: 5 } })).toThrow(
        'Upstream returned malformed statistics data'
      );
    });
  });
});
