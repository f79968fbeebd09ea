import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { isToolFailure } from '../../../src/tools/index.js';
import { createToolHarness } from '../../helpers/tool-harness.js';
import type { ToolHarness } from '../../helpers/tool-harness.js';

describe('Toolset', () => {
  let harness: ToolHarness;

  beforeEach(() => {
    harness = createToolHarness();
  });

  afterEach(() => {
    harness.dispose();
  });

  it('lists the tools in registration order', () => {
    expect(harness.tools.list().map((tool) => tool.name)).toEqual([
      'teams_search',
      'fixtures_get',
      'team_statistics',
      'standings',
      'head2head',
      'predictions',
    ]);
  });

  it('looks tools up by name', () => {
    expect(harness.tools.get('fixtures_get')).toBe(harness.tools.fixturesGet);
    expect(harness.tools.get('standings')).toBe(harness.tools.standings);
    expect(harness.tools.get('leagues_search')).toBeUndefined();
  });

  it('invokes a tool by name', async () => {
    harness.upstream.mockResolvedValue({ response: [] });

    const result = await harness.tools.invoke('teams_search', { id: 33 });

    expect(isToolFailure(result)).toBe(false);
    expect(result).toEqual({ teams: [], count: 0, request_id: 'req-1' });
  });

  it('treats an absent input as an empty query', async () => {
    harness.upstream.mockResolvedValue({ response: [] });

    await harness.tools.invoke('fixtures_get', undefined);

    expect(harness.upstream).toHaveBeenCalledWith('fixtures', {}, expect.any(AbortSignal));
  });

  it('returns a validation failure for an unknown tool', async () => {
    const result = await harness.tools.invoke('leagues_search', {});

    expect(isToolFailure(result)).toBe(true);
    expect(result).toEqual({
      error: 'Unknown tool: leagues_search',
      code: 'ValidationError',
      retry_later: false,
      request_id: 'req-1',
    });
    expect(harness.upstream).not.toHaveBeenCalled();
  });
});
