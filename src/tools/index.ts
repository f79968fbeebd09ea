/**
 * Tool registry
 */

import { randomUUID } from 'node:crypto';
import { ValidationError } from '../api/errors.js';
import type { FetchOrchestrator } from '../core/fetch-orchestrator.js';
import type { UpstreamCall } from '../types/query.js';
import type { ApiSportsEnvelope } from '../types/schemas/api-sports.js';
import type { AnyToolDefinition, ToolContext, ToolInvokeOptions, ToolResult } from './base.js';
import { createFixturesGetTool } from './fixtures.js';
import { createHead2HeadTool } from './head2head.js';
import { createPredictionsTool } from './predictions.js';
import { createStandingsTool } from './standings.js';
import { createTeamStatisticsTool } from './statistics.js';
import { createTeamsSearchTool } from './teams.js';

export * from './base.js';
export * from './teams.js';
export * from './fixtures.js';
export * from './statistics.js';
export * from './standings.js';
export * from './head2head.js';
export * from './predictions.js';

export interface Toolset {
  teamsSearch: ReturnType<typeof createTeamsSearchTool>;
  fixturesGet: ReturnType<typeof createFixturesGetTool>;
  teamStatistics: ReturnType<typeof createTeamStatisticsTool>;
  standings: ReturnType<typeof createStandingsTool>;
  head2head: ReturnType<typeof createHead2HeadTool>;
  predictions: ReturnType<typeof createPredictionsTool>;

  /** Every tool, in registration order */
  list(): AnyToolDefinition[];

  get(name: string): AnyToolDefinition | undefined;

  /**
   * Run a tool by name. An unknown name yields a ValidationError result.
   */
  invoke(name: string, input: unknown, options?: ToolInvokeOptions): Promise<ToolResult<object>>;
}

export function createToolset(
  orchestrator: FetchOrchestrator<ApiSportsEnvelope>,
  upstream: UpstreamCall<ApiSportsEnvelope>,
  options: Pick<ToolContext, 'logger' | 'requestId'> = {}
): Toolset {
  const context: ToolContext = { orchestrator, upstream, ...options };

  const teamsSearch = createTeamsSearchTool(context);
  const fixturesGet = createFixturesGetTool(context);
  const teamStatistics = createTeamStatisticsTool(context);
  const standings = createStandingsTool(context);
  const head2head = createHead2HeadTool(context);
  const predictions = createPredictionsTool(context);

  const registry = new Map<string, AnyToolDefinition>([
    [teamsSearch.name, teamsSearch],
    [fixturesGet.name, fixturesGet],
    [teamStatistics.name, teamStatistics],
    [standings.name, standings],
    [head2head.name, head2head],
    [predictions.name, predictions],
  ]);

  return {
    teamsSearch,
    fixturesGet,
    teamStatistics,
    standings,
    head2head,
    predictions,
    list: () => [...registry.values()],
    get: (name) => registry.get(name),
    invoke: async (name, input, invokeOptions) => {
      const tool = registry.get(name);
      if (!tool) {
        const error = new ValidationError(`Unknown tool: ${name}`, { tool: name });
        return {
          error: error.message,
          code: error.code,
          retry_later: false,
          request_id: (options.requestId ?? randomUUID)(),
        };
      }
      return tool.handler(input, invokeOptions);
    },
  };
}
