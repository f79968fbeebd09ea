/**
 * predictions: upstream prediction and advice for one fixture.
 */

import { UpstreamError } from '../api/errors.js';
import type { ApiSportsEnvelope, PredictionItem } from '../types/schemas/api-sports.js';
import { PredictionItemSchema } from '../types/schemas/api-sports.js';
import { PredictionsInputSchema } from '../types/schemas/tools.js';
import type { ToolContext, ToolDefinition } from './base.js';
import { defineTool, parseResponseItems, validateItems } from './base.js';

type StatBlock = Record<string, unknown> | null;

export interface PredictionSummary {
  winner: StatBlock;
  win_or_draw: boolean | null;
  under_over: string | null;
  goals: StatBlock;
  advice: string | null;
  percent: StatBlock;
  league: StatBlock;
  teams: StatBlock;
  comparison: StatBlock;
  h2h: unknown[];
}

export interface PredictionsResult {
  fixture_id: number;
  predictions: PredictionSummary;
}

export const NO_PREDICTIONS_MESSAGE = 'No predictions found for this fixture';

export function shapePrediction(item: PredictionItem): PredictionSummary {
  const prediction = item.predictions;

  return {
    winner: prediction?.winner ?? null,
    win_or_draw: prediction?.win_or_draw ?? null,
    under_over: prediction?.under_over ?? null,
    goals: prediction?.goals ?? null,
    advice: prediction?.advice ?? null,
    percent: prediction?.percent ?? null,
    league: item.league ?? null,
    teams: item.teams ?? null,
    comparison: item.comparison ?? null,
    h2h: item.h2h ?? [],
  };
}

export function shapePredictions(envelope: ApiSportsEnvelope, fixture: number): PredictionsResult {
  const first = parseResponseItems(envelope, PredictionItemSchema, 'prediction')[0];
  if (!first) {
    throw new UpstreamError(NO_PREDICTIONS_MESSAGE, { status: 200 });
  }
  return { fixture_id: fixture, predictions: shapePrediction(first) };
}

export function createPredictionsTool(
  context: ToolContext
): ToolDefinition<typeof PredictionsInputSchema, PredictionsResult> {
  return defineTool(context, {
    name: 'predictions',
    description: 'Get match predictions and betting advice for a fixture',
    inputSchema: PredictionsInputSchema,
    family: 'predictions',
    toParams: (input) => input,
    validate: validateItems(PredictionItemSchema, 'prediction'),
    shape: (envelope, input) => shapePredictions(envelope, input.fixture),
  });
}
