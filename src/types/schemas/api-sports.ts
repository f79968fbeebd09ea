/**
 * Upstream Response Schemas
 *
 * Zod schemas for the sports-data API envelope and the items the tools
 * shape. Every item field is optional: the upstream omits or nulls fields
 * freely, and a missing field must not fail the whole response.
 *
 * @module schemas/api-sports
 */

import { z } from 'zod';

const OptionalString = z.string().nullish();
const OptionalNumber = z.number().nullish();
const OptionalBoolean = z.boolean().nullish();

/**
 * Envelope every endpoint answers with
 */
export const ApiSportsEnvelopeSchema = z.object({
  get: z.string().optional(),
  parameters: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
  errors: z.union([z.record(z.unknown()), z.array(z.unknown())]).optional(),
  results: z.number().optional(),
  paging: z
    .object({
      current: z.number().optional(),
      total: z.number().optional(),
    })
    .optional(),
  response: z.unknown(),
});

export type ApiSportsEnvelope = z.infer<typeof ApiSportsEnvelopeSchema>;

export const TeamItemSchema = z.object({
  team: z
    .object({
      id: OptionalNumber,
      name: OptionalString,
      code: OptionalString,
      country: OptionalString,
      founded: OptionalNumber,
      national: OptionalBoolean,
      logo: OptionalString,
    })
    .nullish(),
  venue: z
    .object({
      id: OptionalNumber,
      name: OptionalString,
      address: OptionalString,
      city: OptionalString,
      capacity: OptionalNumber,
      surface: OptionalString,
      image: OptionalString,
    })
    .nullish(),
});

export type TeamItem = z.infer<typeof TeamItemSchema>;

const ScorePairSchema = z
  .object({
    home: OptionalNumber,
    away: OptionalNumber,
  })
  .nullish();

const FixtureSideSchema = z
  .object({
    id: OptionalNumber,
    name: OptionalString,
    logo: OptionalString,
    winner: OptionalBoolean,
  })
  .nullish();

export const FixtureItemSchema = z.object({
  fixture: z
    .object({
      id: OptionalNumber,
      referee: OptionalString,
      timezone: OptionalString,
      date: OptionalString,
      timestamp: OptionalNumber,
      venue: z
        .object({
          id: OptionalNumber,
          name: OptionalString,
          city: OptionalString,
        })
        .nullish(),
      status: z
        .object({
          long: OptionalString,
          short: OptionalString,
          elapsed: OptionalNumber,
        })
        .nullish(),
    })
    .nullish(),
  league: z
    .object({
      id: OptionalNumber,
      name: OptionalString,
      country: OptionalString,
      logo: OptionalString,
      flag: OptionalString,
      season: OptionalNumber,
      round: OptionalString,
    })
    .nullish(),
  teams: z
    .object({
      home: FixtureSideSchema,
      away: FixtureSideSchema,
    })
    .nullish(),
  goals: ScorePairSchema,
  score: z
    .object({
      halftime: ScorePairSchema,
      fulltime: ScorePairSchema,
      extratime: ScorePairSchema,
      penalty: ScorePairSchema,
    })
    .nullish(),
});

export type FixtureItem = z.infer<typeof FixtureItemSchema>;

const StatBlockSchema = z.record(z.unknown()).nullish();

export const TeamStatisticsItemSchema = z.object({
  league: z
    .object({
      id: OptionalNumber,
      name: OptionalString,
      country: OptionalString,
      logo: OptionalString,
      flag: OptionalString,
      season: OptionalNumber,
    })
    .nullish(),
  team: z
    .object({
      id: OptionalNumber,
      name: OptionalString,
      logo: OptionalString,
    })
    .nullish(),
  form: OptionalString,
  fixtures: StatBlockSchema,
  goals: StatBlockSchema,
  biggest: StatBlockSchema,
  clean_sheet: StatBlockSchema,
  failed_to_score: StatBlockSchema,
  penalty: StatBlockSchema,
  lineups: z.array(z.record(z.unknown())).nullish(),
  cards: StatBlockSchema,
});

export type TeamStatisticsItem = z.infer<typeof TeamStatisticsItemSchema>;

const StandingRowSchema = z.object({
  rank: OptionalNumber,
  team: z
    .object({
      id: OptionalNumber,
      name: OptionalString,
      logo: OptionalString,
    })
    .nullish(),
  points: OptionalNumber,
  goalsDiff: OptionalNumber,
  group: OptionalString,
  form: OptionalString,
  status: OptionalString,
  description: OptionalString,
  all: StatBlockSchema,
  home: StatBlockSchema,
  away: StatBlockSchema,
  update: OptionalString,
});

export type StandingRow = z.infer<typeof StandingRowSchema>;

/** Grouped tables arrive as a list of lists; the first group is the table. */
function firstGroup(value: unknown): unknown {
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    if (Array.isArray(first)) {
      return first;
    }
  }
  return value;
}

export const StandingsItemSchema = z.object({
  league: z
    .object({
      id: OptionalNumber,
      name: OptionalString,
      country: OptionalString,
      logo: OptionalString,
      flag: OptionalString,
      season: OptionalNumber,
      standings: z.preprocess(firstGroup, z.array(StandingRowSchema).nullish()),
    })
    .nullish(),
});

export type StandingsItem = z.infer<typeof StandingsItemSchema>;

export const PredictionItemSchema = z.object({
  predictions: z
    .object({
      winner: StatBlockSchema,
      win_or_draw: OptionalBoolean,
      under_over: OptionalString,
      goals: StatBlockSchema,
      advice: OptionalString,
      percent: StatBlockSchema,
    })
    .nullish(),
  league: StatBlockSchema,
  teams: StatBlockSchema,
  comparison: StatBlockSchema,
  h2h: z.array(z.unknown()).nullish(),
});

export type PredictionItem = z.infer<typeof PredictionItemSchema>;
