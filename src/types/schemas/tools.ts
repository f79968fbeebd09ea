/**
 * Tool Input Schemas
 *
 * @module schemas/tools
 */

import { z } from 'zod';
import { IsoDate, MatchCount, NonEmptyString, PositiveInteger, SeasonYear } from './common.js';

export const TeamsSearchInputSchema = z.object({
  id: PositiveInteger.optional().describe('Team ID'),
  name: NonEmptyString.optional().describe('Team name'),
  league: PositiveInteger.optional().describe('League ID'),
  season: SeasonYear.optional().describe('Season year (YYYY)'),
  country: NonEmptyString.optional().describe('Country name'),
  code: z
    .string()
    .regex(/^[A-Za-z]{3}$/, 'Code must be 3 letters')
    .optional()
    .describe('3-letter team code'),
  venue: PositiveInteger.optional().describe('Venue ID'),
  search: z
    .string()
    .min(3, 'Search parameter must be at least 3 characters long')
    .optional()
    .describe('Search string (minimum 3 characters)'),
});

export type TeamsSearchInput = z.infer<typeof TeamsSearchInputSchema>;

export const FixturesGetInputSchema = z.object({
  id: PositiveInteger.optional().describe('Fixture ID'),
  ids: z
    .string()
    .regex(/^\d+(-\d+){0,19}$/, 'ids must be up to 20 fixture IDs separated by "-"')
    .optional()
    .describe('Multiple fixture IDs (delimiter "-", max 20)'),
  live: NonEmptyString.optional().describe('"all" or league IDs separated by "-"'),
  date: IsoDate.optional().describe('Date (YYYY-MM-DD)'),
  league: PositiveInteger.optional().describe('League ID'),
  season: SeasonYear.optional().describe('Season year (YYYY)'),
  team: PositiveInteger.optional().describe('Team ID'),
  last: MatchCount.optional().describe('Last N matches (max 2 digits)'),
  next: MatchCount.optional().describe('Next N matches (max 2 digits)'),
  from_date: IsoDate.optional().describe('Start date (YYYY-MM-DD)'),
  to_date: IsoDate.optional().describe('End date (YYYY-MM-DD)'),
  round: NonEmptyString.optional().describe('Round name'),
  status: NonEmptyString.optional().describe('Match status (NS, PST, FT, ...)'),
  venue: PositiveInteger.optional().describe('Venue ID'),
  timezone: NonEmptyString.optional().describe('Timezone for dates'),
});

export type FixturesGetInput = z.infer<typeof FixturesGetInputSchema>;

export const TeamStatisticsInputSchema = z.object({
  league: PositiveInteger.describe('League ID'),
  season: SeasonYear.describe('Season year (YYYY)'),
  team: PositiveInteger.describe('Team ID'),
  date: IsoDate.optional().describe('Statistics snapshot date (YYYY-MM-DD)'),
});

export type TeamStatisticsInput = z.infer<typeof TeamStatisticsInputSchema>;

export const StandingsInputSchema = z.object({
  league: PositiveInteger.describe('League ID'),
  season: SeasonYear.describe('Season year (YYYY)'),
  team: PositiveInteger.optional().describe('Team ID'),
});

export type StandingsInput = z.infer<typeof StandingsInputSchema>;

export const Head2HeadInputSchema = z.object({
  h2h: z
    .string()
    .regex(/^\d+-\d+$/, "h2h parameter must be in format 'team1-team2' (e.g., '33-34')")
    .describe('Team IDs separated by "-", e.g. 33-34'),
  date: IsoDate.optional().describe('Date (YYYY-MM-DD)'),
  league: PositiveInteger.optional().describe('League ID'),
  season: SeasonYear.optional().describe('Season year (YYYY)'),
  last: MatchCount.optional().describe('Last N matches (max 2 digits)'),
  next: MatchCount.optional().describe('Next N matches (max 2 digits)'),
  from_date: IsoDate.optional().describe('Start date (YYYY-MM-DD)'),
  to_date: IsoDate.optional().describe('End date (YYYY-MM-DD)'),
  status: NonEmptyString.optional().describe('Match status (NS, FT, ...)'),
  venue: PositiveInteger.optional().describe('Venue ID'),
  timezone: NonEmptyString.optional().describe('Timezone for dates'),
});

export type Head2HeadInput = z.infer<typeof Head2HeadInputSchema>;

export const PredictionsInputSchema = z.object({
  fixture: PositiveInteger.describe('Fixture ID'),
});

export type PredictionsInput = z.infer<typeof PredictionsInputSchema>;
