import { z } from 'zod';

const count = z.number().int().nonnegative();

export const goalStatsSchema = z.object({
  scored: count,
  conceded: count,
});

export const teamRecordSchema = z.object({
  name: z.string().min(1),
  league: z.string().min(1),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  opportunities: z.array(z.string()),
  threats: z.array(z.string()),
  goal_stats: goalStatsSchema,
});

export const standingRowSchema = z.object({
  position: z.number().int().positive(),
  team: z.string().min(1),
  played: count,
  won: count,
  drawn: count,
  lost: count,
  goals_for: count,
  goals_against: count,
  points: z.number().int(),
});

export const leagueRecordSchema = z.object({
  name: z.string().min(1),
  season: z.string().min(1),
  table: z.array(standingRowSchema),
});

export const matchRecordSchema = z.object({
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD'),
  competition: z.string().min(1),
  home_team: z.string().min(1),
  away_team: z.string().min(1),
  home_goals: count,
  away_goals: count,
});

export const teamDatasetSchema = z.object({
  teams: z.array(teamRecordSchema),
  leagues: z.array(leagueRecordSchema),
  matches: z.array(matchRecordSchema),
});

export type GoalStats = z.infer<typeof goalStatsSchema>;
export type TeamRecord = z.infer<typeof teamRecordSchema>;
export type StandingRow = z.infer<typeof standingRowSchema>;
export type LeagueRecord = z.infer<typeof leagueRecordSchema>;
export type MatchRecord = z.infer<typeof matchRecordSchema>;
export type TeamDataset = z.infer<typeof teamDatasetSchema>;

/** Lookup key for names: case and surrounding whitespace are not significant. */
export function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}
