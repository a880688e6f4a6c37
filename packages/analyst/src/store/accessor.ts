import { z } from 'zod';
import type { Logger } from '../observability/logger.js';
import {
  DataAccessError,
  QueryCancelledError,
  found,
  isPitchsideError,
  notFound,
} from '../types/index.js';
import type { DispatchContext, FunctionResult } from '../types/index.js';
import {
  leagueRecordSchema,
  matchRecordSchema,
  normalizeName,
  teamRecordSchema,
} from './records.js';
import type { MatchRecord, TeamRecord } from './records.js';
import type { TeamStore } from './types.js';

export const DEFAULT_MATCH_LIMIT = 5;
export const MAX_MATCH_LIMIT = 50;

export type TeamQuery = {
  readonly team_name: string;
};

export type LeagueQuery = {
  readonly league_name: string;
};

export type MatchHistoryQuery = {
  readonly team_name: string;
  readonly opponent?: string;
  readonly limit?: number;
};

export type MatchResult = 'W' | 'D' | 'L';

export type MatchView = {
  readonly date: string;
  readonly competition: string;
  readonly opponent: string;
  readonly venue: 'home' | 'away';
  readonly goals_for: number;
  readonly goals_against: number;
  readonly result: MatchResult;
};

/**
 * One lookup per query category. A missing entity resolves to the not-found
 * sentinel; every other failure rejects with DataAccessError, or with
 * QueryCancelledError when the caller's signal fires first.
 */
export interface DataStoreAccessor {
  teamInsights(query: TeamQuery, context?: DispatchContext): Promise<FunctionResult>;
  standings(query: LeagueQuery, context?: DispatchContext): Promise<FunctionResult>;
  matchHistory(query: MatchHistoryQuery, context?: DispatchContext): Promise<FunctionResult>;
  swotAnalysis(query: TeamQuery, context?: DispatchContext): Promise<FunctionResult>;
}

export type DataStoreAccessorOptions = {
  readonly store: TeamStore;
  readonly timeoutMs: number;
  readonly logger: Logger;
};

function parseRecord<T extends z.ZodTypeAny>(schema: T, raw: unknown, entity: string): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
  throw new DataAccessError(`malformed ${entity} record: ${issues.join('; ')}`);
}

function toMatchView(match: MatchRecord, team: TeamRecord): MatchView {
  const home = normalizeName(match.home_team) === normalizeName(team.name);
  const goalsFor = home ? match.home_goals : match.away_goals;
  const goalsAgainst = home ? match.away_goals : match.home_goals;
  let result: MatchResult = 'D';
  if (goalsFor > goalsAgainst) {
    result = 'W';
  } else if (goalsFor < goalsAgainst) {
    result = 'L';
  }

  return {
    date: match.date,
    competition: match.competition,
    opponent: home ? match.away_team : match.home_team,
    venue: home ? 'home' : 'away',
    goals_for: goalsFor,
    goals_against: goalsAgainst,
    result,
  };
}

function matchLimit(limit: number | undefined): number {
  if (limit === undefined || limit < 1) {
    return DEFAULT_MATCH_LIMIT;
  }
  return Math.min(limit, MAX_MATCH_LIMIT);
}

const nullableTeam = teamRecordSchema.nullable();
const nullableLeague = leagueRecordSchema.nullable();
const nullableMatches = z.array(matchRecordSchema).nullable();

export function createDataStoreAccessor(options: DataStoreAccessorOptions): DataStoreAccessor {
  const { store, timeoutMs } = options;
  const log = options.logger.child({ component: 'accessor', store: store.name });

  async function run(
    operation: string,
    context: DispatchContext,
    body: (signal: AbortSignal) => Promise<FunctionResult>,
  ): Promise<FunctionResult> {
    const external = context.signal;
    if (external?.aborted) {
      throw new QueryCancelledError(`${operation} cancelled`);
    }

    const controller = new AbortController();
    const timer = setTimeout(() => {
      controller.abort(new DataAccessError(`${operation} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onExternalAbort = () => {
      controller.abort(new QueryCancelledError(`${operation} cancelled`));
    };
    external?.addEventListener('abort', onExternalAbort, { once: true });

    // Settles when the store call is abandoned, even if the store ignores the signal.
    const abandoned = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => {
          const reason: unknown = controller.signal.reason;
          reject(reason instanceof Error ? reason : new DataAccessError(`${operation} aborted`));
        },
        { once: true },
      );
    });

    try {
      const result = await Promise.race([body(controller.signal), abandoned]);
      log.debug({ operation, status: result.status }, 'store lookup finished');
      return result;
    } catch (error) {
      if (error instanceof QueryCancelledError) {
        log.debug({ operation }, 'store lookup cancelled');
        throw error;
      }
      const failure = isPitchsideError(error)
        ? error
        : new DataAccessError(
          `${operation} failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined,
        );
      log.error({ operation, err: failure, cause: failure.cause?.message }, 'data access failed');
      throw failure;
    } finally {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
    }
  }

  return {
    teamInsights(query, context = {}) {
      return run('teamInsights', context, async (signal) => {
        const team = parseRecord(nullableTeam, await store.findTeam(query.team_name, { signal }), 'team');
        if (!team) {
          return notFound('team', query.team_name.trim());
        }
        return found({
          team: team.name,
          league: team.league,
          strengths: team.strengths,
          weaknesses: team.weaknesses,
          goal_stats: {
            scored: team.goal_stats.scored,
            conceded: team.goal_stats.conceded,
            difference: team.goal_stats.scored - team.goal_stats.conceded,
          },
        });
      });
    },

    standings(query, context = {}) {
      return run('standings', context, async (signal) => {
        const league = parseRecord(nullableLeague, await store.findLeague(query.league_name, { signal }), 'league');
        if (!league) {
          return notFound('league', query.league_name.trim());
        }
        return found({
          league: league.name,
          season: league.season,
          table: [...league.table].sort((a, b) => a.position - b.position),
        });
      });
    },

    matchHistory(query, context = {}) {
      return run('matchHistory', context, async (signal) => {
        const team = parseRecord(nullableTeam, await store.findTeam(query.team_name, { signal }), 'team');
        if (!team) {
          return notFound('team', query.team_name.trim());
        }

        const stored = parseRecord(nullableMatches, await store.findMatches(team.name, { signal }), 'match') ?? [];
        const opponentKey = query.opponent === undefined ? null : normalizeName(query.opponent);
        const matches = stored
          .map((match) => toMatchView(match, team))
          .filter((match) => opponentKey === null || normalizeName(match.opponent) === opponentKey)
          .sort((a, b) => b.date.localeCompare(a.date))
          .slice(0, matchLimit(query.limit));

        return found({
          team: team.name,
          opponent: query.opponent?.trim() ?? null,
          matches,
          record: {
            won: matches.filter((m) => m.result === 'W').length,
            drawn: matches.filter((m) => m.result === 'D').length,
            lost: matches.filter((m) => m.result === 'L').length,
          },
        });
      });
    },

    swotAnalysis(query, context = {}) {
      return run('swotAnalysis', context, async (signal) => {
        const team = parseRecord(nullableTeam, await store.findTeam(query.team_name, { signal }), 'team');
        if (!team) {
          return notFound('team', query.team_name.trim());
        }
        return found({
          team: team.name,
          strengths: team.strengths,
          weaknesses: team.weaknesses,
          opportunities: team.opportunities,
          threats: team.threats,
        });
      });
    },
  };
}
