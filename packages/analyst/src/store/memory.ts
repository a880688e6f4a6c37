import type { LeagueRecord, MatchRecord, TeamDataset, TeamRecord } from './records.js';
import { normalizeName } from './records.js';
import type { StoreCallOptions, TeamStore } from './types.js';

function throwIfAborted(options: StoreCallOptions | undefined): void {
  options?.signal?.throwIfAborted();
}

/**
 * In-process store over a fixed dataset. Used by tests and when no store
 * service or data file is configured.
 */
export function createMemoryTeamStore(dataset: TeamDataset): TeamStore {
  const teams = new Map<string, TeamRecord>();
  const leagues = new Map<string, LeagueRecord>();

  for (const team of dataset.teams) {
    teams.set(normalizeName(team.name), team);
  }
  for (const league of dataset.leagues) {
    leagues.set(normalizeName(league.name), league);
  }

  return {
    name: 'memory',
    async findTeam(teamName, options) {
      throwIfAborted(options);
      return teams.get(normalizeName(teamName)) ?? null;
    },
    async findLeague(leagueName, options) {
      throwIfAborted(options);
      return leagues.get(normalizeName(leagueName)) ?? null;
    },
    async findMatches(teamName, options): Promise<ReadonlyArray<MatchRecord>> {
      throwIfAborted(options);
      const key = normalizeName(teamName);
      return dataset.matches.filter(
        (match) => normalizeName(match.home_team) === key || normalizeName(match.away_team) === key,
      );
    },
  };
}
