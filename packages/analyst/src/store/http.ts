import { NotFoundError, fetchWithTimeout } from '@pitchside/llm';
import type { StoreCallOptions, TeamStore } from './types.js';

export type HttpTeamStoreOptions = {
  readonly baseUrl: string;
  readonly apiKey?: string;
};

/**
 * REST client for a team data service.
 *
 *   GET {baseUrl}/teams/:name
 *   GET {baseUrl}/teams/:name/matches
 *   GET {baseUrl}/leagues/:name
 *
 * A 404 means the entity does not exist and resolves to null. Timeouts are
 * left to the caller's signal.
 */
export function createHttpTeamStore(options: HttpTeamStoreOptions): TeamStore {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');
  const headers: Record<string, string> = { Accept: 'application/json' };
  if (options.apiKey) {
    headers['Authorization'] = `Bearer ${options.apiKey}`;
  }

  async function get(path: string, callOptions: StoreCallOptions | undefined): Promise<unknown> {
    try {
      const { body } = await fetchWithTimeout({
        url: `${baseUrl}${path}`,
        method: 'GET',
        headers,
        signal: callOptions?.signal,
        provider: 'team-store',
      });
      return body;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return null;
      }
      throw error;
    }
  }

  return {
    name: `http:${baseUrl}`,
    findTeam(teamName, callOptions) {
      return get(`/teams/${encodeURIComponent(teamName.trim())}`, callOptions);
    },
    findLeague(leagueName, callOptions) {
      return get(`/leagues/${encodeURIComponent(leagueName.trim())}`, callOptions);
    },
    findMatches(teamName, callOptions) {
      return get(`/teams/${encodeURIComponent(teamName.trim())}/matches`, callOptions);
    },
  };
}
