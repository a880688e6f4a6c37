export { createDataStoreAccessor, DEFAULT_MATCH_LIMIT, MAX_MATCH_LIMIT } from './accessor.js';
export type {
  DataStoreAccessor,
  DataStoreAccessorOptions,
  LeagueQuery,
  MatchHistoryQuery,
  MatchResult,
  MatchView,
  TeamQuery,
} from './accessor.js';
export { createMemoryTeamStore } from './memory.js';
export { loadJsonTeamStore } from './json-file.js';
export { createHttpTeamStore } from './http.js';
export type { HttpTeamStoreOptions } from './http.js';
export * from './records.js';
export type { StoreCallOptions, TeamStore } from './types.js';
