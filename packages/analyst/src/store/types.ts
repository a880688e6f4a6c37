export type StoreCallOptions = {
  readonly signal?: AbortSignal;
};

/**
 * The external team data store. Methods return raw, unvalidated records, or
 * `null` when the entity does not exist. Any other failure is thrown.
 */
export interface TeamStore {
  readonly name: string;
  findTeam(teamName: string, options?: StoreCallOptions): Promise<unknown>;
  findLeague(leagueName: string, options?: StoreCallOptions): Promise<unknown>;
  /** Every stored match the team played in, in any order. */
  findMatches(teamName: string, options?: StoreCallOptions): Promise<unknown>;
}
