import { readFile } from 'node:fs/promises';
import { ZodError } from 'zod';
import { DataAccessError } from '../types/index.js';
import { teamDatasetSchema } from './records.js';
import type { TeamStore } from './types.js';
import { createMemoryTeamStore } from './memory.js';

/**
 * Loads a `{ teams, leagues, matches }` dataset from disk and serves it from
 * memory. The whole file is validated up front.
 */
export async function loadJsonTeamStore(path: string): Promise<TeamStore> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new DataAccessError(`cannot read team data file ${path}`, cause);
  }

  try {
    const dataset = teamDatasetSchema.parse(JSON.parse(text));
    const store = createMemoryTeamStore(dataset);
    return { ...store, name: `json:${path}` };
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new DataAccessError(`invalid team data file ${path}: ${issues.join('; ')}`, error);
    }
    const cause = error instanceof Error ? error : undefined;
    throw new DataAccessError(`invalid team data file ${path}: not JSON`, cause);
  }
}
