import type { DataStoreAccessor } from '../store/index.js';
import { InvalidArgumentError } from '../types/index.js';
import type { FunctionArguments, FunctionHandler, ParameterSpec } from '../types/index.js';

export const QUERY_CATEGORIES = ['team_insights', 'standings', 'match_history', 'swot'] as const;

export type QueryCategory = (typeof QUERY_CATEGORIES)[number];

/**
 * Parameters each category's handler understands. A catalog entry must
 * declare every required one and may declare the optional ones; nothing else.
 */
export const CATEGORY_PARAMETERS: Readonly<Record<QueryCategory, Readonly<Record<string, ParameterSpec>>>> = {
  team_insights: {
    team_name: { type: 'string', required: true },
  },
  standings: {
    league_name: { type: 'string', required: true },
  },
  match_history: {
    team_name: { type: 'string', required: true },
    opponent: { type: 'string', required: false },
    limit: { type: 'integer', required: false },
  },
  swot: {
    team_name: { type: 'string', required: true },
  },
};

// Readers over arguments the registry has already validated.

function optionalString(fn: string, args: FunctionArguments, name: string): string | undefined {
  const value = args[name];
  if (value === undefined || typeof value === 'string') {
    return value;
  }
  throw new InvalidArgumentError(fn, name, `expected string, received ${typeof value}`);
}

function requiredString(fn: string, args: FunctionArguments, name: string): string {
  const value = optionalString(fn, args, name);
  if (value === undefined) {
    throw new InvalidArgumentError(fn, name, 'missing required parameter');
  }
  return value;
}

function optionalNumber(fn: string, args: FunctionArguments, name: string): number | undefined {
  const value = args[name];
  if (value === undefined || typeof value === 'number') {
    return value;
  }
  throw new InvalidArgumentError(fn, name, `expected number, received ${typeof value}`);
}

export function categoryHandler(
  category: QueryCategory,
  accessor: DataStoreAccessor,
  fn: string = category,
): FunctionHandler {
  switch (category) {
    case 'team_insights':
      return (args, context) =>
        accessor.teamInsights({ team_name: requiredString(fn, args, 'team_name') }, context);
    case 'standings':
      return (args, context) =>
        accessor.standings({ league_name: requiredString(fn, args, 'league_name') }, context);
    case 'match_history':
      return (args, context) =>
        accessor.matchHistory(
          {
            team_name: requiredString(fn, args, 'team_name'),
            opponent: optionalString(fn, args, 'opponent'),
            limit: optionalNumber(fn, args, 'limit'),
          },
          context,
        );
    case 'swot':
      return (args, context) =>
        accessor.swotAnalysis({ team_name: requiredString(fn, args, 'team_name') }, context);
  }
}
