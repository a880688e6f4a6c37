import type { CatalogEntry } from './catalog.js';

export const DEFAULT_CATALOG: ReadonlyArray<CatalogEntry> = [
  {
    category: 'team_insights',
    name: 'get_team_insights',
    description:
      'Look up a team\'s strengths, weaknesses and season goal stats (goals scored and conceded). '
      + 'Use for questions about how a team plays or performs.',
    parameters: {
      team_name: { type: 'string', required: true, description: 'Name of the team, e.g. "Lansdowne"' },
    },
  },
  {
    category: 'standings',
    name: 'get_league_standings',
    description: 'Get the current league table: position, points, wins, draws, losses and goal totals per team.',
    parameters: {
      league_name: { type: 'string', required: true, description: 'Name of the league' },
    },
  },
  {
    category: 'match_history',
    name: 'get_match_history',
    description: 'List a team\'s most recent results, newest first. Can be narrowed to games against one opponent.',
    parameters: {
      team_name: { type: 'string', required: true, description: 'Name of the team' },
      opponent: { type: 'string', required: false, description: 'Only include games against this team' },
      limit: { type: 'integer', required: false, description: 'Maximum number of matches to return (default 5)' },
    },
  },
  {
    category: 'swot',
    name: 'get_swot_analysis',
    description: 'Get a SWOT analysis (strengths, weaknesses, opportunities, threats) for a team.',
    parameters: {
      team_name: { type: 'string', required: true, description: 'Name of the team' },
    },
  },
];
