import type { ErrorKind } from '../types/index.js';

export const SYSTEM_PROMPT = `You are a football analyst answering questions about teams, leagues and matches.

Answer only from data returned by the functions you are given. Call a function whenever the question needs team, league or match data, and pass names exactly as the user wrote them.
If a function reports that a team or league was not found, say that there is no data for it. Do not guess or invent statistics.
Keep answers to a few sentences and quote the figures you used.`;

/** What the user sees when a query fails. Never includes error detail. */
export const FAILURE_MESSAGES: Readonly<Record<ErrorKind, string>> = {
  UnknownFunctionError: "Sorry, I couldn't work out which data to look up for that question.",
  InvalidArgumentError: "Sorry, I couldn't work out the details needed to look that up. Could you rephrase the question?",
  DataAccessError: 'Sorry, the team data service is unavailable right now. Please try again later.',
  ModelUnavailableError: 'Sorry, the analysis service is unavailable right now. Please try again later.',
  QueryCancelledError: 'The query was cancelled.',
  DuplicateNameError: 'Sorry, the analyst is not configured correctly.',
  CatalogValidationError: 'Sorry, the analyst is not configured correctly.',
  ConfigValidationError: 'Sorry, the analyst is not configured correctly.',
};
