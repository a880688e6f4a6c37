export {
  callModel,
  createQueryContext,
  createQueryOrchestrator,
  decide,
  dispatch,
  draft,
  failed,
  step,
  summarize,
} from './orchestrator.js';
export type { OrchestratorOptions, QueryContext, QueryOrchestrator, RunOptions } from './orchestrator.js';
export { FAILURE_MESSAGES, SYSTEM_PROMPT } from './prompts.js';
