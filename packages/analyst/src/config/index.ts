export { LLM_PROVIDERS, loadConfig } from './config.js';
export type { AnalystConfig, Env, LLMProviderName } from './config.js';
