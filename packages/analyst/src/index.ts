// @pitchside/analyst: function-calling query layer over team data

export * from './types/index.js';
export * from './registry/index.js';
export * from './store/index.js';
export * from './catalog/index.js';
export * from './orchestrator/index.js';
export * from './config/index.js';
export { makeLogger, makeNoopLogger, REDACT_PATHS } from './observability/logger.js';
export type { Logger, LoggerOptions, LogLevel } from './observability/logger.js';
export { createModelLoggingMiddleware } from './observability/model-logging.js';
export { BUNDLED_DATA_PATH, createAnalyst, createProviderAdapter } from './app.js';
export type { Analyst, AnalystOverrides } from './app.js';
