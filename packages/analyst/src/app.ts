import { fileURLToPath } from 'node:url';
import {
  AnthropicAdapter,
  Client,
  DEFAULT_RETRY_POLICY,
  OPENAI_BASE_URL,
  OpenAICompatibleAdapter,
} from '@pitchside/llm';
import type { ProviderAdapter } from '@pitchside/llm';
import { DEFAULT_CATALOG, bindCatalog, loadCatalogFile, parseCatalog } from './catalog/index.js';
import type { CatalogEntry } from './catalog/index.js';
import type { AnalystConfig } from './config/index.js';
import { makeLogger } from './observability/logger.js';
import type { Logger } from './observability/logger.js';
import { createModelLoggingMiddleware } from './observability/model-logging.js';
import { createQueryOrchestrator } from './orchestrator/index.js';
import type { QueryOrchestrator } from './orchestrator/index.js';
import { createFunctionRegistry, registryView } from './registry/index.js';
import type { FunctionRegistryView } from './registry/index.js';
import { createDataStoreAccessor, createHttpTeamStore, loadJsonTeamStore } from './store/index.js';
import type { TeamStore } from './store/index.js';

export const BUNDLED_DATA_PATH = fileURLToPath(new URL('../data/teams.json', import.meta.url));

/** Replacements for the pieces the config would otherwise build; used by tests and embedders. */
export type AnalystOverrides = {
  readonly logger?: Logger;
  readonly adapter?: ProviderAdapter;
  readonly store?: TeamStore;
  readonly catalog?: ReadonlyArray<CatalogEntry>;
};

export type Analyst = {
  readonly registry: FunctionRegistryView;
  readonly orchestrator: QueryOrchestrator;
  readonly store: TeamStore;
  readonly logger: Logger;
  readonly answer: QueryOrchestrator['answer'];
  readonly run: QueryOrchestrator['run'];
  readonly close: () => Promise<void>;
};

export function createProviderAdapter(llm: AnalystConfig['llm']): ProviderAdapter {
  switch (llm.provider) {
    case 'openai':
      return new OpenAICompatibleAdapter(llm.apiKey, llm.baseUrl ?? OPENAI_BASE_URL, { name: 'openai' });
    case 'openai-compatible':
      return new OpenAICompatibleAdapter(llm.apiKey, llm.baseUrl ?? OPENAI_BASE_URL);
    case 'anthropic':
      return new AnthropicAdapter(llm.apiKey, { baseUrl: llm.baseUrl ?? undefined });
  }
}

async function resolveStore(config: AnalystConfig): Promise<TeamStore> {
  if (config.store.url) {
    return createHttpTeamStore({ baseUrl: config.store.url, apiKey: config.store.apiKey ?? undefined });
  }
  return loadJsonTeamStore(config.store.dataPath ?? BUNDLED_DATA_PATH);
}

async function resolveCatalog(config: AnalystConfig): Promise<ReadonlyArray<CatalogEntry>> {
  if (config.catalogPath) {
    return loadCatalogFile(config.catalogPath);
  }
  return parseCatalog(DEFAULT_CATALOG);
}

/**
 * Builds the registry, store and orchestrator from configuration. Any
 * catalog, store or duplicate-name problem surfaces here, before the first
 * query.
 */
export async function createAnalyst(config: AnalystConfig, overrides: AnalystOverrides = {}): Promise<Analyst> {
  const logger = overrides.logger ?? makeLogger({
    level: config.log.level,
    serviceName: config.log.serviceName,
  });

  const store = overrides.store ?? await resolveStore(config);
  const catalog = overrides.catalog ? parseCatalog(overrides.catalog) : await resolveCatalog(config);

  const accessor = createDataStoreAccessor({ store, timeoutMs: config.store.timeoutMs, logger });
  const registry = createFunctionRegistry();
  bindCatalog(registry, catalog, accessor);

  const adapter = overrides.adapter ?? createProviderAdapter(config.llm);
  const client = new Client({
    providers: { [adapter.name]: adapter },
    defaultProvider: adapter.name,
    middleware: [createModelLoggingMiddleware(logger)],
  });

  const orchestrator = createQueryOrchestrator({
    client,
    registry,
    model: config.llm.model,
    modelTimeoutMs: config.llm.timeoutMs,
    retryPolicy: { ...DEFAULT_RETRY_POLICY, maxRetries: config.llm.maxRetries },
    logger,
  });

  logger.info(
    { provider: adapter.name, model: config.llm.model, store: store.name, functions: registry.names() },
    'analyst ready',
  );

  return {
    registry: registryView(registry),
    orchestrator,
    store,
    logger,
    answer: orchestrator.answer,
    run: orchestrator.run,
    close: () => client.close(),
  };
}
