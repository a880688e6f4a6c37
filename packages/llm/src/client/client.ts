import type { LLMRequest, LLMResponse, Middleware, ProviderAdapter } from '../types/index.js';
import { ConfigurationError } from '../types/index.js';
import { executeMiddlewareChain } from './middleware.js';

export type ClientConfig = {
  readonly providers: Record<string, ProviderAdapter>;
  readonly defaultProvider?: string;
  readonly middleware?: ReadonlyArray<Middleware>;
};

export class Client {
  private readonly providers: Record<string, ProviderAdapter>;
  private readonly defaultProvider: string | null;
  private readonly middlewares: ReadonlyArray<Middleware>;

  constructor(config: ClientConfig) {
    this.providers = config.providers;
    this.middlewares = config.middleware ?? [];

    // A single registered provider becomes the default
    if (config.defaultProvider === undefined) {
      const providerNames = Object.keys(config.providers);
      this.defaultProvider = providerNames.length === 1 ? providerNames[0] ?? null : null;
    } else {
      this.defaultProvider = config.defaultProvider;
    }
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const provider = this.resolveProvider(request);
    const adapter = this.providers[provider];

    if (!adapter) {
      throw new ConfigurationError(`provider '${provider}' not configured`);
    }

    return executeMiddlewareChain(this.middlewares, request, (req) => adapter.complete(req));
  }

  async close(): Promise<void> {
    const closePromises = Object.values(this.providers)
      .filter((adapter) => adapter.close !== undefined)
      .map((adapter) => adapter.close?.());

    await Promise.allSettled(closePromises);
  }

  private resolveProvider(request: LLMRequest): string {
    if (request.provider) {
      return request.provider;
    }

    if (this.defaultProvider) {
      return this.defaultProvider;
    }

    throw new ConfigurationError('no provider configured and no default set');
  }
}
