import { ZodError, z } from 'zod';
import { ConfigValidationError } from '../types/index.js';
import type { LogLevel } from '../observability/logger.js';

export const LLM_PROVIDERS = ['openai', 'anthropic', 'openai-compatible'] as const;

export type LLMProviderName = (typeof LLM_PROVIDERS)[number];

const DEFAULT_MODELS: Readonly<Record<LLMProviderName, string | null>> = {
  openai: 'gpt-4o-mini',
  anthropic: 'claude-3-5-haiku-latest',
  'openai-compatible': null,
};

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
  LLM_PROVIDER: z.enum(LLM_PROVIDERS).default('openai'),
  LLM_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  LLM_BASE_URL: z.string().url().optional(),
  LLM_MODEL: z.string().optional(),

  MODEL_TIMEOUT_MS: positiveInt.default(30000),
  STORE_TIMEOUT_MS: positiveInt.default(5000),
  MODEL_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),

  STORE_URL: z.string().url().optional(),
  STORE_API_KEY: z.string().optional(),
  STORE_DATA_PATH: z.string().optional(),
  CATALOG_PATH: z.string().optional(),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SERVICE_NAME: z.string().default('pitchside'),
});

export type AnalystConfig = {
  readonly llm: {
    readonly provider: LLMProviderName;
    readonly apiKey: string;
    readonly baseUrl: string | null;
    readonly model: string;
    readonly timeoutMs: number;
    readonly maxRetries: number;
  };
  readonly store: {
    readonly url: string | null;
    readonly apiKey: string | null;
    readonly dataPath: string | null;
    readonly timeoutMs: number;
  };
  readonly catalogPath: string | null;
  readonly log: {
    readonly level: LogLevel;
    readonly serviceName: string;
  };
};

export type Env = Readonly<Record<string, string | undefined>>;

// Unset and empty are the same thing in a .env file.
function nonEmpty(env: Env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

function fromZodError(error: ZodError): ConfigValidationError {
  const missing = new Set<string>();
  const invalid = new Set<string>();

  for (const issue of error.issues) {
    const key = issue.path[0]?.toString();
    if (!key) continue;

    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      missing.add(key);
    } else {
      invalid.add(key);
    }
  }

  return new ConfigValidationError([...missing], [...invalid]);
}

/**
 * Validates the environment once at startup.
 *
 * The model API key falls back to OPENAI_API_KEY or ANTHROPIC_API_KEY
 * depending on the provider. An openai-compatible server needs a base URL
 * and a model name but may run without a key.
 */
export function loadConfig(env: Env): AnalystConfig {
  let parsed: z.infer<typeof envSchema>;
  try {
    parsed = envSchema.parse(nonEmpty(env));
  } catch (error) {
    if (error instanceof ZodError) {
      throw fromZodError(error);
    }
    throw error;
  }

  const provider = parsed.LLM_PROVIDER;
  const fallbackKey = provider === 'anthropic' ? parsed.ANTHROPIC_API_KEY : parsed.OPENAI_API_KEY;
  const apiKey = parsed.LLM_API_KEY ?? (provider === 'openai-compatible' ? '' : fallbackKey);
  const model = parsed.LLM_MODEL ?? DEFAULT_MODELS[provider];

  const missing: Array<string> = [];
  if (apiKey === undefined) missing.push('LLM_API_KEY');
  if (model === null) missing.push('LLM_MODEL');
  if (provider === 'openai-compatible' && parsed.LLM_BASE_URL === undefined) missing.push('LLM_BASE_URL');
  if (apiKey === undefined || model === null || missing.length > 0) {
    throw new ConfigValidationError(missing, []);
  }

  return {
    llm: {
      provider,
      apiKey,
      baseUrl: parsed.LLM_BASE_URL ?? null,
      model,
      timeoutMs: parsed.MODEL_TIMEOUT_MS,
      maxRetries: parsed.MODEL_MAX_RETRIES,
    },
    store: {
      url: parsed.STORE_URL ?? null,
      apiKey: parsed.STORE_API_KEY ?? null,
      dataPath: parsed.STORE_DATA_PATH ?? null,
      timeoutMs: parsed.STORE_TIMEOUT_MS,
    },
    catalogPath: parsed.CATALOG_PATH ?? null,
    log: {
      level: parsed.LOG_LEVEL,
      serviceName: parsed.SERVICE_NAME,
    },
  };
}
