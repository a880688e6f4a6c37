// @pitchside/llm: provider-neutral model client with function calling

export * from './types/index.js';
export * from './client/index.js';
export { fetchWithTimeout, type FetchOptions, type FetchResult } from './utils/http.js';
export { mapHttpError, parseRetryAfter } from './utils/error-mapping.js';
export { retry, calculateBackoff, DEFAULT_RETRY_POLICY, type RetryOptions } from './utils/retry.js';
export { OpenAICompatibleAdapter, OPENAI_BASE_URL } from './providers/openai-compatible/index.js';
export { AnthropicAdapter, ANTHROPIC_BASE_URL } from './providers/anthropic/index.js';
