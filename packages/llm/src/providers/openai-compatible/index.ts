import type { ProviderAdapter, LLMRequest, LLMResponse } from '../../types/index.js';
import { fetchWithTimeout } from '../../utils/http.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';

export const OPENAI_BASE_URL = 'https://api.openai.com';

/**
 * Chat Completions adapter. Works against OpenAI itself and any server that
 * speaks the same wire format (LiteLLM, vLLM, Groq, a local proxy).
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;

  constructor(apiKey: string, baseUrl: string = OPENAI_BASE_URL, options?: { readonly name?: string }) {
    this.apiKey = apiKey;
    this.baseUrl = baseUrl.replace(/\/+$/, '');
    this.name = options?.name || 'openai-compatible';
  }

  async complete(request: LLMRequest): Promise<LLMResponse> {
    const { url, headers, body } = translateRequest(request, this.apiKey, this.baseUrl);

    const result = await fetchWithTimeout({
      url,
      method: 'POST',
      headers,
      body,
      timeout: request.timeout,
      signal: request.signal,
      provider: this.name,
    });

    return translateResponse(result.body);
  }
}

export { translateRequest, translateResponse };
