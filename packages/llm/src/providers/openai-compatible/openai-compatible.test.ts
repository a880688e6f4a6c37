import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAICompatibleAdapter } from './index.js';
import { ServerError, type LLMRequest } from '../../types/index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const textReply = {
  id: 'chatcmpl-123',
  model: 'gpt-test',
  choices: [{ message: { role: 'assistant', content: 'hi' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
};

function sentRequest(): { url: string; headers: Record<string, string>; body: Record<string, unknown> } {
  const call = vi.mocked(globalThis.fetch).mock.calls[0];
  const init = call?.[1];
  return {
    url: String(call?.[0]),
    headers: Object.fromEntries(Object.entries(init?.headers ?? {})),
    body: JSON.parse(String(init?.body)),
  };
}

describe('OpenAICompatibleAdapter', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse(textReply)));
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('request translation', () => {
    it('defaults to the OpenAI endpoint with a bearer token', async () => {
      const adapter = new OpenAICompatibleAdapter('test-key');

      await adapter.complete({ model: 'gpt-test', messages: [{ role: 'user', content: 'hello' }] });

      const { url, headers } = sentRequest();
      expect(url).toBe('https://api.openai.com/v1/chat/completions');
      expect(headers['Authorization']).toBe('Bearer test-key');
    });

    it('uses a custom base URL without a trailing slash', async () => {
      const adapter = new OpenAICompatibleAdapter('test-key', 'http://localhost:4000/');

      await adapter.complete({ model: 'local-model', messages: [] });

      expect(sentRequest().url).toBe('http://localhost:4000/v1/chat/completions');
    });

    it('translates system, tool calls and tool results', async () => {
      const adapter = new OpenAICompatibleAdapter('test-key');
      const request: LLMRequest = {
        model: 'gpt-test',
        system: 'You are an analyst.',
        messages: [
          { role: 'user', content: 'Standings please' },
          {
            role: 'assistant',
            content: [
              {
                kind: 'TOOL_CALL',
                toolCallId: 'call_1',
                toolName: 'get_league_standings',
                args: { league_name: 'Coastal League' },
              },
            ],
          },
          {
            role: 'tool',
            content: [{ kind: 'TOOL_RESULT', toolCallId: 'call_1', content: '{"status":"found"}', isError: false }],
          },
        ],
        tools: [{ name: 'get_league_standings', description: 'League table', parameters: { type: 'object' } }],
        toolChoice: { mode: 'auto' },
        maxTokens: 300,
        temperature: 0.2,
      };

      await adapter.complete(request);

      const { body } = sentRequest();
      expect(body['messages']).toEqual([
        { role: 'system', content: 'You are an analyst.' },
        { role: 'user', content: 'Standings please' },
        {
          role: 'assistant',
          tool_calls: [
            {
              id: 'call_1',
              type: 'function',
              function: { name: 'get_league_standings', arguments: '{"league_name":"Coastal League"}' },
            },
          ],
        },
        { role: 'tool', tool_call_id: 'call_1', content: '{"status":"found"}' },
      ]);
      expect(body['tools']).toEqual([
        {
          type: 'function',
          function: { name: 'get_league_standings', description: 'League table', parameters: { type: 'object' } },
        },
      ]);
      expect(body['tool_choice']).toBe('auto');
      expect(body['max_tokens']).toBe(300);
      expect(body['temperature']).toBe(0.2);
    });

    it('encodes a named tool choice as a function selector', async () => {
      const adapter = new OpenAICompatibleAdapter('test-key');

      await adapter.complete({
        model: 'gpt-test',
        toolChoice: { mode: 'named', toolName: 'get_swot_analysis' },
      });

      expect(sentRequest().body['tool_choice']).toEqual({
        type: 'function',
        function: { name: 'get_swot_analysis' },
      });
    });
  });

  describe('response translation', () => {
    it('parses tool call arguments from their JSON string', async () => {
      vi.mocked(globalThis.fetch).mockImplementation(async () =>
        jsonResponse({
          id: 'chatcmpl-7',
          model: 'gpt-test',
          choices: [
            {
              message: {
                role: 'assistant',
                content: null,
                tool_calls: [
                  {
                    id: 'call_7',
                    type: 'function',
                    function: { name: 'get_team_insights', arguments: '{"team_name":"Riverside"}' },
                  },
                ],
              },
              finish_reason: 'tool_calls',
            },
          ],
          usage: { prompt_tokens: 40, completion_tokens: 12, total_tokens: 52 },
        }),
      );
      const adapter = new OpenAICompatibleAdapter('test-key');

      const response = await adapter.complete({ model: 'gpt-test' });

      expect(response).toEqual({
        id: 'chatcmpl-7',
        model: 'gpt-test',
        content: [
          { kind: 'TOOL_CALL', toolCallId: 'call_7', toolName: 'get_team_insights', args: { team_name: 'Riverside' } },
        ],
        finishReason: 'tool_calls',
        usage: { inputTokens: 40, outputTokens: 12, totalTokens: 52 },
      });
    });

    it('turns malformed argument JSON into an empty object', async () => {
      vi.mocked(globalThis.fetch).mockImplementation(async () =>
        jsonResponse({
          choices: [
            {
              message: {
                tool_calls: [{ id: 'call_8', function: { name: 'get_team_insights', arguments: '{"team_na' } }],
              },
              finish_reason: 'tool_calls',
            },
          ],
        }),
      );
      const adapter = new OpenAICompatibleAdapter('test-key');

      const response = await adapter.complete({ model: 'gpt-test' });

      expect(response.content).toEqual([
        { kind: 'TOOL_CALL', toolCallId: 'call_8', toolName: 'get_team_insights', args: {} },
      ]);
    });

    it('reads text content and the stop reason', async () => {
      const adapter = new OpenAICompatibleAdapter('test-key');

      const response = await adapter.complete({ model: 'gpt-test' });

      expect(response.content).toEqual([{ kind: 'TEXT', text: 'hi' }]);
      expect(response.finishReason).toBe('stop');
    });

    it('labels HTTP errors with the adapter name', async () => {
      vi.mocked(globalThis.fetch).mockImplementation(async () => new Response('overloaded', { status: 503 }));
      const adapter = new OpenAICompatibleAdapter('test-key', 'http://localhost:4000', { name: 'litellm' });

      const error = await adapter.complete({ model: 'gpt-test' }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ provider: 'litellm', statusCode: 503 });
    });
  });
});
