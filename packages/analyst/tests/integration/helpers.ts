import { vi } from 'vitest';
import { emptyUsage } from '@pitchside/llm';
import type { LLMRequest, LLMResponse, ProviderAdapter } from '@pitchside/llm';

export const TEST_MODEL = 'fake-model';

let responseCounter = 0;

export function textResponse(text: string): LLMResponse {
  responseCounter++;
  return {
    id: `resp_${responseCounter}`,
    model: TEST_MODEL,
    content: text.length > 0 ? [{ kind: 'TEXT', text }] : [],
    finishReason: 'stop',
    usage: emptyUsage(),
  };
}

export function toolCallResponse(
  toolName: string,
  args: Record<string, unknown>,
  toolCallId = `call_${toolName}`,
): LLMResponse {
  responseCounter++;
  return {
    id: `resp_${responseCounter}`,
    model: TEST_MODEL,
    content: [{ kind: 'TOOL_CALL', toolCallId, toolName, args }],
    finishReason: 'tool_calls',
    usage: emptyUsage(),
  };
}

export type Reply = LLMResponse | Error | ((request: LLMRequest) => LLMResponse);

/**
 * In-process provider that answers from a fixed script, one entry per call.
 * Every request is recorded for assertions.
 */
export function scriptedAdapter(replies: ReadonlyArray<Reply>) {
  let index = 0;
  return {
    name: 'fake',
    complete: vi.fn(async (request: LLMRequest): Promise<LLMResponse> => {
      const reply = replies[index];
      index++;
      if (reply === undefined) {
        throw new Error(`unexpected model call #${index}`);
      }
      if (reply instanceof Error) {
        throw reply;
      }
      return typeof reply === 'function' ? reply(request) : reply;
    }),
  } satisfies ProviderAdapter;
}

/** Provider that never answers on its own; it only settles when aborted. */
export function hangingAdapter() {
  return {
    name: 'fake',
    complete: vi.fn(
      (request: LLMRequest) =>
        new Promise<LLMResponse>((_resolve, reject) => {
          request.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    ),
  } satisfies ProviderAdapter;
}

/** Content of the last tool result in the request, parsed as JSON. */
export function lastToolResult(request: LLMRequest): unknown {
  const messages = request.messages ?? [];
  for (let i = messages.length - 1; i >= 0; i--) {
    const content = messages[i]?.content;
    if (typeof content === 'string' || content === undefined) {
      continue;
    }
    for (const part of content) {
      if (part.kind === 'TOOL_RESULT') {
        return JSON.parse(part.content);
      }
    }
  }
  return undefined;
}

/** Text of the first user message in the request. */
export function userQuery(request: LLMRequest): string {
  const message = request.messages?.find((m) => m.role === 'user');
  if (!message) {
    return '';
  }
  if (typeof message.content === 'string') {
    return message.content;
  }
  return message.content.map((part) => (part.kind === 'TEXT' ? part.text : '')).join('');
}
