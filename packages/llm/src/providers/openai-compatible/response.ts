import type { LLMResponse, FinishReason, ContentPart } from '../../types/index.js';
import { asRecord, asRecordArray, parseArguments, readNumber, readString } from '../../utils/json.js';

const FINISH_REASONS: Readonly<Record<string, FinishReason>> = {
  stop: 'stop',
  length: 'length',
  tool_calls: 'tool_calls',
  function_call: 'tool_calls',
  content_filter: 'content_filter',
};

export function translateResponse(raw: unknown): LLMResponse {
  const body = asRecord(raw);
  const firstChoice = asRecordArray(body?.['choices'])[0];
  const message = asRecord(firstChoice?.['message']);

  const content: Array<ContentPart> = [];

  const text = readString(message, 'content');
  if (text) {
    content.push({ kind: 'TEXT', text });
  }

  for (const toolCall of asRecordArray(message?.['tool_calls'])) {
    const fn = asRecord(toolCall['function']);
    content.push({
      kind: 'TOOL_CALL',
      toolCallId: readString(toolCall, 'id') ?? '',
      toolName: readString(fn, 'name') ?? 'unknown',
      // Malformed argument JSON becomes {} and fails parameter validation downstream
      args: parseArguments(readString(fn, 'arguments')),
    });
  }

  const rawUsage = asRecord(body?.['usage']);
  const finishReason = FINISH_REASONS[readString(firstChoice, 'finish_reason') ?? 'stop'] ?? 'stop';

  return {
    id: readString(body, 'id') ?? '',
    model: readString(body, 'model') ?? '',
    content,
    finishReason,
    usage: {
      inputTokens: readNumber(rawUsage, 'prompt_tokens'),
      outputTokens: readNumber(rawUsage, 'completion_tokens'),
      totalTokens: readNumber(rawUsage, 'total_tokens'),
    },
  };
}
