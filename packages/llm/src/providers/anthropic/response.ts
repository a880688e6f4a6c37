import type { LLMResponse, ContentPart, FinishReason } from '../../types/index.js';
import { asRecord, asRecordArray, readNumber, readString } from '../../utils/json.js';

const STOP_REASONS: Readonly<Record<string, FinishReason>> = {
  end_turn: 'stop',
  stop_sequence: 'stop',
  max_tokens: 'length',
  tool_use: 'tool_calls',
  refusal: 'content_filter',
};

export function translateResponse(raw: unknown): LLMResponse {
  const body = asRecord(raw);

  const content: Array<ContentPart> = [];
  for (const block of asRecordArray(body?.['content'])) {
    const type = readString(block, 'type');
    if (type === 'text') {
      content.push({ kind: 'TEXT', text: readString(block, 'text') ?? '' });
    } else if (type === 'tool_use') {
      content.push({
        kind: 'TOOL_CALL',
        toolCallId: readString(block, 'id') ?? '',
        toolName: readString(block, 'name') ?? '',
        args: asRecord(block['input']) ?? {},
      });
    }
  }

  const rawUsage = asRecord(body?.['usage']);
  const inputTokens = readNumber(rawUsage, 'input_tokens');
  const outputTokens = readNumber(rawUsage, 'output_tokens');

  return {
    id: readString(body, 'id') ?? '',
    model: readString(body, 'model') ?? '',
    content,
    finishReason: STOP_REASONS[readString(body, 'stop_reason') ?? 'end_turn'] ?? 'stop',
    usage: {
      inputTokens,
      outputTokens,
      totalTokens: inputTokens + outputTokens,
    },
  };
}
