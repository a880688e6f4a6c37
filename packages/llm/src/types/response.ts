import type { ContentPart, TextData, ToolCallData } from './content.js';
import type { ToolCall } from './tool.js';

export type FinishReason = 'stop' | 'length' | 'tool_calls' | 'content_filter' | 'error';

export type Usage = {
  readonly inputTokens: number;
  readonly outputTokens: number;
  readonly totalTokens: number;
};

export function usageAdd(a: Readonly<Usage>, b: Readonly<Usage>): Usage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
  };
}

export function emptyUsage(): Usage {
  return {
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
  };
}

export type LLMResponse = {
  readonly id: string;
  readonly model: string;
  readonly content: ReadonlyArray<ContentPart>;
  readonly finishReason: FinishReason;
  readonly usage: Usage;
};

export function responseText(response: Readonly<LLMResponse>): string {
  return response.content
    .filter((part): part is TextData => part.kind === 'TEXT')
    .map((part) => part.text)
    .join('');
}

export function responseToolCalls(response: Readonly<LLMResponse>): ReadonlyArray<ToolCall> {
  return response.content
    .filter((part): part is ToolCallData => part.kind === 'TOOL_CALL')
    .map((part) => ({
      toolCallId: part.toolCallId,
      toolName: part.toolName,
      args: part.args,
    }));
}
