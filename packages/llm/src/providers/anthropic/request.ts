import type { LLMRequest, ContentPart, Message } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

type AnthropicMessage = {
  readonly role: 'user' | 'assistant';
  readonly content: Array<Record<string, unknown>>;
};

export const ANTHROPIC_VERSION = '2023-06-01';
const DEFAULT_MAX_TOKENS = 4096;

function translateContent(part: ContentPart): Record<string, unknown> {
  switch (part.kind) {
    case 'TEXT':
      return { type: 'text', text: part.text };
    case 'TOOL_CALL':
      return { type: 'tool_use', id: part.toolCallId, name: part.toolName, input: part.args };
    case 'TOOL_RESULT':
      return {
        type: 'tool_result',
        tool_use_id: part.toolCallId,
        content: part.content,
        is_error: part.isError,
      };
  }
}

function translateMessage(message: Message): AnthropicMessage {
  // Tool results travel inside user turns
  const role = message.role === 'assistant' ? 'assistant' : 'user';
  const content =
    typeof message.content === 'string'
      ? [{ type: 'text', text: message.content }]
      : message.content.map(translateContent);
  return { role, content };
}

export function translateRequest(
  request: Readonly<LLMRequest>,
  apiKey: string,
  baseUrl: string,
): RequestOutput {
  const url = `${baseUrl}/v1/messages`;
  const headers: Record<string, string> = {
    'x-api-key': apiKey,
    'anthropic-version': ANTHROPIC_VERSION,
    'Content-Type': 'application/json',
  };

  const body: Record<string, unknown> = {
    model: request.model,
    max_tokens: request.maxTokens || DEFAULT_MAX_TOKENS,
  };

  const systemParts: Array<string> = request.system ? [request.system] : [];
  const messages: Array<AnthropicMessage> = [];

  for (const message of request.messages ?? []) {
    if (message.role === 'system') {
      if (typeof message.content === 'string') {
        systemParts.push(message.content);
      }
      continue;
    }

    const translated = translateMessage(message);
    const last = messages[messages.length - 1];

    // The Messages API wants strict alternation, so consecutive user turns merge
    if (last && last.role === translated.role && translated.role === 'user') {
      last.content.push(...translated.content);
    } else {
      messages.push(translated);
    }
  }

  if (systemParts.length > 0) {
    body['system'] = systemParts.join('\n\n');
  }
  if (messages.length > 0) {
    body['messages'] = messages;
  }

  if (request.tools && request.tools.length > 0) {
    body['tools'] = request.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      input_schema: tool.parameters,
    }));
  }

  if (request.toolChoice) {
    if (request.toolChoice.mode === 'auto') {
      body['tool_choice'] = { type: 'auto' };
    } else if (request.toolChoice.mode === 'none') {
      body['tool_choice'] = { type: 'none' };
    } else if (request.toolChoice.mode === 'required') {
      body['tool_choice'] = { type: 'any' };
    } else {
      body['tool_choice'] = { type: 'tool', name: request.toolChoice.toolName };
    }
  }

  if (request.temperature !== undefined) {
    body['temperature'] = request.temperature;
  }
  if (request.topP !== undefined) {
    body['top_p'] = request.topP;
  }
  if (request.stopSequences && request.stopSequences.length > 0) {
    body['stop_sequences'] = request.stopSequences;
  }

  const anthropicOptions = request.providerOptions?.['anthropic'];
  if (anthropicOptions) {
    Object.assign(body, anthropicOptions);
  }

  return { url, headers, body };
}
