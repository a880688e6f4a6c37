import type { LLMRequest, Message } from '../../types/index.js';

type RequestOutput = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

function translateMessage(message: Message): ReadonlyArray<Record<string, unknown>> {
  if (typeof message.content === 'string') {
    return [{ role: message.role, content: message.content }];
  }

  if (message.role === 'tool') {
    // One chat message per tool result, linked by tool_call_id
    return message.content.flatMap((part) =>
      part.kind === 'TOOL_RESULT'
        ? [{ role: 'tool', tool_call_id: part.toolCallId, content: part.content }]
        : [],
    );
  }

  const text = message.content
    .flatMap((part) => (part.kind === 'TEXT' ? [part.text] : []))
    .join('');

  if (message.role !== 'assistant') {
    return [{ role: message.role, content: text }];
  }

  const toolCalls = message.content.flatMap((part) =>
    part.kind === 'TOOL_CALL'
      ? [
          {
            id: part.toolCallId,
            type: 'function',
            function: { name: part.toolName, arguments: JSON.stringify(part.args) },
          },
        ]
      : [],
  );

  const translated: Record<string, unknown> = { role: 'assistant' };
  if (text.length > 0) {
    translated['content'] = text;
  }
  if (toolCalls.length > 0) {
    translated['tool_calls'] = toolCalls;
  }
  return [translated];
}

export function translateRequest(
  request: Readonly<LLMRequest>,
  apiKey: string,
  baseUrl: string,
): RequestOutput {
  const url = `${baseUrl}/v1/chat/completions`;
  const headers: Record<string, string> = {
    'Content-Type': 'application/json',
  };
  // Local servers often run without a key.
  if (apiKey) {
    headers['Authorization'] = `Bearer ${apiKey}`;
  }

  const messages: Array<Record<string, unknown>> = [];

  if (request.system) {
    messages.push({ role: 'system', content: request.system });
  }

  for (const message of request.messages ?? []) {
    messages.push(...translateMessage(message));
  }

  const body: Record<string, unknown> = {
    model: request.model,
    messages,
  };

  if (request.tools && request.tools.length > 0) {
    body['tools'] = request.tools.map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }

  if (request.toolChoice) {
    if (request.toolChoice.mode === 'named') {
      body['tool_choice'] = {
        type: 'function',
        function: { name: request.toolChoice.toolName },
      };
    } else {
      body['tool_choice'] = request.toolChoice.mode;
    }
  }

  if (request.maxTokens !== undefined) {
    body['max_tokens'] = request.maxTokens;
  }
  if (request.temperature !== undefined) {
    body['temperature'] = request.temperature;
  }
  if (request.topP !== undefined) {
    body['top_p'] = request.topP;
  }
  if (request.stopSequences && request.stopSequences.length > 0) {
    body['stop'] = request.stopSequences;
  }

  // Provider options escape hatch
  const compatOptions = request.providerOptions?.['openaiCompatible'];
  if (compatOptions) {
    Object.assign(body, compatOptions);
  }

  return { url, headers, body };
}
