import { describe, it, expect } from 'vitest';
import pino from 'pino';
import { ServerError, emptyUsage } from '@pitchside/llm';
import type { LLMRequest, LLMResponse } from '@pitchside/llm';
import { createModelLoggingMiddleware } from './model-logging.js';

function capturingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level: 'debug' }, {
    write(line: string) {
      lines.push(JSON.parse(line));
    },
  });
  return { logger, lines };
}

const request: LLMRequest = {
  model: 'fake-model',
  provider: 'fake',
  messages: [{ role: 'user', content: 'Who leads the league?' }],
  toolChoice: { mode: 'auto' },
};

const response: LLMResponse = {
  id: 'resp_1',
  model: 'fake-model',
  content: [{ kind: 'TEXT', text: 'Lansdowne.' }],
  finishReason: 'stop',
  usage: { ...emptyUsage(), inputTokens: 12, outputTokens: 3, totalTokens: 15 },
};

describe('createModelLoggingMiddleware', () => {
  it('logs a finished call at debug and passes the response through', async () => {
    const { logger, lines } = capturingLogger();
    const middleware = createModelLoggingMiddleware(logger);

    const result = await middleware(request, async () => response);

    expect(result).toBe(response);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 20,
      msg: 'model call finished',
      component: 'model',
      model: 'fake-model',
      provider: 'fake',
      messages: 1,
      tools: 0,
      toolChoice: 'auto',
      finishReason: 'stop',
      usage: { inputTokens: 12, outputTokens: 3, totalTokens: 15 },
    });
    expect(lines[0]?.['durationMs']).toEqual(expect.any(Number));
  });

  it('logs a failed call at warn and rethrows the error', async () => {
    const { logger, lines } = capturingLogger();
    const middleware = createModelLoggingMiddleware(logger);
    const failure = new ServerError('Server error: overloaded', 503, 'fake');

    await expect(middleware(request, async () => { throw failure; })).rejects.toBe(failure);

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 40, msg: 'model call failed', err: { message: 'Server error: overloaded' } });
  });
});
