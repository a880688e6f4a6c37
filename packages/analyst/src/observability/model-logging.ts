import type { Middleware } from '@pitchside/llm';
import type { Logger } from './logger.js';

/**
 * Client middleware that logs every model call with its duration. Success
 * goes to debug, failure to warn; the error is rethrown unchanged.
 */
export function createModelLoggingMiddleware(logger: Logger): Middleware {
  const log = logger.child({ component: 'model' });

  return async (request, next) => {
    const startedAt = performance.now();
    const fields = {
      model: request.model,
      provider: request.provider,
      messages: request.messages?.length ?? 0,
      tools: request.tools?.length ?? 0,
      toolChoice: request.toolChoice?.mode,
    };

    try {
      const response = await next(request);
      log.debug(
        {
          ...fields,
          durationMs: Math.round(performance.now() - startedAt),
          finishReason: response.finishReason,
          usage: response.usage,
        },
        'model call finished',
      );
      return response;
    } catch (error) {
      log.warn(
        { ...fields, durationMs: Math.round(performance.now() - startedAt), err: error },
        'model call failed',
      );
      throw error;
    }
  };
}
