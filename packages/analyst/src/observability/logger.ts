import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export type LoggerOptions = {
  readonly level: LogLevel;
  readonly serviceName: string;
  readonly bindings?: Record<string, unknown>;
};

export const REDACT_PATHS: ReadonlyArray<string> = [
  'apiKey',
  '*.apiKey',
  'authorization',
  '*.authorization',
  'headers.Authorization',
  'headers["x-api-key"]',
];

/**
 * JSON logger on stderr, so that stdout stays free for answers.
 */
export function makeLogger(options: LoggerOptions): Logger {
  return pino(
    {
      level: options.level,
      // bindings first so they cannot overwrite the service label
      base: { ...options.bindings, service: options.serviceName },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: [...REDACT_PATHS], censor: '[REDACTED]' },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/** For tests: keeps the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
