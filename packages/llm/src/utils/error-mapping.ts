import {
  AuthenticationError,
  AccessDeniedError,
  NotFoundError,
  InvalidRequestError,
  ContextLengthError,
  RateLimitError,
  ContentFilterError,
  ServerError,
  ProviderError,
} from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly provider: string;
  readonly headers: Headers;
  readonly raw?: unknown;
};

type ErrorFactory = (
  body: string,
  statusCode: number,
  provider: string,
  raw: unknown,
  retryAfter: number | null,
) => ProviderError;

const STATUS_FACTORIES: Readonly<Record<number, ErrorFactory>> = {
  401: (body, status, provider, raw) =>
    new AuthenticationError(`Authentication failed: ${body}`, status, provider, null, raw),
  403: (body, status, provider, raw) =>
    new AccessDeniedError(`Access denied: ${body}`, status, provider, null, raw),
  404: (body, status, provider, raw) =>
    new NotFoundError(`Resource not found: ${body}`, status, provider, null, raw),
  408: (body, status, provider, raw, retryAfter) =>
    new ServerError(`Request timeout: ${body}`, status, provider, null, raw, retryAfter),
  413: (body, status, provider, raw) =>
    new ContextLengthError(`Context length exceeded: ${body}`, status, provider, null, raw),
  422: (body, status, provider, raw) =>
    new InvalidRequestError(`Unprocessable entity: ${body}`, status, provider, null, raw),
  429: (body, status, provider, raw, retryAfter) =>
    new RateLimitError(`Rate limit exceeded: ${body}`, status, provider, null, raw, retryAfter),
};

const CONTENT_FILTER_MARKERS = ['content_filter', 'content_policy', 'safety'];
const CONTEXT_LENGTH_MARKERS = ['context_length', 'too many tokens', 'maximum context'];

/**
 * Parses the Retry-After header into milliseconds.
 * Accepts delta-seconds or an HTTP date; returns null when absent or unparseable.
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryAt = new Date(retryAfter).getTime();
  if (Number.isNaN(retryAt)) {
    return null;
  }
  return Math.max(0, retryAt - Date.now());
}

/**
 * Maps an HTTP status and body to a ProviderError subclass.
 * 400s are classified by body text; 5xx are retryable ServerErrors.
 */
export function mapHttpError(options: MapHttpErrorOptions): ProviderError {
  const { statusCode, body, provider, headers, raw = null } = options;
  const retryAfter = parseRetryAfter(headers);

  if (statusCode === 400) {
    return classifyBadRequest(body, provider, raw);
  }

  const factory = STATUS_FACTORIES[statusCode];
  if (factory) {
    return factory(body, statusCode, provider, raw, retryAfter);
  }

  if (statusCode >= 500) {
    return new ServerError(`Server error: ${body}`, statusCode, provider, null, raw, retryAfter);
  }

  return new ProviderError(`HTTP ${statusCode}: ${body}`, statusCode, false, provider, null, raw);
}

function classifyBadRequest(body: string, provider: string, raw: unknown): ProviderError {
  const lowerBody = body.toLowerCase();

  if (CONTENT_FILTER_MARKERS.some((marker) => lowerBody.includes(marker))) {
    return new ContentFilterError(`Content filtered: ${body}`, 400, provider, null, raw);
  }

  if (CONTEXT_LENGTH_MARKERS.some((marker) => lowerBody.includes(marker))) {
    return new ContextLengthError(`Context length exceeded: ${body}`, 400, provider, null, raw);
  }

  return new InvalidRequestError(`Invalid request: ${body}`, 400, provider, null, raw);
}
