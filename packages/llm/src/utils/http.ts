import { AbortError, NetworkError, RequestTimeoutError } from '../types/error.js';
import type { TimeoutConfig } from '../types/config.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly timeout?: TimeoutConfig;
  readonly signal?: AbortSignal;
  readonly provider?: string;
};

export type FetchResult = {
  readonly response: globalThis.Response;
  readonly body: unknown;
};

/**
 * Fetches with timeout support, header merging, and JSON body serialization.
 * Returns both the raw response and parsed JSON body.
 *
 * Non-2xx responses are classified through mapHttpError. A request that runs
 * past `timeout.requestMs` rejects with RequestTimeoutError; one cancelled
 * through `signal` rejects with AbortError.
 */
export async function fetchWithTimeout(
  options: FetchOptions,
): Promise<FetchResult> {
  const {
    url,
    method = 'GET',
    headers: customHeaders = {},
    body: bodyData,
    timeout,
    signal: externalSignal,
    provider = 'unknown',
  } = options;

  if (externalSignal?.aborted) {
    throw new AbortError('Signal was already aborted');
  }

  const timeoutController = new AbortController();
  const linked = linkSignals(externalSignal, timeoutController.signal);

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  if (timeout?.requestMs) {
    timeoutId = setTimeout(() => {
      timeoutController.abort();
    }, timeout.requestMs);
  }

  try {
    const mergedHeaders: Record<string, string> = {
      'Content-Type': 'application/json',
      ...customHeaders,
    };

    const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

    let response: globalThis.Response;
    try {
      response = await fetch(url, {
        method,
        headers: mergedHeaders,
        body,
        signal: linked.signal,
      });
    } catch (err) {
      if (err instanceof globalThis.Error && err.name === 'AbortError') {
        if (timeoutController.signal.aborted && !externalSignal?.aborted) {
          throw new RequestTimeoutError(`Request timed out after ${timeout?.requestMs ?? 0}ms`, err);
        }
        throw new AbortError('Fetch was aborted', err);
      }
      const cause = err instanceof globalThis.Error ? err : undefined;
      throw new NetworkError(`Request to ${url} failed`, cause);
    }

    if (!response.ok) {
      const text = await response.text();
      throw mapHttpError({
        statusCode: response.status,
        body: text,
        provider,
        headers: response.headers ?? new Headers(),
        raw: text,
      });
    }

    const parsedBody: unknown = await response.json();

    return {
      response,
      body: parsedBody,
    };
  } finally {
    if (timeoutId !== null) {
      clearTimeout(timeoutId);
    }
    linked.release();
  }
}

type LinkedSignal = {
  readonly signal: AbortSignal;
  readonly release: () => void;
};

/**
 * Links two abort signals so that either one being aborted triggers the target.
 * `release` detaches the listener from the external signal once the request settles.
 */
function linkSignals(
  externalSignal: AbortSignal | undefined,
  targetSignal: AbortSignal,
): LinkedSignal {
  if (!externalSignal) {
    return { signal: targetSignal, release: () => {} };
  }

  const controller = new AbortController();
  const onAbort = () => controller.abort();

  externalSignal.addEventListener('abort', onAbort);
  targetSignal.addEventListener('abort', onAbort);

  return {
    signal: controller.signal,
    release: () => externalSignal.removeEventListener('abort', onAbort),
  };
}
