import type { IncomingHttpHeaders } from 'node:http';
import type { HeaderMap, TapeResponse } from '../types/index.js';
import type { Forward, InterceptSource } from './interceptor.js';

export type FetchFunction = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/** Response header telling the caller where the response came from */
export const SOURCE_HEADER = 'x-tapedeck';

export const SOURCE_LABELS: Record<InterceptSource, string> = {
  tape: 'PLAY',
  live: 'REC',
  bypass: 'BYPASS',
};

/** Connection-level headers that never travel with a forwarded request */
export const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-connection',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
  'content-length',
]);

/** Stored bodies are decoded text, so length and encoding headers are not replayed */
export const PLAYBACK_EXCLUDED_HEADERS = new Set(['content-encoding', 'content-length', 'transfer-encoding']);

/**
 * Flatten headers object (handle arrays)
 */
export function flattenHeaders(headers: IncomingHttpHeaders | HeaderMap): HeaderMap {
  const result: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value !== undefined) {
      result[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
    }
  }
  return result;
}

export function headersToRecord(headers: Headers): HeaderMap {
  const result: HeaderMap = {};
  headers.forEach((value, key) => {
    result[key] = value;
  });
  return result;
}

export function withoutHeaders(headers: HeaderMap, excluded: Set<string>): HeaderMap {
  const result: HeaderMap = {};
  for (const [key, value] of Object.entries(headers)) {
    if (!excluded.has(key.toLowerCase())) {
      result[key] = value;
    }
  }
  return result;
}

interface LinkedSignal {
  signal: AbortSignal | undefined;
  dispose(): void;
}

/**
 * Combine a caller's signal with a timeout
 */
function linkSignal(signal: AbortSignal | undefined, timeout: number | undefined): LinkedSignal {
  if (timeout === undefined) {
    return { signal, dispose: () => undefined };
  }

  const timer = AbortSignal.timeout(timeout);
  if (!signal) {
    return { signal: timer, dispose: () => undefined };
  }

  const controller = new AbortController();
  const onCallerAbort = () => controller.abort(signal.reason);
  const onTimeout = () => controller.abort(timer.reason);

  if (signal.aborted) {
    controller.abort(signal.reason);
  } else {
    signal.addEventListener('abort', onCallerAbort, { once: true });
    timer.addEventListener('abort', onTimeout, { once: true });
  }

  return {
    signal: controller.signal,
    dispose: () => {
      signal.removeEventListener('abort', onCallerAbort);
      timer.removeEventListener('abort', onTimeout);
    },
  };
}

export interface ForwarderOptions {
  fetch?: FetchFunction;
  /** Milliseconds before the live call is aborted */
  timeout?: number;
  redirect?: 'follow' | 'manual' | 'error';
}

/**
 * Forward over fetch, reading the whole response body as text
 */
export function createForwarder(options: ForwarderOptions = {}): Forward {
  const fetchFn: FetchFunction = options.fetch ?? ((input, init) => fetch(input, init));

  return async (request, signal) => {
    const linked = linkSignal(signal, options.timeout);
    try {
      const response = await fetchFn(request.url, {
        method: request.method,
        headers: withoutHeaders(request.headers, HOP_BY_HOP_HEADERS),
        body: request.body,
        signal: linked.signal,
        redirect: options.redirect ?? 'follow',
      });

      const captured: TapeResponse = {
        status: response.status,
        headers: headersToRecord(response.headers),
        body: await response.text(),
      };
      return captured;
    } finally {
      linked.dispose();
    }
  };
}
