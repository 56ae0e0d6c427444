import type { TapeRequest } from '../types/index.js';
import type { InterceptResult } from './interceptor.js';
import type { RequestPipeline } from './pipeline.js';
import {
  createForwarder,
  headersToRecord,
  withoutHeaders,
  PLAYBACK_EXCLUDED_HEADERS,
  SOURCE_HEADER,
  SOURCE_LABELS,
  type FetchFunction,
} from './http.js';

export interface TapeFetchOptions {
  /** Underlying fetch used for live calls; defaults to the global one */
  fetch?: FetchFunction;
  /** Live call timeout in milliseconds */
  timeout?: number;
}

// Tapes only hold final statuses (200-599); these carry no body
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export function toFetchResponse(result: InterceptResult): Response {
  const { response, source } = result;
  const headers = new Headers(withoutHeaders(response.headers, PLAYBACK_EXCLUDED_HEADERS));
  headers.set(SOURCE_HEADER, SOURCE_LABELS[source]);

  return new Response(NULL_BODY_STATUSES.has(response.status) ? null : response.body, {
    status: response.status,
    headers,
  });
}

export async function toTapeRequest(request: Request): Promise<TapeRequest> {
  const record: TapeRequest = {
    method: request.method,
    url: request.url,
    headers: headersToRecord(request.headers),
  };

  if (request.method !== 'GET' && request.method !== 'HEAD') {
    const body = await request.text();
    if (body !== '') {
      record.body = body;
    }
  }

  return record;
}

/**
 * A `fetch` that routes every call through the pipeline, so an active
 * recorder session can play back, record or reject it.
 *
 * @example
 * const recorder = new Recorder();
 * const tapeFetch = createTapeFetch(recorder.getPipeline());
 * await recorder.start('users api', 'READ_WRITE');
 * const res = await tapeFetch('https://api.example.com/users');
 */
export function createTapeFetch(pipeline: RequestPipeline, options: TapeFetchOptions = {}): FetchFunction {
  const forward = createForwarder({ fetch: options.fetch, timeout: options.timeout });

  return async (input, init) => {
    const incoming = new Request(input, init);
    const request = await toTapeRequest(incoming);
    const result = await pipeline.dispatch(request, forward, incoming.signal);
    return toFetchResponse(result);
  };
}
