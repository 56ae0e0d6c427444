import type { Interaction, TapeRequest, TapeResponse, HeaderMap } from '../types/index.js';

function copyHeaders(headers: HeaderMap): HeaderMap {
  return Object.freeze({ ...headers });
}

/**
 * Build a frozen interaction from copies of the given request and response
 */
export function createInteraction(
  request: TapeRequest,
  response: TapeResponse,
  recordedAt: Date = new Date()
): Interaction {
  const storedRequest: TapeRequest = {
    method: request.method,
    url: request.url,
    headers: copyHeaders(request.headers),
  };
  if (request.body !== undefined && request.body !== '') {
    storedRequest.body = request.body;
  }

  const time = recordedAt.getTime();

  return Object.freeze({
    // Each read returns a fresh Date
    get recordedAt() {
      return new Date(time);
    },
    request: Object.freeze(storedRequest),
    response: Object.freeze({
      status: response.status,
      headers: copyHeaders(response.headers),
      body: response.body,
    }),
  });
}

/**
 * Mutable copy of a stored response, safe to hand to callers
 */
export function cloneResponse(response: Readonly<TapeResponse>): TapeResponse {
  return {
    status: response.status,
    headers: { ...response.headers },
    body: response.body,
  };
}
