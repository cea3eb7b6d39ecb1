/**
 * fetch adapter. instrumentFetch() decorates any fetch implementation; FetchAdapter installs
 * that decorator on globalThis.fetch.
 *
 * The caller gets the original Response as soon as headers arrive. The recorded body is read
 * from response.clone() in the background, up to maxPayloadSize, so streams that stay open
 * (ndjson feeds, media) never hold the caller up. A Request input's own body is read from
 * input.clone() the same way. Event streams and bodies the caller cannot read are not captured.
 */

import { logHttpRequest } from '../../core/pipeline/log-http-request';
import type { BodyTap, RequestCapture, ResponseCapture } from '../../core/pipeline/log-http-request';
import { captureWebStream } from '../../core/pipeline/stream-tap';
import { wrapMethodNoConflict } from '../../core/runtime/wrap';
import type { HeaderMap } from '../../types/schema';
import { InstrumentationAdapter } from '../common/adapter';
import { bodyToText } from '../common/body';
import { normalizeHeaders } from '../common/headers';

export const FETCH_LIBRARY_NAME = 'fetch';
export const FETCH_WRAPPER_MARKER = 'outbound-recorder.fetch';

export type FetchFn = typeof fetch;
export type FetchInput = Parameters<FetchFn>[0];
export type FetchInit = Parameters<FetchFn>[1];

export interface FetchHost {
  fetch: FetchFn;
}

function isRequest(input: FetchInput): input is Request {
  return typeof input === 'object' && !(input instanceof URL);
}

export function fetchUrl(input: FetchInput): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

export function fetchMethod(input: FetchInput, init: FetchInit): string {
  const method = init?.method ?? (isRequest(input) ? input.method : undefined) ?? 'GET';
  return method.toUpperCase();
}

export function fetchRequestData(input: FetchInput, init: FetchInit, maxBytes: number): RequestCapture {
  const headers = normalizeHeaders(init?.headers ?? (isRequest(input) ? input.headers : undefined));
  if (init?.body != null || !isRequest(input)) {
    return { headers, body: bodyToText(init?.body) };
  }
  if (input.body === null || input.bodyUsed) return { headers };
  const copy = input.clone().body;
  if (!copy) return { headers };
  return {
    headers,
    pendingBody: captureWebStream(copy, maxBytes).then((captured) => captured.body.toString('utf8')),
  };
}

export function fetchResponseData(response: Response): ResponseCapture<Response> {
  const headers: HeaderMap = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });
  const contentType = response.headers.get('content-type') ?? '';
  const tappable = response.body !== null && !response.bodyUsed && !contentType.startsWith('text/event-stream');
  return {
    statusCode: response.status,
    headers,
    ...(tappable && { tapBody: (maxBytes: number) => tapResponseBody(response, maxBytes) }),
  };
}

function tapResponseBody(response: Response, maxBytes: number): BodyTap<Response> {
  const copy = response.clone().body;
  return {
    response,
    body: copy ? captureWebStream(copy, maxBytes) : Promise.resolve({ body: Buffer.alloc(0), truncated: false }),
  };
}

/** Returns a fetch with the same call shape that records every call through the pipeline. */
export function instrumentFetch(fetchImpl: FetchFn): FetchFn {
  return async function recordedFetch(input: FetchInput, init?: FetchInit): Promise<Response> {
    return logHttpRequest(
      FETCH_LIBRARY_NAME,
      fetchUrl(input),
      fetchMethod(input, init),
      (maxBytes) => fetchRequestData(input, init, maxBytes),
      fetchResponseData,
      () => fetchImpl(input, init)
    );
  };
}

export class FetchAdapter extends InstrumentationAdapter<FetchHost> {
  readonly libraryName = FETCH_LIBRARY_NAME;

  protected defaultTarget(): FetchHost | undefined {
    return typeof globalThis.fetch === 'function' ? globalThis : undefined;
  }

  protected patch(target: FetchHost): void {
    wrapMethodNoConflict(target, 'fetch', FETCH_WRAPPER_MARKER, (original) => instrumentFetch(original));
  }
}
