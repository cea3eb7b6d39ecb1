/**
 * Shared recording pipeline used by every adapter.
 *
 * disabled / recursing / excluded → call straight through.
 * Otherwise: fork scope → depth++ → time the call → record → hooks → depth-- (always).
 * The caller always gets the original error, and either the original response or one whose
 * body is tapped; nothing thrown while recording reaches it.
 *
 * A call whose request or response body is still streaming is handed back at once; its record
 * is written when those bodies end or pass maxPayloadSize, whichever comes first.
 */

import { performance } from 'perf_hooks';
import type { Configuration } from '../../config/configuration';
import { RecorderContext } from '../../context';
import { getSink } from '../../store/sink';
import type { HttpBody, RequestData, RequestSnapshot, ResponseData } from '../../types/schema';
import { describeError } from '../errors';
import { isolate, isolateSync } from '../isolate';
import { getLogger } from '../logging/logger';
import { buildRequestLogRecord, headerValue } from '../record/request-log-record';
import { checkDepth, decrement, inRecursion, increment } from '../recursion/recursion-guard';
import { isProcessEnabled } from '../runtime/process-switch';
import { notifyHooks } from './hooks';
import type { CapturedBody } from './stream-tap';

/** RequestData plus a body that is still being read from a copy of the request. */
export interface RequestCapture extends RequestData {
  /** Never rejects. The record waits for it; the caller does not. */
  pendingBody?: Promise<HttpBody>;
}

export interface BodyTap<T> {
  /** What the caller receives in place of the original response. */
  response: T;
  /** Settles (never rejects) once the body has ended or passed the cap. */
  body: Promise<CapturedBody>;
}

/**
 * ResponseData plus an optional body tap. The pipeline calls tapBody only for responses it
 * records, after the content-type check, so excluded bodies are never read.
 */
export interface ResponseCapture<T> extends ResponseData {
  tapBody?: (maxBytes: number) => BodyTap<T>;
}

/** Passed to the underlying call only when the pipeline records it. */
export interface RecordingOptions {
  maxPayloadSize: number;
}

export type RequestDataThunk = (maxBytes: number) => RequestCapture;
export type ResponseDataFn<T> = (response: T) => ResponseCapture<T> | Promise<ResponseCapture<T>>;
export type UnderlyingCall<T> = (recording?: RecordingOptions) => Promise<T>;

/** One recorded call on its way to the sink. */
interface CallRecord {
  libraryName: string;
  method: string;
  url: string;
  request: RequestSnapshot;
  requestBody?: Promise<HttpBody>;
  durationSeconds: number;
  config: Configuration;
}

const pendingRecords = new Set<Promise<void>>();

/**
 * Records one outbound call made through libraryName.
 * requestData runs once before the call; responseData runs once after a successful call.
 */
export async function logHttpRequest<T>(
  libraryName: string,
  url: string,
  method: string,
  requestData: RequestDataThunk,
  responseData: ResponseDataFn<T>,
  call: UnderlyingCall<T>
): Promise<T> {
  const config = RecorderContext.configuration();
  if (!config.enabled || !isProcessEnabled()) return call();

  if (inRecursion(libraryName)) {
    checkDepth(libraryName, config);
    if (config.debugLogging) {
      getLogger().debug(`Skipping nested ${libraryName} request`, { method, url });
    }
    return call();
  }

  if (!config.shouldLogUrl(url)) return call();

  return RecorderContext.withScopedContext({}, () =>
    recordCall(libraryName, url, method, requestData, responseData, call, config)
  );
}

/**
 * Resolves once every record still waiting on a request or response body has been written.
 * A body that never ends and stays under maxPayloadSize keeps its record pending.
 */
export async function flushPendingRecords(): Promise<void> {
  await Promise.all([...pendingRecords]);
}

export function pendingRecordCount(): number {
  return pendingRecords.size;
}

/** Forgets pending records without waiting for them. Their bodies may still settle and write. */
export function clearPendingRecords(): void {
  pendingRecords.clear();
}

async function recordCall<T>(
  libraryName: string,
  url: string,
  method: string,
  requestData: RequestDataThunk,
  responseData: ResponseDataFn<T>,
  call: UnderlyingCall<T>,
  config: Configuration
): Promise<T> {
  increment(libraryName);
  try {
    const { request, requestBody } = snapshotRequest(requestData, config);
    const start = performance.now();
    let response: T;
    try {
      response = await call({ maxPayloadSize: config.maxPayloadSize });
    } catch (err: unknown) {
      const record: CallRecord = {
        libraryName,
        method,
        url,
        request,
        requestBody,
        durationSeconds: (performance.now() - start) / 1000,
        config,
      };
      await finish(record, { statusCode: 0, headers: {}, body: `Error: ${describeError(err)}` }, undefined, err);
      throw err;
    }
    const record: CallRecord = {
      libraryName,
      method,
      url,
      request,
      requestBody,
      durationSeconds: (performance.now() - start) / 1000,
      config,
    };
    return await recordSuccess(record, response, responseData);
  } finally {
    decrement(libraryName);
  }
}

/** Library data merged with the scope's loggable and metadata. */
function snapshotRequest(
  requestData: RequestDataThunk,
  config: Configuration
): { request: RequestSnapshot; requestBody?: Promise<HttpBody> } {
  const data = isolateSync('Capturing request data', () => requestData(config.maxPayloadSize)) ?? {};
  return {
    request: {
      headers: data.headers,
      body: data.body,
      loggable: RecorderContext.getLoggable(),
      metadata: RecorderContext.getMetadata(),
    },
    requestBody: data.pendingBody,
  };
}

async function recordSuccess<T>(record: CallRecord, response: T, responseData: ResponseDataFn<T>): Promise<T> {
  const captured = await isolate('Capturing response data', () => responseData(response));
  if (!captured) return response;
  const { tapBody, ...data } = captured;
  if (!record.config.shouldLogContentType(headerValue(data.headers, 'content-type'))) return response;

  const tap = tapBody && isolateSync('Tapping response body', () => tapBody(record.config.maxPayloadSize));
  await finish(record, data, tap?.body);
  return tap ? tap.response : response;
}

/** Writes the record now, or once the bodies it still waits on have settled. */
async function finish(
  record: CallRecord,
  response: ResponseData,
  responseBody: Promise<CapturedBody> | undefined,
  error?: unknown
): Promise<void> {
  if (!record.requestBody && !responseBody) {
    await complete(record, record.request, response, error);
    return;
  }
  const pending: Promise<void> = isolate('Recording streamed request', () =>
    completeWhenBodiesEnd(record, response, responseBody, error)
  ).then(() => {
    pendingRecords.delete(pending);
  });
  pendingRecords.add(pending);
}

/**
 * Runs after the caller already has its response, in the scope forked for the call. The depth
 * is taken again so a sink that issues requests of its own is not recorded.
 */
async function completeWhenBodiesEnd(
  record: CallRecord,
  response: ResponseData,
  responseBody: Promise<CapturedBody> | undefined,
  error: unknown
): Promise<void> {
  const [requestBody, captured] = await Promise.all([record.requestBody, responseBody]);
  const request = record.requestBody ? { ...record.request, body: requestBody } : record.request;
  const data = captured ? { ...response, body: capturedText(record, captured) } : response;

  increment(record.libraryName);
  try {
    await complete(record, request, data, error);
  } finally {
    decrement(record.libraryName);
  }
}

function capturedText(record: CallRecord, captured: CapturedBody): string | undefined {
  if (record.config.debugLogging) {
    const call = `${record.method.toUpperCase()} ${record.url}`;
    if (captured.error !== undefined) {
      getLogger().debug(`Response body of ${call} ended early: ${describeError(captured.error)}`);
    }
    if (captured.truncated) {
      getLogger().debug(`Response body of ${call} kept to ${record.config.maxPayloadSize} bytes`);
    }
  }
  return captured.body.length > 0 ? captured.body.toString('utf8') : undefined;
}

async function complete(
  record: CallRecord,
  request: RequestSnapshot,
  response: ResponseData,
  error: unknown
): Promise<void> {
  const { method, url, durationSeconds, config } = record;
  await isolate('Recording outbound request', () =>
    getSink().persist(buildRequestLogRecord({ method, url, request, response, durationSeconds, config }))
  );
  await notifyHooks(method.toUpperCase(), url, response.statusCode, durationSeconds, error);
}
