import type { Configuration } from '../../config/configuration';
import type {
  HeaderMap,
  HeaderValue,
  HttpBody,
  RequestLogRecord,
  RequestSnapshot,
  ResponseData,
  StoredRequestLog,
} from '../../types/schema';
import { identifyLoggable } from './loggable';

export interface RecordInput {
  method: string;
  url: string;
  request: RequestSnapshot;
  response: ResponseData;
  durationSeconds: number;
  config: Configuration;
  createdAt?: Date;
}

/** Structured bodies are copied so freezing the record never freezes a caller's object. */
function ownBody(body: HttpBody): HttpBody {
  if (typeof body !== 'object' || body === null) return body;
  const copy = structuredClone(body);
  Object.freeze(copy);
  return copy;
}

/**
 * Redacts and freezes one record. Built completely before any sink sees it.
 */
export function buildRequestLogRecord(input: RecordInput): RequestLogRecord {
  const { config, request, response } = input;
  const record: RequestLogRecord = {
    method: input.method.toUpperCase(),
    url: input.url,
    statusCode: response.statusCode,
    requestHeaders: Object.freeze(config.filterHeaders(request.headers)),
    responseHeaders: Object.freeze(config.filterHeaders(response.headers)),
    requestBody: ownBody(config.filterBody(request.body)),
    responseBody: ownBody(config.filterBody(response.body)),
    durationSeconds: input.durationSeconds,
    loggable: request.loggable,
    metadata: Object.freeze({ ...(request.metadata ?? {}) }),
    createdAt: (input.createdAt ?? new Date()).toISOString(),
  };
  return Object.freeze(record);
}

/** Case-insensitive single header lookup. */
export function headerValue(headers: HeaderMap | undefined, name: string): HeaderValue | undefined {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

export function durationMs(durationSeconds: number): number {
  return Math.round(durationSeconds * 1000 * 100) / 100;
}

/** Storage shape: mutable copies, loggable reduced to its (type, id) identity. */
export function toStoredRequestLog(record: RequestLogRecord, id: string): StoredRequestLog {
  const identity = identifyLoggable(record.loggable);
  return {
    id,
    method: record.method,
    url: record.url,
    statusCode: record.statusCode,
    requestHeaders: { ...record.requestHeaders },
    responseHeaders: { ...record.responseHeaders },
    requestBody: record.requestBody,
    responseBody: record.responseBody,
    durationMs: durationMs(record.durationSeconds),
    ...(identity && { loggableType: identity.type, loggableId: identity.id }),
    metadata: { ...record.metadata },
    createdAt: record.createdAt,
  };
}
