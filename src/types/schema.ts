/** Header value as produced by the supported clients (multi-value headers arrive as arrays). */
export type HeaderValue = string | string[];

/** Header map in the shape the pipeline records. Key casing is preserved. */
export type HeaderMap = Record<string, HeaderValue>;

/** Free-form metadata attached to the current scope and copied onto each record. */
export type Metadata = Record<string, unknown>;

/** JSON object body after parsing (or a structured body handed over by a caller). */
export type JsonObject = Record<string, unknown>;

/**
 * Request or response body as seen by the pipeline.
 * Clients provide text; callers of logHttpRequest may also pass structured values.
 */
export type HttpBody = string | JsonObject | unknown[] | number | boolean | null | undefined;

/** Library-specific request data, captured before the underlying call. */
export interface RequestData {
  headers?: HeaderMap;
  body?: HttpBody;
}

/** Normalized response shape every adapter produces from its client's native response. */
export interface ResponseData {
  statusCode: number;
  headers?: HeaderMap;
  body?: HttpBody;
}

/** Request snapshot: library data merged with the scope's loggable and metadata. */
export interface RequestSnapshot extends RequestData {
  loggable?: unknown;
  metadata?: Metadata;
}

/**
 * One finished outbound call, redacted and frozen before a Sink sees it.
 * statusCode 0 means the call failed before any response arrived.
 */
export interface RequestLogRecord {
  readonly method: string;
  readonly url: string;
  readonly statusCode: number;
  readonly requestHeaders: Readonly<HeaderMap>;
  readonly responseHeaders: Readonly<HeaderMap>;
  readonly requestBody?: HttpBody;
  readonly responseBody?: HttpBody;
  readonly durationSeconds: number;
  readonly loggable?: unknown;
  readonly metadata: Readonly<Metadata>;
  readonly createdAt: string;
}

/**
 * Persisted form of a record as returned by queryable sinks.
 * The opaque loggable is reduced to its (type, id) identity.
 */
export interface StoredRequestLog {
  id: string;
  method: string;
  url: string;
  statusCode: number;
  requestHeaders: HeaderMap;
  responseHeaders: HeaderMap;
  requestBody?: HttpBody;
  responseBody?: HttpBody;
  durationMs: number;
  loggableType?: string;
  loggableId?: string;
  metadata: Metadata;
  createdAt: string;
}

/** (type, id) identity of a loggable reference. */
export interface LoggableIdentity {
  type: string;
  id: string;
}

/** Names of the bundled interception adapters. */
export type AdapterName = 'fetch' | 'undici';
