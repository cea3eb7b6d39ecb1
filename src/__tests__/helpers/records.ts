import { Configuration } from '../../config/configuration';
import { buildRequestLogRecord } from '../../core/record/request-log-record';
import type { HeaderMap, HttpBody, Metadata, RequestLogRecord } from '../../types/schema';

export type RecordFields = {
  method?: string;
  url?: string;
  statusCode?: number;
  durationSeconds?: number;
  createdAt?: string;
  loggable?: unknown;
  metadata?: Metadata;
  requestHeaders?: HeaderMap;
  requestBody?: HttpBody;
  responseBody?: HttpBody;
};

/** Builds a record the way the pipeline does, with a fixed creation time. */
export function makeRecord(fields: RecordFields = {}): RequestLogRecord {
  return buildRequestLogRecord({
    method: fields.method ?? 'GET',
    url: fields.url ?? 'https://api.example.com/users',
    request: {
      headers: fields.requestHeaders ?? {},
      body: fields.requestBody,
      loggable: fields.loggable,
      metadata: fields.metadata,
    },
    response: {
      statusCode: fields.statusCode ?? 200,
      headers: { 'content-type': 'application/json' },
      body: fields.responseBody,
    },
    durationSeconds: fields.durationSeconds ?? 0.25,
    config: new Configuration(),
    createdAt: new Date(fields.createdAt ?? '2026-01-01T00:00:00.000Z'),
  });
}

/** Four calls across four days, used by the query tests of every queryable sink. */
export function sampleRecords(): RequestLogRecord[] {
  return [
    makeRecord({
      url: 'https://api.example.com/users',
      durationSeconds: 0.1,
      createdAt: '2026-01-01T00:00:00.000Z',
      responseBody: '{"users":["alice"]}',
    }),
    makeRecord({
      method: 'POST',
      url: 'https://api.example.com/orders',
      statusCode: 201,
      durationSeconds: 0.5,
      createdAt: '2026-01-02T00:00:00.000Z',
      loggable: { type: 'Order', id: '7' },
      metadata: { request_id: 'req-9' },
      requestBody: '{"item":"book"}',
      responseBody: 'created',
    }),
    makeRecord({
      url: 'https://payments.example.com/charges',
      statusCode: 500,
      durationSeconds: 1.2,
      createdAt: '2026-01-03T00:00:00.000Z',
      responseBody: 'Internal Error',
    }),
    makeRecord({
      method: 'DELETE',
      url: 'https://api.example.com/orders/7',
      statusCode: 404,
      durationSeconds: 0.05,
      createdAt: '2026-01-04T00:00:00.000Z',
    }),
  ];
}
