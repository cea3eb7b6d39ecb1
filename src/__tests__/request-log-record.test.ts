/**
 * Record construction (redaction, freezing, ownership of bodies), the stored shape and
 * loggable identity.
 */

import { Configuration } from '../config/configuration';
import { identifyLoggable } from '../core/record/loggable';
import {
  buildRequestLogRecord,
  durationMs,
  headerValue,
  toStoredRequestLog,
} from '../core/record/request-log-record';

class Invoice {
  constructor(readonly id: number) {}
}

describe('buildRequestLogRecord', () => {
  const body = { user: 'ada', password: 'test-secret', profile: { apiToken: 't' } };

  function build() {
    return buildRequestLogRecord({
      method: 'post',
      url: 'https://api.example.com/sessions',
      request: {
        headers: { Authorization: 'Bearer test-secret', Accept: '*/*' },
        body,
        loggable: { type: 'User', id: 3 },
        metadata: { request_id: 'req-1' },
      },
      response: { statusCode: 201, headers: { 'Set-Cookie': 'sid=1', 'Content-Type': 'application/json' }, body: '{"ok":true}' },
      durationSeconds: 0.0421,
      config: new Configuration(),
      createdAt: new Date('2026-03-01T10:00:00.000Z'),
    });
  }

  it('redacts headers and bodies and upper-cases the method', () => {
    const record = build();
    expect(record).toEqual({
      method: 'POST',
      url: 'https://api.example.com/sessions',
      statusCode: 201,
      requestHeaders: { Authorization: '[FILTERED]', Accept: '*/*' },
      responseHeaders: { 'Set-Cookie': '[FILTERED]', 'Content-Type': 'application/json' },
      requestBody: { user: 'ada', password: '[FILTERED]', profile: { apiToken: '[FILTERED]' } },
      responseBody: '{"ok":true}',
      durationSeconds: 0.0421,
      loggable: { type: 'User', id: 3 },
      metadata: { request_id: 'req-1' },
      createdAt: '2026-03-01T10:00:00.000Z',
    });
  });

  it('freezes the record without freezing caller objects', () => {
    const record = build();
    expect(Object.isFrozen(record)).toBe(true);
    expect(Object.isFrozen(record.requestHeaders)).toBe(true);
    expect(Object.isFrozen(record.metadata)).toBe(true);
    expect(Object.isFrozen(record.requestBody)).toBe(true);
    expect(Object.isFrozen(body)).toBe(false);
    expect(body.password).toBe('test-secret');
  });

  it('converts to the stored shape with the loggable identity', () => {
    expect(toStoredRequestLog(build(), 'log-1')).toEqual({
      id: 'log-1',
      method: 'POST',
      url: 'https://api.example.com/sessions',
      statusCode: 201,
      requestHeaders: { Authorization: '[FILTERED]', Accept: '*/*' },
      responseHeaders: { 'Set-Cookie': '[FILTERED]', 'Content-Type': 'application/json' },
      requestBody: { user: 'ada', password: '[FILTERED]', profile: { apiToken: '[FILTERED]' } },
      responseBody: '{"ok":true}',
      durationMs: 42.1,
      loggableType: 'User',
      loggableId: '3',
      metadata: { request_id: 'req-1' },
      createdAt: '2026-03-01T10:00:00.000Z',
    });
  });
});

describe('record helpers', () => {
  it('durationMs rounds to two decimals', () => {
    expect(durationMs(1.2)).toBe(1200);
    expect(durationMs(0.0123456)).toBe(12.35);
  });

  it('headerValue looks headers up case-insensitively', () => {
    expect(headerValue({ 'Content-Type': 'text/plain' }, 'content-type')).toBe('text/plain');
    expect(headerValue({}, 'content-type')).toBeUndefined();
    expect(headerValue(undefined, 'content-type')).toBeUndefined();
  });
});

describe('identifyLoggable', () => {
  it('reads type/id and loggableType/loggableId descriptors', () => {
    expect(identifyLoggable({ type: 'Order', id: 7 })).toEqual({ type: 'Order', id: '7' });
    expect(identifyLoggable({ loggableType: 'User', loggableId: 'u1' })).toEqual({ type: 'User', id: 'u1' });
    expect(identifyLoggable({ type: 'Order', id: BigInt(9) })).toEqual({ type: 'Order', id: '9' });
  });

  it('uses the class name of model instances', () => {
    expect(identifyLoggable(new Invoice(12))).toEqual({ type: 'Invoice', id: '12' });
  });

  it('has no identity for plain values or objects without a usable id', () => {
    expect(identifyLoggable(undefined)).toBeUndefined();
    expect(identifyLoggable('Order#7')).toBeUndefined();
    expect(identifyLoggable({ id: 5 })).toBeUndefined();
    expect(identifyLoggable({ type: 'Order', id: '' })).toBeUndefined();
  });
});
