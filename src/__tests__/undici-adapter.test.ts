/**
 * undici adapter against MockAgent (no network) and against an injected module object.
 */

import { MockAgent, request } from 'undici';
import { RecorderContext } from '../context';
import { flushPendingRecords } from '../core/pipeline/log-http-request';
import { isWrappedWithMarker } from '../core/runtime/wrap';
import {
  UNDICI_WRAPPER_MARKER,
  UndiciAdapter,
  instrumentUndiciRequest,
  isUndiciModule,
  undiciUrl,
} from '../instrumentations/undici';
import type { UndiciModuleLike, UndiciRequestFn } from '../instrumentations/undici';
import { setupRecorder, teardownRecorder } from './helpers/recorder-harness';
import type { Harness } from './helpers/recorder-harness';

describe('undici adapter', () => {
  let harness: Harness;
  let agent: MockAgent;

  beforeEach(() => {
    harness = setupRecorder();
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
    teardownRecorder();
  });

  it('records status, headers and both bodies while the caller reads the full body', async () => {
    agent
      .get('https://api.example.com')
      .intercept({ path: '/users', method: 'POST' })
      .reply(200, { users: [] }, { headers: { 'content-type': 'application/json' } });

    const recordedRequest = instrumentUndiciRequest(request);
    const response = await recordedRequest('https://api.example.com/users', {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-api-key': 'test-secret' },
      body: '{"token":"t","name":"n"}',
      dispatcher: agent,
    });

    expect(await response.body.json()).toEqual({ users: [] });
    await flushPendingRecords();
    const [record] = harness.sink.records();
    expect(record?.method).toBe('POST');
    expect(record?.url).toBe('https://api.example.com/users');
    expect(record?.statusCode).toBe(200);
    expect(record?.requestHeaders).toEqual({ 'content-type': 'application/json', 'x-api-key': '[FILTERED]' });
    expect(record?.requestBody).toBe('{"token":"[FILTERED]","name":"n"}');
    expect(record?.responseHeaders).toMatchObject({ 'content-type': 'application/json' });
    expect(record?.responseBody).toBe('{"users":[]}');
  });

  it('keeps maxPayloadSize bytes of the response body and hands the caller all of it', async () => {
    RecorderContext.configureGlobal((c) => {
      c.maxPayloadSize = 4;
    });
    agent.get('https://api.example.com').intercept({ path: '/report', method: 'GET' }).reply(200, 'abcdefgh');

    const response = await instrumentUndiciRequest(request)('https://api.example.com/report', { dispatcher: agent });

    expect(await response.body.text()).toBe('abcdefgh');
    await flushPendingRecords();
    const [record] = harness.sink.records();
    expect(record?.responseBody).toBe('abcd');
  });

  it('hands the caller options untouched when the call is not recorded', async () => {
    agent.get('https://api.example.com').intercept({ path: '/health', method: 'GET' }).reply(200, 'up');
    const seen: unknown[] = [];
    const requestImpl: UndiciRequestFn = (url, options) => {
      seen.push(options);
      return request(url, options);
    };
    const options = { dispatcher: agent };

    const response = await instrumentUndiciRequest(requestImpl)('https://api.example.com/health', options);

    expect(await response.body.text()).toBe('up');
    expect(seen).toHaveLength(1);
    expect(seen[0]).toBe(options);
    expect(harness.sink.records()).toHaveLength(0);
  });

  it('defaults the method to GET and accepts flat header lists', async () => {
    agent.get('https://api.example.com').intercept({ path: '/flat', method: 'GET' }).reply(204, '');

    await instrumentUndiciRequest(request)('https://api.example.com/flat', {
      headers: ['accept', 'application/json', 'authorization', 'Bearer test-token'],
      dispatcher: agent,
    });
    await flushPendingRecords();

    const [record] = harness.sink.records();
    expect(record?.method).toBe('GET');
    expect(record?.statusCode).toBe(204);
    expect(record?.requestHeaders).toEqual({ accept: 'application/json', authorization: '[FILTERED]' });
  });

  it('records failures with status 0 and rethrows', async () => {
    const failure = new Error('socket hang up');
    const failing: UndiciRequestFn = async () => {
      throw failure;
    };
    await expect(instrumentUndiciRequest(failing)('https://api.example.com/down')).rejects.toBe(failure);
    const [record] = harness.sink.records();
    expect(record?.statusCode).toBe(0);
    expect(record?.responseBody).toBe('Error: Error: socket hang up');
  });

  it('patches an injected module once', async () => {
    agent.get('https://api.example.com').intercept({ path: '/users', method: 'GET' }).reply(200, 'ok');
    const mod: UndiciModuleLike = { request };
    const adapter = new UndiciAdapter({ loadTarget: () => mod });

    adapter.apply();
    const wrapped = mod.request;
    adapter.reset();
    adapter.apply();

    expect(mod.request).toBe(wrapped);
    expect(isWrappedWithMarker(mod.request, UNDICI_WRAPPER_MARKER)).toBe(true);
    const response = await mod.request('https://api.example.com/users', { dispatcher: agent });
    expect(await response.body.text()).toBe('ok');
    await flushPendingRecords();
    expect(harness.sink.records()).toHaveLength(1);
    expect(harness.sink.records()[0]?.responseBody).toBe('ok');
  });

  it('patches the live undici module by default', () => {
    const adapter = new UndiciAdapter();
    adapter.apply();
    const live: unknown = require('undici');
    expect(isUndiciModule(live)).toBe(true);
    if (isUndiciModule(live)) {
      expect(isWrappedWithMarker(live.request, UNDICI_WRAPPER_MARKER)).toBe(true);
    }
    expect(adapter.isApplied()).toBe(true);
  });
});

describe('undiciUrl', () => {
  it('accepts strings, URLs and URL objects', () => {
    expect(undiciUrl('https://api.example.com/a')).toBe('https://api.example.com/a');
    expect(undiciUrl(new URL('https://api.example.com/b?c=1'))).toBe('https://api.example.com/b?c=1');
    expect(undiciUrl({ protocol: 'https:', host: 'api.example.com', pathname: '/c' })).toBe('https://api.example.com/c');
  });
});
