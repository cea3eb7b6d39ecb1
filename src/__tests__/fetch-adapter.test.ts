/**
 * fetch adapter: request/response capture through instrumentFetch, and FetchAdapter patching
 * an injected host object (never the real global fetch).
 */

import { FetchAdapter, FETCH_WRAPPER_MARKER, instrumentFetch } from '../instrumentations/fetch';
import type { FetchFn, FetchHost } from '../instrumentations/fetch';
import { RecorderContext } from '../context';
import { flushPendingRecords, pendingRecordCount } from '../core/pipeline/log-http-request';
import { isMethodWrappedWithMarker } from '../core/runtime/wrap';
import { ENABLE_ENV_VAR, resetProcessSwitch } from '../core/runtime/process-switch';
import { setupRecorder, teardownRecorder } from './helpers/recorder-harness';
import type { Harness } from './helpers/recorder-harness';

function fakeFetch(respond: () => Response | Promise<Response>): { fetch: FetchFn; calls: number } {
  const state = {
    calls: 0,
    fetch: async (): Promise<Response> => {
      state.calls += 1;
      return respond();
    },
  };
  return state;
}

const json = (body: string, status = 200): Response =>
  new Response(body, { status, headers: { 'content-type': 'application/json' } });

describe('instrumentFetch', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = setupRecorder();
  });

  afterEach(() => {
    teardownRecorder();
  });

  it('records method, redacted headers and bodies, and leaves the body readable', async () => {
    const fake = fakeFetch(() => json('{"ok":true}', 201));
    const recordedFetch = instrumentFetch(fake.fetch);

    const response = await recordedFetch('https://api.example.com/items', {
      method: 'post',
      headers: { 'Content-Type': 'application/json', Authorization: 'Bearer test-token' },
      body: '{"name":"x","password":"p"}',
    });

    expect(await response.json()).toEqual({ ok: true });
    await flushPendingRecords();
    const [record] = harness.sink.records();
    expect(record?.method).toBe('POST');
    expect(record?.url).toBe('https://api.example.com/items');
    expect(record?.statusCode).toBe(201);
    expect(record?.requestHeaders).toEqual({ 'Content-Type': 'application/json', Authorization: '[FILTERED]' });
    expect(record?.requestBody).toBe('{"name":"x","password":"[FILTERED]"}');
    expect(record?.responseHeaders).toEqual({ 'content-type': 'application/json' });
    expect(record?.responseBody).toBe('{"ok":true}');
  });

  it('reads method and headers from a Request input', async () => {
    const fake = fakeFetch(() => json('{}'));
    const request = new Request('https://api.example.com/things/1', { method: 'PUT', headers: { 'X-Trace': 'abc' } });
    await instrumentFetch(fake.fetch)(request);
    await flushPendingRecords();

    const [record] = harness.sink.records();
    expect(record?.method).toBe('PUT');
    expect(record?.url).toBe('https://api.example.com/things/1');
    expect(record?.requestHeaders).toEqual({ 'x-trace': 'abc' });
  });

  it('accepts URL inputs and URLSearchParams bodies', async () => {
    const fake = fakeFetch(() => json('{}'));
    await instrumentFetch(fake.fetch)(new URL('https://api.example.com/search?q=1'), {
      method: 'POST',
      body: new URLSearchParams({ q: 'shoes', page: '2' }),
    });
    await flushPendingRecords();
    const [record] = harness.sink.records();
    expect(record?.url).toBe('https://api.example.com/search?q=1');
    expect(record?.requestBody).toBe('q=shoes&page=2');
  });

  it('does not read event streams or empty bodies', async () => {
    const stream = fakeFetch(
      () => new Response('data: 1\n\n', { headers: { 'content-type': 'text/event-stream' } })
    );
    const empty = fakeFetch(() => new Response(null, { status: 204 }));

    const streamed = await instrumentFetch(stream.fetch)('https://api.example.com/events');
    await instrumentFetch(empty.fetch)('https://api.example.com/empty');

    expect(await streamed.text()).toBe('data: 1\n\n');
    const records = harness.sink.records();
    expect(records.map((record) => [record.statusCode, record.responseBody])).toEqual([
      [200, undefined],
      [204, undefined],
    ]);
  });

  it('reads the body of a Request input from a copy and leaves it for the underlying fetch', async () => {
    let sent = '';
    const fetchImpl: FetchFn = async (input) => {
      sent = input instanceof Request ? await input.text() : '';
      return json('{}');
    };
    const request = new Request('https://api.example.com/items', {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: '{"name":"x","password":"p"}',
    });

    await instrumentFetch(fetchImpl)(request);
    await flushPendingRecords();

    expect(sent).toBe('{"name":"x","password":"p"}');
    const [record] = harness.sink.records();
    expect(record?.requestBody).toBe('{"name":"x","password":"[FILTERED]"}');
  });

  describe('bodies that stay open', () => {
    const encoder = new TextEncoder();
    const decoder = new TextDecoder();

    function openFeed(contentType: string): { fetch: FetchFn; push: (text: string) => void } {
      const feed: { push: (text: string) => void } = { push: () => undefined };
      const fetchImpl: FetchFn = async () =>
        new Response(
          new ReadableStream<Uint8Array>({
            start(controller) {
              feed.push = (text) => controller.enqueue(encoder.encode(text));
              controller.enqueue(encoder.encode('{"n":1}\n'));
            },
          }),
          { headers: { 'content-type': contentType } }
        );
      return { fetch: fetchImpl, push: (text) => feed.push(text) };
    }

    async function settlesWithin(ms: number, promise: Promise<unknown>): Promise<boolean> {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(false), ms);
      });
      try {
        return await Promise.race([promise.then(() => true), timeout]);
      } finally {
        clearTimeout(timer);
      }
    }

    it.each(['application/x-ndjson', 'video/mp4'])(
      'returns a %s response whose stream never closes without waiting for it',
      async (contentType) => {
        const feed = openFeed(contentType);
        const pending = instrumentFetch(feed.fetch)('https://api.example.com/feed');

        expect(await settlesWithin(1000, pending)).toBe(true);
        const response = await pending;
        const reader = response.body?.getReader();
        const first = await reader?.read();
        expect(decoder.decode(first?.value)).toBe('{"n":1}\n');
        await reader?.cancel();
      }
    );

    it('keeps an open ndjson record pending until the body passes maxPayloadSize', async () => {
      RecorderContext.configureGlobal((c) => {
        c.maxPayloadSize = 12;
      });
      const feed = openFeed('application/x-ndjson');
      const response = await instrumentFetch(feed.fetch)('https://api.example.com/feed');

      expect(pendingRecordCount()).toBe(1);
      expect(harness.sink.records()).toHaveLength(0);

      feed.push('{"n":2}\n');
      await flushPendingRecords();

      const [record] = harness.sink.records();
      expect(record?.responseBody).toBe('{"n":1}\n{"n"');
      const reader = response.body?.getReader();
      const chunks: string[] = [];
      for (let i = 0; i < 2; i++) {
        const chunk = await reader?.read();
        chunks.push(decoder.decode(chunk?.value));
      }
      expect(chunks.join('')).toBe('{"n":1}\n{"n":2}\n');
      await reader?.cancel();
    });

    it('never reads an excluded content type', async () => {
      const feed = openFeed('video/mp4');
      const response = await instrumentFetch(feed.fetch)('https://cdn.example.com/clip.mp4');

      expect(pendingRecordCount()).toBe(0);
      expect(harness.sink.records()).toHaveLength(0);
      expect(response.bodyUsed).toBe(false);
      await response.body?.cancel();
    });
  });

  it('rethrows network errors after recording them', async () => {
    const failure = new TypeError('fetch failed');
    const fake = fakeFetch(() => Promise.reject(failure));
    await expect(instrumentFetch(fake.fetch)('https://api.example.com/down')).rejects.toBe(failure);
    const [record] = harness.sink.records();
    expect(record?.statusCode).toBe(0);
    expect(record?.responseBody).toBe('Error: TypeError: fetch failed');
  });
});

describe('FetchAdapter', () => {
  let harness: Harness;

  beforeEach(() => {
    harness = setupRecorder();
  });

  afterEach(() => {
    teardownRecorder();
  });

  it('wraps the host fetch once and records calls made through it', async () => {
    const fake = fakeFetch(() => json('{}'));
    const host: FetchHost = { fetch: fake.fetch };
    const adapter = new FetchAdapter({ loadTarget: () => host });

    adapter.apply();
    const wrapped = host.fetch;
    adapter.apply();
    adapter.reset();
    adapter.apply();

    expect(adapter.isApplied()).toBe(true);
    expect(host.fetch).toBe(wrapped);
    expect(isMethodWrappedWithMarker(host, 'fetch', FETCH_WRAPPER_MARKER)).toBe(true);

    await host.fetch('https://api.example.com/users');
    await flushPendingRecords();
    expect(fake.calls).toBe(1);
    expect(harness.sink.records()).toHaveLength(1);
  });

  it('does nothing when the process switch is off', () => {
    const previous = process.env[ENABLE_ENV_VAR];
    process.env[ENABLE_ENV_VAR] = 'false';
    resetProcessSwitch();
    try {
      const fake = fakeFetch(() => json('{}'));
      const host: FetchHost = { fetch: fake.fetch };
      const adapter = new FetchAdapter({ loadTarget: () => host });
      adapter.apply();
      expect(adapter.isApplied()).toBe(false);
      expect(host.fetch).toBe(fake.fetch);
    } finally {
      if (previous === undefined) delete process.env[ENABLE_ENV_VAR];
      else process.env[ENABLE_ENV_VAR] = previous;
      resetProcessSwitch();
    }
  });

  it('treats a failing loader as an unavailable client', () => {
    const adapter = new FetchAdapter({
      loadTarget: () => {
        throw new Error('not here');
      },
    });
    expect(() => adapter.apply()).not.toThrow();
    expect(adapter.isApplied()).toBe(false);
  });

  it('logs and continues when the patch itself fails', () => {
    const fake = fakeFetch(() => json('{}'));
    const host: FetchHost = Object.defineProperty({ fetch: fake.fetch }, 'fetch', { writable: false, configurable: false });
    const adapter = new FetchAdapter({ loadTarget: () => host });

    expect(() => adapter.apply()).not.toThrow();

    expect(adapter.isApplied()).toBe(false);
    const errors = harness.logger.messages('error');
    expect(errors).toHaveLength(1);
    expect(errors[0]).toMatch(/^Failed to apply fetch adapter: TypeError: /);
    expect(harness.logger.messages('warn')).toEqual(['fetch requests will not be recorded']);
  });
});
