/**
 * Helpers for host test suites (outbound-recorder/testing): record into memory for the length
 * of a test, then query and assert on what was recorded.
 *
 * Clients still have to be instrumented (enable(), outbound-recorder/init or an adapter's
 * apply()); startRecording() only turns recording on and swaps the sink.
 */

import { AssertionError } from 'assert';
import type { ConfigurationOptions } from './config/configuration';
import { RecorderContext } from './context';
import { flushPendingRecords } from './core/pipeline/log-http-request';
import { MemorySink } from './store/memory-sink';
import { summarizeLogs } from './store/query';
import type { RequestLogQuery, RequestLogSummary } from './store/query';
import { getSink, setSink } from './store/sink';
import type { StoredRequestLog } from './types/schema';

export { withConfiguration } from './api';

export interface LoggedRequestOptions {
  statusCode?: number;
}

export class RecordingSession {
  readonly sink = new MemorySink();
  private readonly restore: () => void;

  constructor(options: ConfigurationOptions = {}) {
    const previousConfig = RecorderContext.getGlobalConfiguration();
    const previousSink = getSink();
    RecorderContext.initGlobal(previousConfig.withOverrides({ enabled: true, ...options }));
    setSink(this.sink);
    this.restore = () => {
      RecorderContext.initGlobal(previousConfig);
      setSink(previousSink);
    };
  }

  /**
   * Waits for records whose bodies are still streaming, then queries the session's logs.
   * A body that never ends would keep this waiting.
   */
  async logsMatching(query: RequestLogQuery = {}): Promise<StoredRequestLog[]> {
    await flushPendingRecords();
    return this.sink.query(query);
  }

  async logsCount(query: RequestLogQuery = {}): Promise<number> {
    return (await this.logsMatching(query)).length;
  }

  /** "METHOD url" for every recorded call, in the order they were written. */
  async allCalls(): Promise<string[]> {
    await flushPendingRecords();
    return this.sink.records().map((record) => `${record.method} ${record.url}`);
  }

  async analyze(): Promise<RequestLogSummary> {
    return summarizeLogs(await this.logsMatching());
  }

  /** Resolves to the first matching log; throws AssertionError when none matches. */
  async assertOutboundRequestLogged(
    method: string,
    url: string,
    options: LoggedRequestOptions = {}
  ): Promise<StoredRequestLog> {
    const logs = await this.logsMatching();
    const wanted = method.toUpperCase();
    const match = logs.find(
      (log) =>
        log.method === wanted && log.url === url && (options.statusCode === undefined || log.statusCode === options.statusCode)
    );
    if (match) return match;

    const status = options.statusCode === undefined ? '' : ` with status ${options.statusCode}`;
    const recorded = logs.map((log) => `${log.method} ${log.url} ${log.statusCode}`);
    throw new AssertionError({
      message: `Expected outbound request to be logged: ${wanted} ${url}${status} (recorded: ${recorded.join(', ') || 'none'})`,
    });
  }

  async assertOutboundRequestCount(expected: number, query: RequestLogQuery = {}): Promise<void> {
    const actual = await this.logsCount(query);
    if (actual !== expected) {
      throw new AssertionError({
        message: `Expected ${expected} outbound requests, got ${actual}`,
        actual,
        expected,
        operator: 'strictEqual',
      });
    }
  }

  clear(): void {
    this.sink.clear();
  }

  /** Puts back the global configuration and sink that were in place before the session. */
  stop(): void {
    this.restore();
  }
}

/** Enables recording into a fresh MemorySink until stop(). options override the global default. */
export function startRecording(options: ConfigurationOptions = {}): RecordingSession {
  return new RecordingSession(options);
}
