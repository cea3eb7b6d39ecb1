/**
 * Sink: durable destination for finished records. persist() may be called concurrently
 * from many scopes; a rejection is caught by the pipeline and never reaches the call site.
 */

import type { RequestLogRecord, StoredRequestLog } from '../types/schema';
import type { RequestLogQuery } from './query';

export interface Sink {
  /** Stores one record and resolves to the identity the sink assigned. */
  persist(record: RequestLogRecord): Promise<string>;
  close?(): Promise<void>;
}

/** Sinks that can answer the analysis queries (report CLI, host dashboards). */
export interface QueryableSink extends Sink {
  query(query?: RequestLogQuery): Promise<StoredRequestLog[]>;
  /** Deletes records created before olderThan; resolves to the number removed. */
  cleanup(olderThan: Date): Promise<number>;
}

export function isQueryableSink(sink: Sink): sink is QueryableSink {
  return 'query' in sink && typeof sink.query === 'function' && 'cleanup' in sink && typeof sink.cleanup === 'function';
}

/** Accepts records and drops them. Default until a sink is configured. */
export class NoopSink implements Sink {
  async persist(_record: RequestLogRecord): Promise<string> {
    return '';
  }
}

let currentSink: Sink = new NoopSink();

export function getSink(): Sink {
  return currentSink;
}

/** Installs the process-wide sink; undefined restores the no-op sink. */
export function setSink(sink: Sink | undefined): void {
  currentSink = sink ?? new NoopSink();
}
