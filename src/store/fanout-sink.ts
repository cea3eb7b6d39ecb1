import { isolate } from '../core/isolate';
import type { RequestLogRecord } from '../types/schema';
import type { Sink } from './sink';

/**
 * Writes every record to a primary sink and, best effort, to a secondary one.
 * The primary's id is returned and its failure propagates; secondary failures are only logged.
 */
export class FanoutSink implements Sink {
  constructor(
    readonly primary: Sink,
    readonly secondary: Sink
  ) {}

  async persist(record: RequestLogRecord): Promise<string> {
    const [id] = await Promise.all([
      this.primary.persist(record),
      isolate('Recording to secondary sink', () => this.secondary.persist(record)),
    ]);
    return id;
  }

  async close(): Promise<void> {
    await Promise.all([this.primary.close?.(), this.secondary.close?.()]);
  }
}
