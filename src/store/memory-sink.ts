import { randomUUID } from 'crypto';
import { toStoredRequestLog } from '../core/record/request-log-record';
import type { RequestLogRecord, StoredRequestLog } from '../types/schema';
import { applyQuery } from './query';
import type { RequestLogQuery } from './query';
import type { QueryableSink } from './sink';

/** In-process sink for tests and short-lived tooling. */
export class MemorySink implements QueryableSink {
  private readonly stored: StoredRequestLog[] = [];
  private readonly raw: RequestLogRecord[] = [];

  async persist(record: RequestLogRecord): Promise<string> {
    const id = randomUUID();
    this.raw.push(record);
    this.stored.push(toStoredRequestLog(record, id));
    return id;
  }

  /** Records exactly as the pipeline handed them over (frozen, loggable intact). */
  records(): readonly RequestLogRecord[] {
    return [...this.raw];
  }

  async query(query: RequestLogQuery = {}): Promise<StoredRequestLog[]> {
    return applyQuery(this.stored, query);
  }

  async cleanup(olderThan: Date): Promise<number> {
    const cutoff = olderThan.getTime();
    let removed = 0;
    for (let i = this.stored.length - 1; i >= 0; i--) {
      const log = this.stored[i];
      if (log && Date.parse(log.createdAt) < cutoff) {
        this.stored.splice(i, 1);
        this.raw.splice(i, 1);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.stored.length = 0;
    this.raw.length = 0;
  }
}
