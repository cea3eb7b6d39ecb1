import fs from 'fs/promises';
import path from 'path';
import { randomUUID } from 'crypto';
import { toStoredRequestLog } from '../core/record/request-log-record';
import type { RequestLogRecord, StoredRequestLog } from '../types/schema';
import { applyQuery } from './query';
import type { RequestLogQuery } from './query';
import type { QueryableSink } from './sink';

/** Reads every stored log; a missing file is an empty log. */
export async function readNdjsonLogs(filePath: string): Promise<StoredRequestLog[]> {
  const out: StoredRequestLog[] = [];
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (err: unknown) {
    if (isErrnoException(err) && err.code === 'ENOENT') return [];
    throw err;
  }
  for (const line of content.split(/\r?\n/)) {
    if (!line.trim()) continue;
    out.push(JSON.parse(line));
  }
  return out;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}

/**
 * Appends one JSON line per record. Writes go straight to disk; appends of single lines
 * are not interleaved by the OS, so concurrent persist() calls are safe.
 */
export class NdjsonSink implements QueryableSink {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async persist(record: RequestLogRecord): Promise<string> {
    const id = randomUUID();
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.appendFile(this.filePath, JSON.stringify(toStoredRequestLog(record, id)) + '\n', 'utf8');
    return id;
  }

  async query(query: RequestLogQuery = {}): Promise<StoredRequestLog[]> {
    return applyQuery(await readNdjsonLogs(this.filePath), query);
  }

  /** Rewrites the file without logs created before olderThan. */
  async cleanup(olderThan: Date): Promise<number> {
    const logs = await readNdjsonLogs(this.filePath);
    const kept = logs.filter((log) => Date.parse(log.createdAt) >= olderThan.getTime());
    const removed = logs.length - kept.length;
    if (removed > 0) {
      const content = kept.map((log) => JSON.stringify(log) + '\n').join('');
      await fs.writeFile(this.filePath, content, 'utf8');
    }
    return removed;
  }
}
