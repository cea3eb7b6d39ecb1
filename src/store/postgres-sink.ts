/**
 * PostgreSQL sink (pg). Records go to outbound_request_logs; bodies are stored as JSONB so
 * JSON responses stay queryable. Queries are translated to parameterized SQL.
 */

import fs from 'fs/promises';
import path from 'path';
import { Pool } from 'pg';
import { z } from 'zod';
import { durationMs } from '../core/record/request-log-record';
import { identifyLoggable } from '../core/record/loggable';
import type { HttpBody, RequestLogRecord, StoredRequestLog } from '../types/schema';
import type { RequestLogQuery } from './query';
import type { QueryableSink } from './sink';

export const TABLE_NAME = 'outbound_request_logs';
export const SCHEMA_SQL_PATH = path.join(__dirname, 'sql', `${TABLE_NAME}.sql`);

/** The slice of pg.Pool / pg.Client the sink uses. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

export interface PostgresSinkOptions {
  connectionString?: string;
  /** Existing pool or client; the sink does not close it. */
  pool?: PgQueryable;
}

export interface SqlStatement {
  text: string;
  values: unknown[];
}

const COLUMNS = [
  'http_method',
  'url',
  'status_code',
  'request_headers',
  'request_body',
  'response_headers',
  'response_body',
  'duration_seconds',
  'duration_ms',
  'loggable_type',
  'loggable_id',
  'metadata',
  'created_at',
] as const;

const HeaderMapSchema = z.record(z.union([z.string(), z.array(z.string())]));

const LogRowSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String),
  http_method: z.string(),
  url: z.string(),
  status_code: z.coerce.number(),
  request_headers: HeaderMapSchema.nullable(),
  request_body: z.unknown(),
  response_headers: HeaderMapSchema.nullable(),
  response_body: z.unknown(),
  duration_ms: z.coerce.number(),
  loggable_type: z.string().nullable(),
  loggable_id: z.string().nullable(),
  metadata: z.record(z.unknown()).nullable(),
  created_at: z.union([z.date(), z.string()]),
});

/** JSON text is stored parsed; anything else is stored as a JSON string. */
export function toJsonbParam(body: HttpBody): string | null {
  if (body == null) return null;
  if (typeof body === 'string') {
    try {
      JSON.parse(body);
      return body;
    } catch {
      return JSON.stringify(body);
    }
  }
  return JSON.stringify(body);
}

function toHttpBody(value: unknown): HttpBody {
  if (value == null) return undefined;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') return value;
  if (Array.isArray(value)) return value;
  if (typeof value === 'object') return Object.fromEntries(Object.entries(value));
  return undefined;
}

export function rowToStoredLog(row: unknown): StoredRequestLog {
  const parsed = LogRowSchema.parse(row);
  return {
    id: parsed.id,
    method: parsed.http_method,
    url: parsed.url,
    statusCode: parsed.status_code,
    requestHeaders: parsed.request_headers ?? {},
    responseHeaders: parsed.response_headers ?? {},
    requestBody: toHttpBody(parsed.request_body),
    responseBody: toHttpBody(parsed.response_body),
    durationMs: parsed.duration_ms,
    ...(parsed.loggable_type ? { loggableType: parsed.loggable_type } : {}),
    ...(parsed.loggable_id ? { loggableId: parsed.loggable_id } : {}),
    metadata: parsed.metadata ?? {},
    createdAt: new Date(parsed.created_at).toISOString(),
  };
}

export function buildInsert(record: RequestLogRecord): SqlStatement {
  const identity = identifyLoggable(record.loggable);
  const values: unknown[] = [
    record.method,
    record.url,
    record.statusCode,
    JSON.stringify(record.requestHeaders),
    toJsonbParam(record.requestBody),
    JSON.stringify(record.responseHeaders),
    toJsonbParam(record.responseBody),
    record.durationSeconds,
    durationMs(record.durationSeconds),
    identity?.type ?? null,
    identity?.id ?? null,
    JSON.stringify(record.metadata),
    record.createdAt,
  ];
  const placeholders = COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
  return {
    text: `INSERT INTO ${TABLE_NAME} (${COLUMNS.join(', ')}) VALUES (${placeholders}) RETURNING id`,
    values,
  };
}

/** Escapes LIKE wildcards so user input matches literally. */
export function likePattern(input: string): string {
  return `%${input.replace(/[\\%_]/g, (ch) => `\\${ch}`)}%`;
}

export function buildSelect(query: RequestLogQuery = {}): SqlStatement {
  const conditions: string[] = [];
  const values: unknown[] = [];
  const param = (value: unknown): string => {
    values.push(value);
    return `$${values.length}`;
  };

  if (query.statusCodes?.length) conditions.push(`status_code = ANY(${param(query.statusCodes)}::int[])`);
  if (query.methods?.length) {
    conditions.push(`http_method = ANY(${param(query.methods.map((m) => m.toUpperCase()))}::text[])`);
  }
  if (query.urlContains) conditions.push(`url ILIKE ${param(likePattern(query.urlContains))}`);
  if (query.from) conditions.push(`created_at >= ${param(query.from.toISOString())}`);
  if (query.to) conditions.push(`created_at <= ${param(query.to.toISOString())}`);
  if (query.minDurationMs !== undefined) conditions.push(`duration_ms >= ${param(query.minDurationMs)}`);
  if (query.maxDurationMs !== undefined) conditions.push(`duration_ms <= ${param(query.maxDurationMs)}`);
  if (query.loggable) {
    conditions.push(`loggable_type = ${param(query.loggable.type)}`);
    conditions.push(`loggable_id = ${param(query.loggable.id)}`);
  }
  if (query.contains) {
    const p = param(likePattern(query.contains));
    conditions.push(
      `(url ILIKE ${p} OR request_body::text ILIKE ${p} OR response_body::text ILIKE ${p} OR metadata::text ILIKE ${p})`
    );
  }

  let text = `SELECT id, ${COLUMNS.join(', ')} FROM ${TABLE_NAME}`;
  if (conditions.length > 0) text += ` WHERE ${conditions.join(' AND ')}`;
  text += ' ORDER BY created_at DESC';
  if (query.limit !== undefined) text += ` LIMIT ${param(query.limit)}`;
  return { text, values };
}

export class PostgresSink implements QueryableSink {
  private readonly db: PgQueryable;
  private readonly ownedPool?: Pool;

  constructor(options: PostgresSinkOptions) {
    if (options.pool) {
      this.db = options.pool;
    } else {
      const pool = new Pool({ connectionString: options.connectionString });
      this.ownedPool = pool;
      this.db = pool;
    }
  }

  /** Creates the table and indexes when missing. */
  async ensureSchema(): Promise<void> {
    const sql = await fs.readFile(SCHEMA_SQL_PATH, 'utf8');
    await this.db.query(sql);
  }

  async persist(record: RequestLogRecord): Promise<string> {
    const { text, values } = buildInsert(record);
    const result = await this.db.query(text, values);
    const row = z.object({ id: z.union([z.string(), z.number()]) }).parse(result.rows[0]);
    return String(row.id);
  }

  async query(query: RequestLogQuery = {}): Promise<StoredRequestLog[]> {
    const { text, values } = buildSelect(query);
    const result = await this.db.query(text, values);
    return result.rows.map(rowToStoredLog);
  }

  async cleanup(olderThan: Date): Promise<number> {
    const result = await this.db.query(`DELETE FROM ${TABLE_NAME} WHERE created_at < $1`, [olderThan.toISOString()]);
    return result.rowCount ?? 0;
  }

  async close(): Promise<void> {
    await this.ownedPool?.end();
  }
}
