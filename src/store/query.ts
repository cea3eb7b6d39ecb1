/**
 * Query model shared by every queryable sink. In-process sinks evaluate it with
 * matchesQuery(); the PostgreSQL sink translates it to SQL with the same semantics.
 */

import type { LoggableIdentity, StoredRequestLog } from '../types/schema';

export interface RequestLogQuery {
  statusCodes?: number[];
  methods?: string[];
  /** Case-insensitive substring of the URL. */
  urlContains?: string;
  from?: Date;
  to?: Date;
  minDurationMs?: number;
  maxDurationMs?: number;
  loggable?: LoggableIdentity;
  /** Case-insensitive substring of the URL, either body or the metadata. */
  contains?: string;
  limit?: number;
}

export interface RequestLogSummary {
  total: number;
  successful: number;
  failed: number;
  /** Percentage of successful calls (2xx/3xx), rounded to 2 decimals; 0 when empty. */
  successRate: number;
  averageDurationMs: number;
}

export function isSuccessfulStatus(statusCode: number): boolean {
  return statusCode >= 200 && statusCode < 400;
}

export function searchableText(value: unknown): string {
  if (value == null) return '';
  return (typeof value === 'string' ? value : JSON.stringify(value)).toLowerCase();
}

export function matchesQuery(log: StoredRequestLog, query: RequestLogQuery): boolean {
  if (query.statusCodes?.length && !query.statusCodes.includes(log.statusCode)) return false;
  if (query.methods?.length && !query.methods.map((m) => m.toUpperCase()).includes(log.method)) return false;
  if (query.urlContains && !log.url.toLowerCase().includes(query.urlContains.toLowerCase())) return false;

  const createdAt = Date.parse(log.createdAt);
  if (query.from && createdAt < query.from.getTime()) return false;
  if (query.to && createdAt > query.to.getTime()) return false;

  if (query.minDurationMs !== undefined && log.durationMs < query.minDurationMs) return false;
  if (query.maxDurationMs !== undefined && log.durationMs > query.maxDurationMs) return false;

  if (query.loggable) {
    if (log.loggableType !== query.loggable.type || log.loggableId !== query.loggable.id) return false;
  }

  if (query.contains) {
    const needle = query.contains.toLowerCase();
    const haystacks = [log.url, log.requestBody, log.responseBody, log.metadata];
    if (!haystacks.some((value) => searchableText(value).includes(needle))) return false;
  }
  return true;
}

/** Filters, sorts newest first and applies the limit. */
export function applyQuery(logs: readonly StoredRequestLog[], query: RequestLogQuery = {}): StoredRequestLog[] {
  const matched = logs
    .filter((log) => matchesQuery(log, query))
    .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt));
  return query.limit !== undefined ? matched.slice(0, query.limit) : matched;
}

export function summarizeLogs(logs: readonly StoredRequestLog[]): RequestLogSummary {
  const total = logs.length;
  if (total === 0) {
    return { total: 0, successful: 0, failed: 0, successRate: 0, averageDurationMs: 0 };
  }
  const successful = logs.filter((log) => isSuccessfulStatus(log.statusCode)).length;
  const totalDuration = logs.reduce((sum, log) => sum + log.durationMs, 0);
  return {
    total,
    successful,
    failed: total - successful,
    successRate: Math.round((successful / total) * 10000) / 100,
    averageDurationMs: Math.round((totalDuration / total) * 100) / 100,
  };
}
