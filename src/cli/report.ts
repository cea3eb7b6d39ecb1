/**
 * `outbound-recorder report` and `outbound-recorder prune`: read an NDJSON log written by
 * NdjsonSink, filter it with the sink query model and print a summary plus one line per log.
 */

import { NdjsonSink } from '../store/ndjson-sink';
import { summarizeLogs } from '../store/query';
import type { RequestLogQuery, RequestLogSummary } from '../store/query';
import type { StoredRequestLog } from '../types/schema';

const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const GREEN = '\x1b[32m';
const RESET = '\x1b[0m';

const DAY_MS = 24 * 60 * 60 * 1000;

export type ReportArgs = { file: string; query: RequestLogQuery };
export type PruneArgs = { file: string; olderThanDays: number };
export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

export type ReportOutput = {
  color?: boolean;
  write: (line: string) => void;
};

function parseNumber(flag: string, raw: string): number | string {
  const value = Number(raw);
  return Number.isFinite(value) ? value : `${flag} expects a number (got ${raw})`;
}

function parseDate(flag: string, raw: string): Date | string {
  const value = new Date(raw);
  return Number.isNaN(value.getTime()) ? `${flag} expects an ISO date (got ${raw})` : value;
}

/** Parses the arguments after `report`. Repeated --status/--method flags accumulate. */
export function parseReportArgs(argv: readonly string[]): ParseResult<ReportArgs> {
  const query: RequestLogQuery = {};
  const positional: string[] = [];
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined) continue;
    if (!token.startsWith('--')) {
      positional.push(token);
      continue;
    }
    const next = argv[i + 1];
    if (next === undefined) return { ok: false, error: `Missing value for ${token}` };
    i++;
    switch (token) {
      case '--status': {
        const status = parseNumber(token, next);
        if (typeof status === 'string') return { ok: false, error: status };
        query.statusCodes = [...(query.statusCodes ?? []), status];
        break;
      }
      case '--method':
        query.methods = [...(query.methods ?? []), next.toUpperCase()];
        break;
      case '--url':
        query.urlContains = next;
        break;
      case '--contains':
        query.contains = next;
        break;
      case '--since':
      case '--until': {
        const date = parseDate(token, next);
        if (typeof date === 'string') return { ok: false, error: date };
        if (token === '--since') query.from = date;
        else query.to = date;
        break;
      }
      case '--min-duration-ms':
      case '--limit': {
        const value = parseNumber(token, next);
        if (typeof value === 'string') return { ok: false, error: value };
        if (token === '--limit') query.limit = value;
        else query.minDurationMs = value;
        break;
      }
      default:
        return { ok: false, error: `Unknown report option: ${token}` };
    }
  }
  const file = positional[0];
  if (!file) return { ok: false, error: 'report requires <log.ndjson>' };
  return { ok: true, value: { file, query } };
}

export function parsePruneArgs(argv: readonly string[]): ParseResult<PruneArgs> {
  let file: string | undefined;
  let olderThanDays: number | undefined;
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === '--older-than-days') {
      const raw = argv[++i];
      const days = raw === undefined ? Number.NaN : Number(raw);
      if (!Number.isFinite(days) || days < 0) {
        return { ok: false, error: `--older-than-days expects a non-negative number (got ${raw ?? 'nothing'})` };
      }
      olderThanDays = days;
    } else if (token !== undefined && !token.startsWith('--') && file === undefined) {
      file = token;
    } else {
      return { ok: false, error: `Unknown prune option: ${token ?? ''}` };
    }
  }
  if (!file) return { ok: false, error: 'prune requires <log.ndjson>' };
  if (olderThanDays === undefined) return { ok: false, error: 'prune requires --older-than-days <N>' };
  return { ok: true, value: { file, olderThanDays } };
}

function colorFor(statusCode: number): string {
  if (statusCode >= 200 && statusCode < 400) return GREEN;
  if (statusCode >= 400 && statusCode < 500) return YELLOW;
  return RED;
}

export function formatSummary(summary: RequestLogSummary): string {
  return (
    `${summary.total} requests, ${summary.successful} successful, ${summary.failed} failed ` +
    `(${summary.successRate}% success, avg ${summary.averageDurationMs}ms)`
  );
}

/** "<createdAt> <METHOD> <status> <url> <duration>ms", plus the loggable when present. */
export function formatLogLine(log: StoredRequestLog, color = false): string {
  const status = color ? `${colorFor(log.statusCode)}${log.statusCode}${RESET}` : String(log.statusCode);
  const loggable = log.loggableType ? ` [${log.loggableType}#${log.loggableId ?? ''}]` : '';
  return `${log.createdAt} ${log.method} ${status} ${log.url} ${log.durationMs}ms${loggable}`;
}

/** Prints the summary of the matching logs, then the logs newest first. Returns the match count. */
export async function runReport(args: ReportArgs, output: ReportOutput): Promise<number> {
  const logs = await new NdjsonSink(args.file).query(args.query);
  output.write(formatSummary(summarizeLogs(logs)));
  for (const log of logs) output.write(formatLogLine(log, output.color ?? false));
  return logs.length;
}

/** Removes logs older than the cutoff and returns how many were removed. */
export async function runPrune(args: PruneArgs, now: Date = new Date()): Promise<number> {
  const cutoff = new Date(now.getTime() - args.olderThanDays * DAY_MS);
  return new NdjsonSink(args.file).cleanup(cutoff);
}
