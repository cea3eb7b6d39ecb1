/**
 * Observability hook that writes one structured pino line per recorded call.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import { RecorderContext } from '../context';
import { errorClassName } from '../core/errors';
import type { ObservabilityHook } from '../core/pipeline/hooks';

type HttpLogLevel = 'debug' | 'info' | 'warn' | 'error';

const SENSITIVE_PARAM = /password|token|secret|key|auth|credential/i;

/** Drops query parameters whose names look sensitive. Unparseable URLs are returned as is. */
export function sanitizeUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }
  const sensitive = [...parsed.searchParams.keys()].filter((name) => SENSITIVE_PARAM.test(name));
  if (sensitive.length === 0) return url;
  for (const name of sensitive) parsed.searchParams.delete(name);
  return parsed.toString();
}

export function httpLogLevel(statusCode: number, error?: unknown): HttpLogLevel {
  if (error !== undefined) return 'error';
  if (statusCode >= 200 && statusCode < 400) return 'info';
  if (statusCode >= 400 && statusCode < 500) return 'warn';
  if (statusCode >= 500 && statusCode < 600) return 'error';
  return 'debug';
}

export class StructuredLogHook implements ObservabilityHook {
  readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? pino({ name: 'outbound-recorder.http' });
  }

  onHttpRequest(method: string, url: string, statusCode: number, durationSeconds: number, error?: unknown): void {
    const upper = method.toUpperCase();
    const safeUrl = sanitizeUrl(url);
    const requestId = RecorderContext.getMetadata()?.request_id;
    const fields: Record<string, unknown> = {
      category: 'http_request',
      method: upper,
      url: safeUrl,
      status_code: statusCode,
      duration_seconds: durationSeconds,
      success: statusCode >= 200 && statusCode < 300,
      ...(requestId !== undefined && { request_id: requestId }),
    };
    if (error !== undefined) {
      fields.error_class = errorClassName(error);
      fields.error_message = error instanceof Error ? error.message : String(error);
    }
    this.logger[httpLogLevel(statusCode, error)](fields, `HTTP ${upper} ${safeUrl} ${statusCode}`);
  }
}
