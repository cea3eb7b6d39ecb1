/**
 * Diagnostic logger used by the recorder itself (patch failures, sink failures, recursion).
 * Defaults to a pino logger; host applications and tests swap it via setLogger().
 */

import pino from 'pino';
import type { Logger as PinoLogger } from 'pino';

export type LogFields = Record<string, unknown>;

export interface RecorderLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/** Adapts a pino logger (msg-last call shape) to RecorderLogger. */
export function fromPino(logger: PinoLogger): RecorderLogger {
  return {
    debug: (message, fields) => logger.debug(fields ?? {}, message),
    info: (message, fields) => logger.info(fields ?? {}, message),
    warn: (message, fields) => logger.warn(fields ?? {}, message),
    error: (message, fields) => logger.error(fields ?? {}, message),
  };
}

function createDefaultLogger(): RecorderLogger {
  return fromPino(
    pino({
      name: 'outbound-recorder',
      level: process.env.OUTBOUND_RECORDER_LOG_LEVEL ?? 'info',
    })
  );
}

let current: RecorderLogger | undefined;

export function getLogger(): RecorderLogger {
  current ??= createDefaultLogger();
  return current;
}

/** Replaces the diagnostic logger; undefined restores the pino default. */
export function setLogger(logger: RecorderLogger | undefined): void {
  current = logger;
}
