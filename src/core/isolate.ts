import { describeError } from './errors';
import { getLogger } from './logging/logger';

const STACK_FRAMES = 5;

/**
 * Runs fn and never lets its failure escape: the error is logged and undefined is returned.
 * Used around persistence and patching, where a failure must not reach the host call site.
 */
export async function isolate<T>(operation: string, fn: () => T | Promise<T>): Promise<T | undefined> {
  try {
    return await fn();
  } catch (err: unknown) {
    reportIsolated(operation, err);
    return undefined;
  }
}

/** Synchronous variant of isolate for code that cannot await (adapter patching). */
export function isolateSync<T>(operation: string, fn: () => T): T | undefined {
  try {
    return fn();
  } catch (err: unknown) {
    reportIsolated(operation, err);
    return undefined;
  }
}

function reportIsolated(operation: string, err: unknown): void {
  const logger = getLogger();
  logger.error(`${operation} failed: ${describeError(err)}`);
  if (err instanceof Error && err.stack) {
    logger.debug(`${operation} backtrace`, {
      stack: err.stack.split('\n').slice(1, STACK_FRAMES + 1).map((line) => line.trim()),
    });
  }
}
