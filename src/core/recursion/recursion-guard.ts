/**
 * Per-library recursion counters, stored on the current scope (RecorderContext.state()).
 * An entry exists only while its depth is above zero.
 */

import type { Configuration } from '../../config/configuration';
import { RecorderContext } from '../../context';
import { InfiniteRecursionError } from '../errors';
import { getLogger } from '../logging/logger';

export function currentDepth(libraryName: string): number {
  return RecorderContext.state().recursionDepth.get(libraryName) ?? 0;
}

export function inRecursion(libraryName: string): boolean {
  return currentDepth(libraryName) > 0;
}

export function increment(libraryName: string): number {
  const depth = currentDepth(libraryName) + 1;
  RecorderContext.state().recursionDepth.set(libraryName, depth);
  return depth;
}

export function decrement(libraryName: string): number {
  const counters = RecorderContext.state().recursionDepth;
  const depth = Math.max(0, (counters.get(libraryName) ?? 0) - 1);
  if (depth === 0) {
    counters.delete(libraryName);
  } else {
    counters.set(libraryName, depth);
  }
  return depth;
}

/**
 * Throws InfiniteRecursionError when strict detection is on and the library has reached
 * maxRecursionDepth. No-op otherwise.
 */
export function checkDepth(libraryName: string, config: Configuration = RecorderContext.configuration()): void {
  if (!config.strictRecursionDetection) return;
  const depth = currentDepth(libraryName);
  if (depth < config.maxRecursionDepth) return;

  const error = new InfiniteRecursionError(libraryName, depth, config.maxRecursionDepth);
  const scope = RecorderContext.state();
  if (!scope.reportingRecursion) {
    scope.reportingRecursion = true;
    try {
      getLogger().error(error.message, { libraryName, depth, maxDepth: config.maxRecursionDepth });
    } finally {
      scope.reportingRecursion = false;
    }
  }
  throw error;
}
