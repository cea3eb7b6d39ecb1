/**
 * Observability hook registry. Hooks are called after every recorded call (success or
 * failure); a throwing hook is logged at warn and the remaining hooks still run.
 */

import { describeError } from '../errors';
import { getLogger } from '../logging/logger';

export interface ObservabilityHook {
  onHttpRequest(method: string, url: string, statusCode: number, durationSeconds: number, error?: unknown): void | Promise<void>;
}

const hooks: ObservabilityHook[] = [];

export function addHook(hook: ObservabilityHook): void {
  if (!hooks.includes(hook)) hooks.push(hook);
}

export function removeHook(hook: ObservabilityHook): void {
  const index = hooks.indexOf(hook);
  if (index >= 0) hooks.splice(index, 1);
}

export function clearHooks(): void {
  hooks.length = 0;
}

export function getHooks(): readonly ObservabilityHook[] {
  return [...hooks];
}

export async function notifyHooks(
  method: string,
  url: string,
  statusCode: number,
  durationSeconds: number,
  error?: unknown
): Promise<void> {
  for (const hook of getHooks()) {
    try {
      await hook.onHttpRequest(method, url, statusCode, durationSeconds, error);
    } catch (err: unknown) {
      getLogger().warn(`Observability hook failed: ${describeError(err)}`);
    }
  }
}
