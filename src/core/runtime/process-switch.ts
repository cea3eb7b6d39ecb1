/**
 * Process-wide kill switch, read from OUTBOUND_RECORDER_ENABLED once and cached.
 * When off, adapters never patch and logHttpRequest always calls straight through.
 */

export const ENABLE_ENV_VAR = 'OUTBOUND_RECORDER_ENABLED';

const DISABLED_VALUES = new Set(['false', '0', 'no', 'off']);

let cached: boolean | undefined;

/** Unset, empty and unrecognised values mean enabled. */
export function parseEnableFlag(raw: string | undefined): boolean {
  if (raw == null) return true;
  return !DISABLED_VALUES.has(raw.trim().toLowerCase());
}

export function isProcessEnabled(): boolean {
  cached ??= parseEnableFlag(process.env[ENABLE_ENV_VAR]);
  return cached;
}

/** Drops the cached value so the next read consults the environment again. Test support. */
export function resetProcessSwitch(): void {
  cached = undefined;
}
