import type { Configuration, ConfigurationOptions } from './config/configuration';
import { RecorderContext } from './context';
import type { IsolatedContextOptions, ScopedContextOptions } from './context';
import { clearPendingRecords, flushPendingRecords, logHttpRequest } from './core/pipeline/log-http-request';
import { addHook, clearHooks, removeHook } from './core/pipeline/hooks';
import { isProcessEnabled, resetProcessSwitch } from './core/runtime/process-switch';
import { appliedAdapters, applyAdapters, resetAdapters } from './instrumentations';
import { getSink, setSink } from './store/sink';
import type { Metadata } from './types/schema';

export type ConfigureInput = ConfigurationOptions | ((config: Configuration) => void);

/**
 * Updates the global default configuration. Options are merged over the current
 * default; a mutator receives a copy that is installed once it validates.
 * Scoped overrides already running keep their own copy.
 */
export function configure(input: ConfigureInput): Configuration {
  if (typeof input === 'function') return RecorderContext.configureGlobal(input);
  return RecorderContext.initGlobal(RecorderContext.getGlobalConfiguration().withOverrides(input));
}

/** Turns recording on and patches the configured clients (no-op under OUTBOUND_RECORDER_ENABLED=false). */
export function enable(): void {
  const config = RecorderContext.configureGlobal((c) => {
    c.enabled = true;
  });
  if (isProcessEnabled()) applyAdapters(config.adapters);
}

/** Turns recording off. Installed wrappers stay and call straight through. */
export function disable(): void {
  RecorderContext.configureGlobal((c) => {
    c.enabled = false;
  });
}

/** True when the configuration in effect for this scope records and the process switch allows it. */
export function isEnabled(): boolean {
  return RecorderContext.configuration().enabled && isProcessEnabled();
}

export function setLoggable(loggable: unknown): void {
  RecorderContext.setLoggable(loggable);
}

export function setMetadata(metadata: Metadata | undefined): void {
  RecorderContext.setMetadata(metadata);
}

export function addMetadata(metadata: Metadata): void {
  RecorderContext.mergeMetadata(metadata);
}

export function clearContext(): void {
  RecorderContext.clear();
}

/** Runs body with loggable/metadata attached to every call it makes. */
export function withLogging<T>(options: ScopedContextOptions, body: () => T): T {
  return RecorderContext.withScopedContext(options, body);
}

/** Runs body with a scope-local configuration override. */
export function withConfiguration<T>(overrides: ConfigurationOptions, body: () => T): T {
  return RecorderContext.withScopedConfiguration(overrides, body);
}

export function withIsolatedContext<T>(options: IsolatedContextOptions, body: () => T): T {
  return RecorderContext.withIsolatedContext(options, body);
}

/**
 * Test support: default configuration, empty root scope, no-op sink, no hooks, adapter
 * bookkeeping cleared and the process switch re-read on next use.
 */
export function resetForTesting(): void {
  RecorderContext.reset();
  clearPendingRecords();
  setSink(undefined);
  clearHooks();
  resetAdapters();
  resetProcessSwitch();
}

export const OutboundRecorder = {
  configure,
  configuration: (): Configuration => RecorderContext.configuration(),
  enable,
  disable,
  isEnabled,
  setLoggable,
  setMetadata,
  addMetadata,
  clearContext,
  withLogging,
  withConfiguration,
  withIsolatedContext,
  run: RecorderContext.run,
  applyAdapters,
  appliedAdapters,
  getSink,
  setSink,
  addHook,
  removeHook,
  logHttpRequest,
  flushPendingRecords,
  resetForTesting,
};
