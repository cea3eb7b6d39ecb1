/**
 * Scoped recorder context (loggable, metadata, recursion counters, configuration override).
 *
 * State is stored in OpenTelemetry Context under RECORDER_CONTEXT_KEY, so it follows async
 * work through the registered context manager. Each with* helper runs its body against a
 * copied ScopeState: changes made inside never leak to the parent or to concurrent scopes,
 * and the parent's values are visible again on every exit path. Code running outside any
 * scope shares one process-level root state.
 */

import { createContextKey, context } from '@opentelemetry/api';
import type { Context } from '@opentelemetry/api';
import { Configuration } from './config/configuration';
import type { ConfigurationOptions } from './config/configuration';
import { ensureContextManager } from './core/runtime/context-manager';
import type { Metadata } from './types/schema';

/** Context key under which scope state is stored in OTel Context. Exported for tests. */
export const RECORDER_CONTEXT_KEY = createContextKey('outbound_recorder_scope');

export class ScopeState {
  loggable?: unknown;
  metadata?: Metadata;
  recursionDepth = new Map<string, number>();
  configOverride?: Configuration;
  /** Set while a recursion violation is being logged, so the log call cannot re-trigger it. */
  reportingRecursion = false;

  /** Child copy: maps and objects are copied so the child never writes into its parent. */
  fork(): ScopeState {
    const child = new ScopeState();
    child.loggable = this.loggable;
    child.metadata = this.metadata ? { ...this.metadata } : undefined;
    child.recursionDepth = new Map(this.recursionDepth);
    child.configOverride = this.configOverride;
    child.reportingRecursion = this.reportingRecursion;
    return child;
  }
}

export interface ScopedContextOptions {
  loggable?: unknown;
  metadata?: Metadata;
}

export interface IsolatedContextOptions extends ScopedContextOptions {
  config?: ConfigurationOptions;
}

let globalDefault = new Configuration();
let rootState = new ScopeState();

/** Scope state visible from otelContext (defaults to the active context). */
function state(otelContext: Context = context.active()): ScopeState {
  const value = otelContext.getValue(RECORDER_CONTEXT_KEY);
  return value instanceof ScopeState ? value : rootState;
}

function enter<T>(scope: ScopeState, body: () => T): T {
  ensureContextManager();
  return context.with(context.active().setValue(RECORDER_CONTEXT_KEY, scope), body);
}

function getLoggable(): unknown {
  return state().loggable;
}

function setLoggable(loggable: unknown): void {
  state().loggable = loggable;
}

function getMetadata(): Metadata | undefined {
  return state().metadata;
}

/** Replaces the scope's metadata wholesale. */
function setMetadata(metadata: Metadata | undefined): void {
  state().metadata = metadata ? { ...metadata } : undefined;
}

/** Shallow-merges into the scope's metadata, creating it if absent. */
function mergeMetadata(metadata: Metadata): void {
  const current = state();
  current.metadata = { ...(current.metadata ?? {}), ...metadata };
}

/** Resets loggable, metadata and recursion counters of the current scope only. */
function clear(): void {
  const current = state();
  current.loggable = undefined;
  current.metadata = undefined;
  current.recursionDepth.clear();
}

/**
 * Runs body with loggable and/or metadata overridden. An absent loggable or an empty
 * metadata map leaves the inherited value in place.
 */
function withScopedContext<T>(options: ScopedContextOptions, body: () => T): T {
  const child = state().fork();
  if (options.loggable !== undefined) child.loggable = options.loggable;
  if (options.metadata && Object.keys(options.metadata).length > 0) {
    child.metadata = { ...options.metadata };
  }
  return enter(child, body);
}

/**
 * Runs body against a copy of the currently effective configuration with overrides applied.
 * The global default and the enclosing override are never modified.
 */
function withScopedConfiguration<T>(overrides: ConfigurationOptions, body: () => T): T {
  const child = state().fork();
  child.configOverride = configuration().withOverrides(overrides);
  return enter(child, body);
}

/** Runs body in a fresh scope: nothing inherited from the caller except the global default. */
function run<T>(body: () => T): T {
  return enter(new ScopeState(), body);
}

/** Fresh scope seeded with loggable, metadata and a configuration override. */
function withIsolatedContext<T>(options: IsolatedContextOptions, body: () => T): T {
  const scope = new ScopeState();
  scope.loggable = options.loggable;
  scope.metadata = options.metadata ? { ...options.metadata } : undefined;
  if (options.config) scope.configOverride = globalDefault.withOverrides(options.config);
  return enter(scope, body);
}

/** The one configuration in effect for the current scope. */
function configuration(): Configuration {
  return state().configOverride ?? globalDefault;
}

function getGlobalConfiguration(): Configuration {
  return globalDefault;
}

function hasConfigurationOverride(): boolean {
  return state().configOverride !== undefined;
}

/** Replaces the global default. Call at boot. */
function initGlobal(config: Configuration | ConfigurationOptions): Configuration {
  globalDefault = config instanceof Configuration ? config : new Configuration(config);
  return globalDefault;
}

/**
 * Applies mutator to a copy of the global default and installs the copy once it validates.
 * Readers holding the previous instance never see a half-applied change.
 */
function configureGlobal(mutator: (config: Configuration) => void): Configuration {
  const next = globalDefault.clone();
  mutator(next);
  next.validate();
  globalDefault = next;
  return globalDefault;
}

/** Test support: fresh global default and root state. */
function reset(): void {
  globalDefault = new Configuration();
  rootState = new ScopeState();
}

export const RecorderContext = {
  state,
  getLoggable,
  setLoggable,
  getMetadata,
  setMetadata,
  mergeMetadata,
  clear,
  withScopedContext,
  withScopedConfiguration,
  withIsolatedContext,
  run,
  configuration,
  getGlobalConfiguration,
  hasConfigurationOverride,
  initGlobal,
  configureGlobal,
  reset,
};
