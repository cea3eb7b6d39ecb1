import { context } from '@opentelemetry/api';
import { AsyncLocalStorageContextManager } from '@opentelemetry/context-async-hooks';

let ensured = false;

/**
 * Scoped state lives in OpenTelemetry context, which only follows async work once a
 * context manager is registered. Installs AsyncLocalStorageContextManager unless the
 * host (e.g. an OTel SDK) already registered one, in which case that one is kept.
 */
export function ensureContextManager(): void {
  if (ensured) return;
  ensured = true;
  const manager = new AsyncLocalStorageContextManager();
  manager.enable();
  if (!context.setGlobalContextManager(manager)) {
    manager.disable();
  }
}
