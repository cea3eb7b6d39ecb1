import { SUPPORTED_ADAPTERS } from '../config/configuration';
import { RecorderConfigError } from '../core/errors';
import type { AdapterName } from '../types/schema';
import type { InstrumentationAdapter } from './common/adapter';
import { FetchAdapter } from './fetch';
import { UndiciAdapter } from './undici';

export { InstrumentationAdapter } from './common/adapter';
export { FetchAdapter, instrumentFetch } from './fetch';
export { UndiciAdapter, instrumentUndiciRequest } from './undici';

const adapters: Record<AdapterName, InstrumentationAdapter<object>> = {
  fetch: new FetchAdapter(),
  undici: new UndiciAdapter(),
};

function isAdapterName(name: string): name is AdapterName {
  return Object.prototype.hasOwnProperty.call(adapters, name);
}

/** Throws RecorderConfigError(UNSUPPORTED_ADAPTER) for names without a bundled adapter. */
export function getAdapter(name: string): InstrumentationAdapter<object> {
  if (!isAdapterName(name)) {
    throw new RecorderConfigError(
      'UNSUPPORTED_ADAPTER',
      `Unsupported adapter: ${name}. Supported: ${Object.keys(adapters).join(', ')}`
    );
  }
  return adapters[name];
}

/** Validates every name first, then applies; an unknown name applies nothing. */
export function applyAdapters(names: readonly string[]): void {
  const selected = names.map(getAdapter);
  for (const adapter of selected) adapter.apply();
}

export function appliedAdapters(): AdapterName[] {
  return SUPPORTED_ADAPTERS.filter((name) => adapters[name].isApplied());
}

/** Clears applied flags (wrappers stay installed). Test support. */
export function resetAdapters(): void {
  for (const adapter of Object.values(adapters)) adapter.reset();
}
