import type { HeaderMap } from '../../types/schema';

function joinValue(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) return value.map(String).join(', ');
  return undefined;
}

function append(out: HeaderMap, name: string, value: string): void {
  if (!name) return;
  const existing = out[name];
  out[name] = existing === undefined ? value : `${joinValue(existing)}, ${value}`;
}

/** Flat [name, value, name, value, ...] list as used by undici and raw Node headers. */
export function fromFlatList(list: readonly unknown[]): HeaderMap {
  const out: HeaderMap = {};
  for (let i = 0; i + 1 < list.length; i += 2) {
    const name = list[i];
    const value = joinValue(list[i + 1]);
    if (typeof name === 'string' && value !== undefined) append(out, name, value);
  }
  return out;
}

/** [name, value] pairs: HeadersInit arrays, Map entries, Headers iteration. */
export function fromPairs(pairs: Iterable<readonly unknown[]>): HeaderMap {
  const out: HeaderMap = {};
  for (const [name, raw] of pairs) {
    const value = joinValue(raw);
    if (typeof name === 'string' && value !== undefined) append(out, name, value);
  }
  return out;
}

/** Plain header object; key casing is preserved, multi-values are joined with ", ". */
export function fromRecord(record: Readonly<Record<string, unknown>>): HeaderMap {
  const out: HeaderMap = {};
  for (const [name, raw] of Object.entries(record)) {
    const value = joinValue(raw);
    if (value !== undefined) out[name] = value;
  }
  return out;
}

/** Accepts any of the header shapes Node HTTP clients take. */
export function normalizeHeaders(headers: unknown): HeaderMap {
  if (headers == null || typeof headers !== 'object') return {};
  if (Array.isArray(headers)) {
    return headers.every((entry) => Array.isArray(entry)) ? fromPairs(headers) : fromFlatList(headers);
  }
  if (isPairIterable(headers)) return fromPairs(headers);
  return fromRecord(Object.fromEntries(Object.entries(headers)));
}

function isPairIterable(value: object): value is Iterable<readonly unknown[]> {
  return Symbol.iterator in value && typeof Reflect.get(value, Symbol.iterator) === 'function';
}
