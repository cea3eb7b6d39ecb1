/**
 * Wrapper utility that marks wrapped functions with recorder-owned metadata instead of
 * shimmer's `__wrapped`, so other instrumentation does not treat (or strip) them as its own.
 */

export const RECORDER_WRAPPER_MARKER_KEY = '__outboundRecorderWrapped';
export const RECORDER_WRAPPER_ORIGINAL_KEY = '__outboundRecorderOriginal';

function markWrapped(fn: object, marker: string, original: object): void {
  Object.defineProperty(fn, RECORDER_WRAPPER_MARKER_KEY, {
    configurable: true,
    enumerable: false,
    writable: false,
    value: marker,
  });
  Object.defineProperty(fn, RECORDER_WRAPPER_ORIGINAL_KEY, {
    configurable: true,
    enumerable: false,
    writable: false,
    value: original,
  });
}

function preserveName(wrapper: object, originalName: string): void {
  if (!originalName) return;
  try {
    Object.defineProperty(wrapper, 'name', {
      configurable: true,
      enumerable: false,
      writable: false,
      value: originalName,
    });
  } catch {
    // name is non-configurable on some host functions; the wrapper keeps its own name
  }
}

export function isWrappedWithMarker(fn: unknown, marker: string): boolean {
  return typeof fn === 'function' && Reflect.get(fn, RECORDER_WRAPPER_MARKER_KEY) === marker;
}

export function isMethodWrappedWithMarker<T extends object>(target: T, method: keyof T & string, marker: string): boolean {
  return isWrappedWithMarker(target[method], marker);
}

/**
 * Replaces target[method] with wrapperFactory(original) and marks the wrapper.
 * Idempotent per marker: returns false (and changes nothing) when the current value is
 * already wrapped with the same marker or is not a function.
 */
export function wrapMethodNoConflict<T extends object, K extends keyof T & string>(
  target: T,
  method: K,
  marker: string,
  wrapperFactory: (original: T[K]) => T[K]
): boolean {
  const original = target[method];
  if (typeof original !== 'function') return false;
  if (isWrappedWithMarker(original, marker)) return false;

  const wrapped = wrapperFactory(original);
  if (typeof wrapped !== 'function') {
    throw new TypeError(`wrapMethodNoConflict expected a function wrapper for ${method}`);
  }

  const originalName = original.name || method;
  preserveName(wrapped, originalName);
  markWrapped(wrapped, marker, original);

  Object.defineProperty(target, method, {
    configurable: true,
    enumerable: true,
    writable: true,
    value: wrapped,
  });
  return true;
}
