/**
 * Error taxonomy for the recorder. Every error carries a code so callers can branch
 * without instanceof checks across module copies.
 */

export type RecorderErrorCode =
  | 'INVALID_CONFIG'
  | 'UNSUPPORTED_ADAPTER'
  | 'UNSUPPORTED_SINK'
  | 'INFINITE_RECURSION';

export class RecorderError extends Error {
  readonly code: RecorderErrorCode;

  constructor(code: RecorderErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Raised synchronously to the caller of a configuration call. */
export class RecorderConfigError extends RecorderError {
  constructor(
    code: 'INVALID_CONFIG' | 'UNSUPPORTED_ADAPTER' | 'UNSUPPORTED_SINK',
    message: string,
    readonly issues: string[] = []
  ) {
    super(code, message);
  }
}

/** Raised only under strictRecursionDetection when a library's depth reaches the limit. */
export class InfiniteRecursionError extends RecorderError {
  constructor(
    readonly libraryName: string,
    readonly depth: number,
    readonly maxDepth: number
  ) {
    super(
      'INFINITE_RECURSION',
      `Infinite recursion detected in ${libraryName} (depth: ${depth}, max: ${maxDepth})`
    );
  }
}

/** "ClassName: message" for any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return `${errorClassName(err)}: ${err.message}`;
  return `${typeof err}: ${String(err)}`;
}

export function errorClassName(err: unknown): string {
  if (err instanceof Error) {
    const ctorName = err.constructor?.name;
    return ctorName && ctorName !== 'Object' ? ctorName : err.name;
  }
  return typeof err;
}
