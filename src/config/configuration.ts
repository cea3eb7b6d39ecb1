/**
 * Recorder configuration: enablement, exclusion rules, redaction rules, size and recursion limits.
 * Pure data plus predicates; no I/O. The global default and every scoped override are
 * independent instances (see context.ts).
 */

import { RecorderConfigError } from '../core/errors';
import type { AdapterName, HeaderMap, HttpBody, JsonObject } from '../types/schema';

export const REDACTION_MARKER = '[FILTERED]';

export const SUPPORTED_ADAPTERS: readonly AdapterName[] = ['fetch', 'undici'];

export const DEFAULT_URL_EXCLUSIONS: readonly RegExp[] = [
  /https:\/\/o\d+\.ingest\..*\.sentry\.io/,
  /\/health/,
  /\/ping/,
];

export const DEFAULT_CONTENT_TYPE_EXCLUSIONS: readonly string[] = [
  'text/html',
  'text/css',
  'text/javascript',
  'application/javascript',
  'image/',
  'video/',
  'audio/',
  'font/',
];

export const DEFAULT_SENSITIVE_HEADERS: readonly string[] = [
  'authorization',
  'cookie',
  'set-cookie',
  'x-api-key',
  'x-auth-token',
  'x-access-token',
  'bearer',
];

export const DEFAULT_SENSITIVE_BODY_KEYS: readonly string[] = [
  'password',
  'secret',
  'token',
  'key',
  'auth',
  'credential',
  'private',
];

export const DEFAULT_MAX_BODY_SIZE = 10_000;
export const DEFAULT_MAX_RECURSION_DEPTH = 3;
export const DEFAULT_MAX_PAYLOAD_SIZE = 1_048_576;

/** Options accepted by configure(), the YAML loader and scoped overrides. */
export interface ConfigurationOptions {
  enabled?: boolean;
  adapters?: AdapterName[];
  /** Strings are compiled with new RegExp(). */
  urlExclusionRules?: Array<RegExp | string>;
  contentTypeExclusionPrefixes?: string[];
  sensitiveHeaderNames?: string[];
  sensitiveBodyKeySubstrings?: string[];
  maxBodySize?: number;
  /** Bytes of a streamed response body kept for the record; the rest still reaches the caller. */
  maxPayloadSize?: number;
  maxRecursionDepth?: number;
  strictRecursionDetection?: boolean;
  debugLogging?: boolean;
}

/**
 * Global and lastIndex-carrying flags would make test() stateful across calls,
 * so patterns are rebuilt without them.
 */
function toPattern(rule: RegExp | string): RegExp {
  if (typeof rule === 'string') {
    try {
      return new RegExp(rule);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RecorderConfigError('INVALID_CONFIG', `Invalid URL exclusion pattern ${rule}: ${message}`, [message]);
    }
  }
  if (!rule.global && !rule.sticky) return rule;
  return new RegExp(rule.source, rule.flags.replace(/[gy]/g, ''));
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function characterLength(text: string): number {
  return [...text].length;
}

function parseJsonObject(text: string): JsonObject | undefined {
  try {
    const parsed: unknown = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export class Configuration {
  enabled = false;
  adapters: AdapterName[] = [...SUPPORTED_ADAPTERS];
  urlExclusionRules: RegExp[] = [...DEFAULT_URL_EXCLUSIONS];
  contentTypeExclusionPrefixes: string[] = [...DEFAULT_CONTENT_TYPE_EXCLUSIONS];
  sensitiveHeaderNames: string[] = [...DEFAULT_SENSITIVE_HEADERS];
  sensitiveBodyKeySubstrings: string[] = [...DEFAULT_SENSITIVE_BODY_KEYS];
  maxBodySize = DEFAULT_MAX_BODY_SIZE;
  maxPayloadSize = DEFAULT_MAX_PAYLOAD_SIZE;
  maxRecursionDepth = DEFAULT_MAX_RECURSION_DEPTH;
  strictRecursionDetection = false;
  debugLogging = false;

  constructor(options: ConfigurationOptions = {}) {
    this.assign(options);
    this.validate();
  }

  /** Independent deep copy; mutating the copy never touches this instance. */
  clone(): Configuration {
    const copy = new Configuration();
    copy.enabled = this.enabled;
    copy.adapters = [...this.adapters];
    copy.urlExclusionRules = [...this.urlExclusionRules];
    copy.contentTypeExclusionPrefixes = [...this.contentTypeExclusionPrefixes];
    copy.sensitiveHeaderNames = [...this.sensitiveHeaderNames];
    copy.sensitiveBodyKeySubstrings = [...this.sensitiveBodyKeySubstrings];
    copy.maxBodySize = this.maxBodySize;
    copy.maxPayloadSize = this.maxPayloadSize;
    copy.maxRecursionDepth = this.maxRecursionDepth;
    copy.strictRecursionDetection = this.strictRecursionDetection;
    copy.debugLogging = this.debugLogging;
    return copy;
  }

  /** Returns a validated copy with overrides applied. */
  withOverrides(overrides: ConfigurationOptions): Configuration {
    const copy = this.clone();
    copy.assign(overrides);
    copy.validate();
    return copy;
  }

  /**
   * Throws RecorderConfigError when a field is out of range or names an unknown adapter.
   * Called after construction and after every programmatic mutation.
   */
  validate(): void {
    const issues: string[] = [];
    if (!Number.isInteger(this.maxBodySize) || this.maxBodySize < 0) {
      issues.push(`maxBodySize must be a non-negative integer (got ${this.maxBodySize})`);
    }
    if (!Number.isInteger(this.maxPayloadSize) || this.maxPayloadSize < 0) {
      issues.push(`maxPayloadSize must be a non-negative integer (got ${this.maxPayloadSize})`);
    }
    if (!Number.isInteger(this.maxRecursionDepth) || this.maxRecursionDepth < 1) {
      issues.push(`maxRecursionDepth must be a positive integer (got ${this.maxRecursionDepth})`);
    }
    if (issues.length > 0) {
      throw new RecorderConfigError('INVALID_CONFIG', `Invalid recorder configuration: ${issues.join('; ')}`, issues);
    }
    const unknown = this.adapters.filter((name) => !SUPPORTED_ADAPTERS.includes(name));
    if (unknown.length > 0) {
      throw new RecorderConfigError(
        'UNSUPPORTED_ADAPTER',
        `Unsupported adapter(s): ${unknown.join(', ')}. Supported: ${SUPPORTED_ADAPTERS.join(', ')}`
      );
    }
  }

  shouldLogUrl(url: string | undefined): boolean {
    if (!this.enabled) return false;
    if (url == null || url === '') return false;
    return !this.urlExclusionRules.some((pattern) => pattern.test(url));
  }

  /** A list (some clients expose repeated headers) is reduced to its first entry. */
  shouldLogContentType(contentType: string | string[] | undefined): boolean {
    const value = Array.isArray(contentType) ? contentType[0] : contentType;
    if (value == null || value === '') return true;
    return !this.contentTypeExclusionPrefixes.some((prefix) => value.startsWith(prefix));
  }

  /** Shallow copy with sensitive header values (case-insensitive names) replaced by the marker. */
  filterHeaders(headers: HeaderMap | undefined): HeaderMap {
    const filtered: HeaderMap = {};
    if (!headers) return filtered;
    const sensitive = new Set(this.sensitiveHeaderNames.map((name) => name.toLowerCase()));
    for (const [name, value] of Object.entries(headers)) {
      filtered[name] = sensitive.has(name.toLowerCase()) ? REDACTION_MARKER : value;
    }
    return filtered;
  }

  /**
   * Redacts sensitive keys in JSON object bodies.
   *
   * Bodies longer than maxBodySize characters (code points, not UTF-16 units) are returned
   * exactly as given: the limit bounds the cost of parsing, it does not truncate, so an
   * oversized body is stored unredacted. JSON text is
   * re-serialized after redaction; structured objects are redacted the same way and stay
   * structured. Arrays, scalars and non-JSON text pass through.
   */
  filterBody(body: HttpBody): HttpBody {
    if (body == null) return body;
    if (typeof body === 'string') {
      if (characterLength(body) > this.maxBodySize) return body;
      const parsed = parseJsonObject(body);
      return parsed ? JSON.stringify(this.redactKeys(parsed)) : body;
    }
    if (isJsonObject(body)) {
      if (characterLength(JSON.stringify(body)) > this.maxBodySize) return body;
      return this.redactKeys(body);
    }
    return body;
  }

  toOptions(): Required<ConfigurationOptions> {
    return {
      enabled: this.enabled,
      adapters: [...this.adapters],
      urlExclusionRules: [...this.urlExclusionRules],
      contentTypeExclusionPrefixes: [...this.contentTypeExclusionPrefixes],
      sensitiveHeaderNames: [...this.sensitiveHeaderNames],
      sensitiveBodyKeySubstrings: [...this.sensitiveBodyKeySubstrings],
      maxBodySize: this.maxBodySize,
      maxPayloadSize: this.maxPayloadSize,
      maxRecursionDepth: this.maxRecursionDepth,
      strictRecursionDetection: this.strictRecursionDetection,
      debugLogging: this.debugLogging,
    };
  }

  private redactKeys(source: JsonObject): JsonObject {
    const substrings = this.sensitiveBodyKeySubstrings.map((s) => s.toLowerCase());
    const walk = (obj: JsonObject): JsonObject => {
      const out: JsonObject = {};
      for (const [key, value] of Object.entries(obj)) {
        const lower = key.toLowerCase();
        if (substrings.some((s) => lower.includes(s))) {
          out[key] = REDACTION_MARKER;
        } else {
          out[key] = isJsonObject(value) ? walk(value) : value;
        }
      }
      return out;
    };
    return walk(source);
  }

  private assign(options: ConfigurationOptions): void {
    if (options.enabled !== undefined) this.enabled = options.enabled;
    if (options.adapters !== undefined) this.adapters = [...options.adapters];
    if (options.urlExclusionRules !== undefined) {
      this.urlExclusionRules = options.urlExclusionRules.map(toPattern);
    }
    if (options.contentTypeExclusionPrefixes !== undefined) {
      this.contentTypeExclusionPrefixes = [...options.contentTypeExclusionPrefixes];
    }
    if (options.sensitiveHeaderNames !== undefined) {
      this.sensitiveHeaderNames = [...options.sensitiveHeaderNames];
    }
    if (options.sensitiveBodyKeySubstrings !== undefined) {
      this.sensitiveBodyKeySubstrings = [...options.sensitiveBodyKeySubstrings];
    }
    if (options.maxBodySize !== undefined) this.maxBodySize = options.maxBodySize;
    if (options.maxPayloadSize !== undefined) this.maxPayloadSize = options.maxPayloadSize;
    if (options.maxRecursionDepth !== undefined) this.maxRecursionDepth = options.maxRecursionDepth;
    if (options.strictRecursionDetection !== undefined) {
      this.strictRecursionDetection = options.strictRecursionDetection;
    }
    if (options.debugLogging !== undefined) this.debugLogging = options.debugLogging;
  }
}
