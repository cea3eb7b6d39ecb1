/**
 * Config loader for .outbound-recorder/config.yml.
 * Read synchronously so outbound-recorder/init can configure before the app issues requests.
 */

import fs from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { RecorderConfigError } from '../core/errors';
import type { SinkOptions } from '../store/create-sink';
import type { ConfigurationOptions } from './configuration';

export const DEFAULT_CONFIG_PATH = './.outbound-recorder/config.yml';
export const CONFIG_PATH_ENV_VAR = 'OUTBOUND_RECORDER_CONFIG_PATH';

const SinkSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('noop') }),
  z.object({ type: z.literal('memory') }),
  z.object({ type: z.literal('ndjson'), path: z.string().min(1) }),
  z.object({ type: z.literal('postgres'), connectionString: z.string().min(1).optional() }),
]);

export const RecorderFileConfigSchema = z
  .object({
    enabled: z.boolean().optional(),
    adapters: z.array(z.enum(['fetch', 'undici'])).optional(),
    exclude: z
      .object({
        urls: z.array(z.string()).optional(),
        contentTypes: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    redact: z
      .object({
        headers: z.array(z.string()).optional(),
        bodyKeys: z.array(z.string()).optional(),
      })
      .strict()
      .optional(),
    maxBodySize: z.number().int().nonnegative().optional(),
    maxPayloadSize: z.number().int().nonnegative().optional(),
    recursion: z
      .object({
        maxDepth: z.number().int().positive().optional(),
        strict: z.boolean().optional(),
      })
      .strict()
      .optional(),
    debugLogging: z.boolean().optional(),
    sink: SinkSchema.optional(),
    secondarySink: SinkSchema.optional(),
  })
  .strict();

export type RecorderFileConfig = z.infer<typeof RecorderFileConfigSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/**
 * Reads, validates and caches the YAML config. An empty file is an empty config.
 * Accepts an optional configPath for tests (fixture path).
 */
export class ConfigManager {
  private readonly cfg: RecorderFileConfig;

  constructor(readonly configPath: string = DEFAULT_CONFIG_PATH) {
    const raw = fs.readFileSync(configPath, 'utf8');
    let document: unknown;
    try {
      document = parse(raw) ?? {};
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RecorderConfigError('INVALID_CONFIG', `Cannot parse ${configPath}: ${message}`, [message]);
    }
    const result = RecorderFileConfigSchema.safeParse(document);
    if (!result.success) {
      const issues = formatIssues(result.error);
      throw new RecorderConfigError('INVALID_CONFIG', `Invalid config ${configPath}: ${issues.join('; ')}`, issues);
    }
    this.cfg = result.data;
  }

  /** Returns the validated file config. */
  get(): RecorderFileConfig {
    return this.cfg;
  }

  /** Maps the file layout onto Configuration options; absent keys keep their defaults. */
  toConfigurationOptions(): ConfigurationOptions {
    const { cfg } = this;
    const options: ConfigurationOptions = {};
    if (cfg.enabled !== undefined) options.enabled = cfg.enabled;
    if (cfg.adapters !== undefined) options.adapters = cfg.adapters;
    if (cfg.exclude?.urls !== undefined) options.urlExclusionRules = cfg.exclude.urls;
    if (cfg.exclude?.contentTypes !== undefined) options.contentTypeExclusionPrefixes = cfg.exclude.contentTypes;
    if (cfg.redact?.headers !== undefined) options.sensitiveHeaderNames = cfg.redact.headers;
    if (cfg.redact?.bodyKeys !== undefined) options.sensitiveBodyKeySubstrings = cfg.redact.bodyKeys;
    if (cfg.maxBodySize !== undefined) options.maxBodySize = cfg.maxBodySize;
    if (cfg.maxPayloadSize !== undefined) options.maxPayloadSize = cfg.maxPayloadSize;
    if (cfg.recursion?.maxDepth !== undefined) options.maxRecursionDepth = cfg.recursion.maxDepth;
    if (cfg.recursion?.strict !== undefined) options.strictRecursionDetection = cfg.recursion.strict;
    if (cfg.debugLogging !== undefined) options.debugLogging = cfg.debugLogging;
    return options;
  }

  sinkOptions(): SinkOptions | undefined {
    return this.cfg.sink;
  }

  secondarySinkOptions(): SinkOptions | undefined {
    return this.cfg.secondarySink;
  }
}
