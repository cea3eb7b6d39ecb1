/**
 * Boot sequence behind outbound-recorder/init: file config → global default → sink(s) → adapters.
 */

import { CONFIG_PATH_ENV_VAR, ConfigManager, DEFAULT_CONFIG_PATH } from '../config/config-manager';
import type { Configuration } from '../config/configuration';
import { RecorderContext } from '../context';
import { getLogger } from '../core/logging/logger';
import { ensureContextManager } from '../core/runtime/context-manager';
import { isProcessEnabled } from '../core/runtime/process-switch';
import { appliedAdapters, applyAdapters } from '../instrumentations';
import { createSink } from '../store/create-sink';
import { FanoutSink } from '../store/fanout-sink';
import { setSink } from '../store/sink';
import type { Sink } from '../store/sink';
import type { AdapterName } from '../types/schema';

export interface BootstrapOptions {
  /** Defaults to OUTBOUND_RECORDER_CONFIG_PATH, then ./.outbound-recorder/config.yml. */
  configPath?: string;
}

export interface BootstrapResult {
  configPath: string;
  /** False when no file was found and defaults were used. */
  configLoaded: boolean;
  configuration: Configuration;
  sink: Sink;
  adapters: AdapterName[];
}

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function loadConfig(configPath: string): ConfigManager | undefined {
  try {
    return new ConfigManager(configPath);
  } catch (err: unknown) {
    if (isMissingFile(err)) return undefined;
    throw err;
  }
}

/**
 * A missing config file means defaults (recording disabled until configured).
 * Other read errors propagate as-is; an invalid file throws RecorderConfigError.
 */
export function bootstrap(options: BootstrapOptions = {}): BootstrapResult {
  const configPath = options.configPath ?? process.env[CONFIG_PATH_ENV_VAR] ?? DEFAULT_CONFIG_PATH;
  const manager = loadConfig(configPath);

  const configuration = RecorderContext.initGlobal(manager?.toConfigurationOptions() ?? {});
  ensureContextManager();

  const primaryOptions = manager?.sinkOptions();
  const secondaryOptions = manager?.secondarySinkOptions();
  let sink = createSink(primaryOptions ?? { type: 'noop' });
  if (secondaryOptions) sink = new FanoutSink(sink, createSink(secondaryOptions));
  setSink(sink);

  if (configuration.enabled && isProcessEnabled()) {
    applyAdapters(configuration.adapters);
  }

  const adapters = appliedAdapters();
  getLogger().debug('Outbound recorder bootstrapped', {
    configPath,
    configLoaded: manager !== undefined,
    enabled: configuration.enabled,
    adapters,
  });
  return { configPath, configLoaded: manager !== undefined, configuration, sink, adapters };
}
