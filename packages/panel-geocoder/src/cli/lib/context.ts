/**
 * CLI Global Context
 *
 * Configuration and logger shared by every command, created once by the
 * program's preAction hook.
 *
 * @module cli/lib/context
 */

import type { OptionValues } from 'commander';
import { CACHE_BACKENDS, type CacheBackend } from '../../persistence/resolution-cache.js';
import { loadConfig, type CLIConfig, type LoadConfigOptions } from './config.js';
import { createCLILogger, type CLILogger } from './logger.js';

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly logger: CLILogger;
  readonly startTime: number;
}

let globalContext: GlobalContext | null = null;

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export async function initializeContext(options: LoadConfigOptions): Promise<GlobalContext> {
  const startTime = Date.now();
  const config = await loadConfig(options);

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });

  globalContext = { config, logger, startTime };
  return globalContext;
}

// ============================================================================
// Commander Options
// ============================================================================

function stringOption(options: OptionValues, key: string): string | undefined {
  const value: unknown = options[key];
  return typeof value === 'string' ? value : undefined;
}

function numberOption(options: OptionValues, key: string): number | undefined {
  const value: unknown = options[key];
  return typeof value === 'number' ? value : undefined;
}

function booleanOption(options: OptionValues, key: string): boolean | undefined {
  const value: unknown = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

function backendOption(options: OptionValues, key: string): CacheBackend | undefined {
  const value = stringOption(options, key);
  return CACHE_BACKENDS.find((backend) => backend === value);
}

/**
 * Map global and command options (commander camelCase keys) to config overrides
 */
export function toLoadConfigOptions(options: OptionValues): LoadConfigOptions {
  return {
    configPath: stringOption(options, 'config'),
    overrides: {
      input: stringOption(options, 'input'),
      output: stringOption(options, 'output'),
      cachePath: stringOption(options, 'cache'),
      cacheBackend: backendOption(options, 'cacheBackend'),
      country: stringOption(options, 'country'),
      minDelayMs: numberOption(options, 'minDelay'),
      verbose: booleanOption(options, 'verbose'),
      json: booleanOption(options, 'json'),
      dryRun: booleanOption(options, 'dryRun'),
    },
  };
}
