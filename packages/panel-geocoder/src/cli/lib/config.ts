/**
 * Panel Geocoder CLI Configuration Management
 *
 * Loads configuration from .panel-geocoderrc (YAML or JSON) with environment
 * variable overrides and defaults. Provides a typed configuration for the
 * geocode and cache commands.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (PANEL_GEOCODER_*)
 * 3. Config file (.panel-geocoderrc or --config path)
 * 4. Default values
 *
 * @module cli/lib/config
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigError } from '../../core/errors.js';
import { DEFAULT_COUNTRY } from '../../normalization/geocode-query.js';
import { NOMINATIM_PUBLIC_URL } from '../../providers/nominatim-geocoder.js';
import { CACHE_BACKENDS, type CacheBackend } from '../../persistence/resolution-cache.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface PathsConfig {
  /** Provider panel (.csv, .ndjson, .jsonl) */
  readonly input: string;
  /** Enriched output (.csv or .ndjson) */
  readonly output: string;
  /** Cache file for the sqlite and json backends */
  readonly cache: string;
}

export interface CacheConfig {
  readonly backend: CacheBackend;
}

export interface GeocoderConfig {
  readonly baseUrl: string;
  /** Descriptive client identifier; public Nominatim requires one */
  readonly userAgent: string;
  /** Appended to every query */
  readonly country: string;
  /** Optional ISO 3166-1 alpha-2 result filter */
  readonly countryCodes: readonly string[];
  /** Provider request timeout */
  readonly timeoutMs: number;
  /** Minimum delay between request starts */
  readonly minDelayMs: number;
}

export interface RetrySettings {
  /** Attempts per tier */
  readonly maxAttempts: number;
  /** Fixed wait between failed attempts */
  readonly delayMs: number;
}

export interface CLIConfig {
  readonly version: number;
  readonly paths: PathsConfig;
  readonly cache: CacheConfig;
  readonly geocoder: GeocoderConfig;
  readonly retry: RetrySettings;

  // Runtime overrides (from CLI flags)
  readonly verbose: boolean;
  readonly json: boolean;
  readonly dryRun: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

// ============================================================================
// Config File Schema
// ============================================================================

const CacheBackendSchema = z.enum(['sqlite', 'json', 'memory', 'none']);

const ConfigFileSchema = z
  .object({
    version: z.number().int().optional(),
    paths: z
      .object({
        input: z.string().optional(),
        output: z.string().optional(),
        cache: z.string().optional(),
      })
      .strict()
      .optional(),
    cache: z.object({ backend: CacheBackendSchema.optional() }).strict().optional(),
    geocoder: z
      .object({
        base_url: z.string().url().optional(),
        user_agent: z.string().optional(),
        country: z.string().optional(),
        country_codes: z.array(z.string()).optional(),
        timeout_ms: z.number().optional(),
        min_delay_ms: z.number().optional(),
      })
      .strict()
      .optional(),
    retry: z
      .object({
        max_attempts: z.number().int().optional(),
        delay_ms: z.number().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

// ============================================================================
// Default Configuration
// ============================================================================

export const DEFAULT_CONFIG: Omit<CLIConfig, 'verbose' | 'json' | 'dryRun' | 'configPath'> = {
  version: 1,

  paths: {
    input: './data/providers.csv',
    output: './outputs/providers_geocoded.csv',
    cache: './outputs/geocode-cache.db',
  },

  cache: {
    backend: 'sqlite',
  },

  geocoder: {
    baseUrl: NOMINATIM_PUBLIC_URL,
    userAgent: 'panel-geocoder/1.0 (provider panel geocoding)',
    country: DEFAULT_COUNTRY,
    countryCodes: [],
    timeoutMs: 10000,
    minDelayMs: 1000,
  },

  retry: {
    maxAttempts: 3,
    delayMs: 2000,
  },
};

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.panel-geocoderrc',
  '.panel-geocoderrc.yaml',
  '.panel-geocoderrc.yml',
  '.panel-geocoderrc.json',
];

/**
 * Find config file in current directory or parent directories
 */
function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }

    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * Parse and validate config file content (YAML parser also reads JSON)
 *
 * @throws {ConfigError} If the file is not valid YAML/JSON or has unknown keys
 */
export function parseConfigFile(filePath: string): ConfigFile {
  const content = readFileSync(filePath, 'utf-8');

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(
      `Cannot parse ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  // Empty file
  if (raw === null || raw === undefined) {
    return {};
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config file ${filePath}: ${issues}`);
  }

  return parsed.data;
}

const ENV_PREFIX = 'PANEL_GEOCODER_';

/** `PANEL_GEOCODER_<name>` readers; an empty value counts as unset */
const env = {
  string(name: string): string | undefined {
    const value = process.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  },

  flag(name: string): boolean | undefined {
    const value = env.string(name);
    return value === undefined ? undefined : /^(1|true|yes)$/i.test(value);
  },

  integer(name: string): number | undefined {
    const value = env.string(name);
    if (value === undefined) return undefined;
    if (!/^-?\d+$/.test(value.trim())) {
      throw new ConfigError(`${ENV_PREFIX}${name} must be an integer, got "${value}"`);
    }
    return Number.parseInt(value, 10);
  },

  backend(): CacheBackend | undefined {
    const value = env.string('CACHE_BACKEND');
    if (value === undefined) return undefined;
    const parsed = CacheBackendSchema.safeParse(value);
    if (!parsed.success) {
      throw new ConfigError(
        `${ENV_PREFIX}CACHE_BACKEND "${value}" is not one of ${CACHE_BACKENDS.join(', ')}`
      );
    }
    return parsed.data;
  },
};

/**
 * An explicit path (flag, then PANEL_GEOCODER_CONFIG) must exist. Without
 * one, the nearest rc file above `cwd` is used, if any.
 */
function locateConfigFile(options: LoadConfigOptions): string | null {
  const explicit = options.configPath ?? env.string('CONFIG');
  if (explicit === undefined) {
    return findConfigFile(options.cwd ?? process.cwd());
  }

  const path = resolve(explicit);
  if (!existsSync(path)) {
    throw new ConfigError(`Config file not found: ${path}`);
  }
  return path;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  configPath?: string;
  /** Directory to start the config file search from (default: cwd) */
  cwd?: string;
  /** CLI flag overrides */
  overrides?: {
    input?: string;
    output?: string;
    cachePath?: string;
    cacheBackend?: CacheBackend;
    country?: string;
    minDelayMs?: number;
    verbose?: boolean;
    json?: boolean;
    dryRun?: boolean;
  };
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} If an explicit config file is missing or any source is invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const configPath = locateConfigFile(options);
  const fileConfig: ConfigFile = configPath === null ? {} : parseConfigFile(configPath);

  const overrides = options.overrides ?? {};
  const defaults = DEFAULT_CONFIG;

  const config: CLIConfig = {
    version: fileConfig.version ?? defaults.version,

    paths: {
      input:
        overrides.input ?? env.string('INPUT') ?? fileConfig.paths?.input ?? defaults.paths.input,
      output:
        overrides.output ?? env.string('OUTPUT') ?? fileConfig.paths?.output ?? defaults.paths.output,
      cache:
        overrides.cachePath ??
        env.string('CACHE_PATH') ??
        fileConfig.paths?.cache ??
        defaults.paths.cache,
    },

    cache: {
      backend:
        overrides.cacheBackend ??
        env.backend() ??
        fileConfig.cache?.backend ??
        defaults.cache.backend,
    },

    geocoder: {
      baseUrl:
        env.string('BASE_URL') ?? fileConfig.geocoder?.base_url ?? defaults.geocoder.baseUrl,
      userAgent:
        env.string('USER_AGENT') ?? fileConfig.geocoder?.user_agent ?? defaults.geocoder.userAgent,
      country:
        overrides.country ??
        env.string('COUNTRY') ??
        fileConfig.geocoder?.country ??
        defaults.geocoder.country,
      countryCodes: fileConfig.geocoder?.country_codes ?? defaults.geocoder.countryCodes,
      timeoutMs:
        env.integer('TIMEOUT') ?? fileConfig.geocoder?.timeout_ms ?? defaults.geocoder.timeoutMs,
      minDelayMs:
        overrides.minDelayMs ??
        env.integer('MIN_DELAY') ??
        fileConfig.geocoder?.min_delay_ms ??
        defaults.geocoder.minDelayMs,
    },

    retry: {
      maxAttempts: fileConfig.retry?.max_attempts ?? defaults.retry.maxAttempts,
      delayMs: fileConfig.retry?.delay_ms ?? defaults.retry.delayMs,
    },

    verbose: overrides.verbose ?? env.flag('VERBOSE') ?? false,
    json: overrides.json ?? env.flag('JSON') ?? false,
    dryRun: overrides.dryRun ?? false,
    configPath,
  };

  validateConfig(config);
  return config;
}

/**
 * Resolve a configured path relative to the config file (or cwd)
 */
export function resolvePath(config: CLIConfig, pathKey: keyof PathsConfig): string {
  const basePath = config.configPath ? resolve(config.configPath, '..') : process.cwd();
  return resolve(basePath, config.paths[pathKey]);
}

/**
 * Validate configuration
 *
 * @throws {ConfigError} If configuration is invalid
 */
export function validateConfig(config: CLIConfig): void {
  if (config.version !== 1) {
    throw new ConfigError(`Unsupported config version: ${config.version}. Expected 1.`);
  }

  if (!(config.geocoder.timeoutMs > 0)) {
    throw new ConfigError('geocoder.timeout_ms must be a positive number');
  }

  if (!(config.geocoder.minDelayMs >= 0)) {
    throw new ConfigError('geocoder.min_delay_ms must be zero or positive');
  }

  if (config.geocoder.userAgent.trim() === '') {
    throw new ConfigError('geocoder.user_agent must not be empty');
  }

  if (
    !Number.isInteger(config.retry.maxAttempts) ||
    config.retry.maxAttempts < 1 ||
    config.retry.maxAttempts > 10
  ) {
    throw new ConfigError('retry.max_attempts must be an integer between 1 and 10');
  }

  if (!(config.retry.delayMs >= 0)) {
    throw new ConfigError('retry.delay_ms must be zero or positive');
  }

  if (!CACHE_BACKENDS.includes(config.cache.backend)) {
    throw new ConfigError(
      `Invalid cache backend: ${config.cache.backend}. Must be one of: ${CACHE_BACKENDS.join(', ')}`
    );
  }
}
