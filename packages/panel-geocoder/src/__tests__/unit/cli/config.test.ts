import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigError } from '../../../core/errors.js';
import {
  DEFAULT_CONFIG,
  loadConfig,
  resolvePath,
  validateConfig,
} from '../../../cli/lib/config.js';

const ENV_KEYS = [
  'CONFIG',
  'INPUT',
  'OUTPUT',
  'CACHE_PATH',
  'CACHE_BACKEND',
  'BASE_URL',
  'USER_AGENT',
  'COUNTRY',
  'TIMEOUT',
  'MIN_DELAY',
  'VERBOSE',
  'JSON',
];

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'panel-geocoder-config-'));
    for (const key of ENV_KEYS) {
      vi.stubEnv(`PANEL_GEOCODER_${key}`, '');
    }
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults without a config file', async () => {
    const config = await loadConfig({ cwd: dir });

    expect(config.configPath).toBeNull();
    expect(config.paths).toEqual(DEFAULT_CONFIG.paths);
    expect(config.cache.backend).toBe('sqlite');
    expect(config.geocoder).toEqual(DEFAULT_CONFIG.geocoder);
    expect(config.retry).toEqual({ maxAttempts: 3, delayMs: 2000 });
    expect(config.dryRun).toBe(false);
  });

  it('reads a YAML config file found in the working directory', async () => {
    await writeFile(
      join(dir, '.panel-geocoderrc.yaml'),
      [
        'version: 1',
        'paths:',
        '  input: data/panel.csv',
        'cache:',
        '  backend: json',
        'geocoder:',
        '  country: Uganda',
        '  country_codes: [ug]',
        '  min_delay_ms: 1500',
        'retry:',
        '  max_attempts: 2',
      ].join('\n')
    );

    const config = await loadConfig({ cwd: dir });

    expect(config.configPath).toBe(join(dir, '.panel-geocoderrc.yaml'));
    expect(config.paths.input).toBe('data/panel.csv');
    expect(config.paths.output).toBe(DEFAULT_CONFIG.paths.output);
    expect(config.cache.backend).toBe('json');
    expect(config.geocoder.country).toBe('Uganda');
    expect(config.geocoder.countryCodes).toEqual(['ug']);
    expect(config.geocoder.minDelayMs).toBe(1500);
    expect(config.retry.maxAttempts).toBe(2);
    expect(resolvePath(config, 'input')).toBe(join(dir, 'data', 'panel.csv'));
  });

  it('reads a JSON config file given explicitly', async () => {
    const path = join(dir, 'geocoder.json');
    await writeFile(path, JSON.stringify({ geocoder: { user_agent: 'clinic-map/2.0' } }));

    const config = await loadConfig({ configPath: path });

    expect(config.geocoder.userAgent).toBe('clinic-map/2.0');
  });

  it('lets environment variables override the file and flags override both', async () => {
    await writeFile(join(dir, '.panel-geocoderrc'), 'geocoder:\n  country: Uganda\n');
    vi.stubEnv('PANEL_GEOCODER_COUNTRY', 'Tanzania');
    vi.stubEnv('PANEL_GEOCODER_MIN_DELAY', '250');

    const fromEnv = await loadConfig({ cwd: dir });
    expect(fromEnv.geocoder.country).toBe('Tanzania');
    expect(fromEnv.geocoder.minDelayMs).toBe(250);

    const fromFlags = await loadConfig({ cwd: dir, overrides: { country: 'Rwanda', minDelayMs: 0 } });
    expect(fromFlags.geocoder.country).toBe('Rwanda');
    expect(fromFlags.geocoder.minDelayMs).toBe(0);
  });

  it('rejects an unknown cache backend from the environment', async () => {
    vi.stubEnv('PANEL_GEOCODER_CACHE_BACKEND', 'redis');

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(ConfigError);
  });

  it('rejects a non-integer delay from the environment', async () => {
    vi.stubEnv('PANEL_GEOCODER_MIN_DELAY', '1s');

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(
      'PANEL_GEOCODER_MIN_DELAY must be an integer, got "1s"'
    );
  });

  it('rejects unknown keys in the config file', async () => {
    await writeFile(join(dir, '.panel-geocoderrc.yml'), 'geocoder:\n  rate: 5\n');

    await expect(loadConfig({ cwd: dir })).rejects.toThrow(/Invalid config file/);
  });

  it('rejects a missing explicit config file', async () => {
    await expect(loadConfig({ configPath: join(dir, 'absent.yaml') })).rejects.toThrow(
      /Config file not found/
    );
  });
});

describe('validateConfig', () => {
  const base = {
    ...DEFAULT_CONFIG,
    verbose: false,
    json: false,
    dryRun: false,
    configPath: null,
  };

  it('accepts the defaults', () => {
    expect(() => validateConfig(base)).not.toThrow();
  });

  it('rejects attempt counts outside 1..10', () => {
    expect(() => validateConfig({ ...base, retry: { maxAttempts: 0, delayMs: 2000 } })).toThrow(
      'retry.max_attempts must be an integer between 1 and 10'
    );
    expect(() => validateConfig({ ...base, retry: { maxAttempts: 11, delayMs: 2000 } })).toThrow(
      ConfigError
    );
  });

  it('rejects a non-positive timeout and an empty user agent', () => {
    expect(() =>
      validateConfig({ ...base, geocoder: { ...base.geocoder, timeoutMs: 0 } })
    ).toThrow('geocoder.timeout_ms must be a positive number');
    expect(() =>
      validateConfig({ ...base, geocoder: { ...base.geocoder, userAgent: '  ' } })
    ).toThrow('geocoder.user_agent must not be empty');
  });

  it('rejects a negative delay', () => {
    expect(() =>
      validateConfig({ ...base, geocoder: { ...base.geocoder, minDelayMs: -1 } })
    ).toThrow(ConfigError);
  });
});
