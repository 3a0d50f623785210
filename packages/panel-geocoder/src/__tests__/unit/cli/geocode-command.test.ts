/**
 * Geocode and cache command tests
 *
 * End to end over temp files with a stand-in provider and a no-op sleep.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { physicalOutcome, type Coordinates } from '../../../core/types.js';
import { PermanentInputError } from '../../../core/errors.js';
import type { GeocodeProvider } from '../../../providers/types.js';
import { loadConfig, type CLIConfig, type LoadConfigOptions } from '../../../cli/lib/config.js';
import { createCLILogger } from '../../../cli/lib/logger.js';
import { EXIT_CODES, exitCodeFor } from '../../../cli/lib/exit-codes.js';
import { runGeocodeCommand } from '../../../cli/commands/geocode.js';
import { runCacheClear, runCacheStats } from '../../../cli/commands/cache.js';
import { pendingCleanups, shutdown } from '../../../cli/lib/shutdown.js';

const CSV = [
  'Name,Specialty,Physical Address,Town,County,Status,Phone,Email',
  'Moi Clinic,GP,12 Moi Avenue,Nairobi,Nairobi,Active,,',
  'Care Online,Psychiatry,Online consultations,Nairobi,Nairobi,Active,,',
  'Lakeside,Dentistry,Unknown Lane,Nakuru,Nakuru,Inactive,,',
  '',
].join('\n');

function fakeProvider() {
  const geocode = vi.fn(async (query: string): Promise<Coordinates | null> => {
    if (query.startsWith('12 moi ave')) return { latitude: -1.2833, longitude: 36.8167 };
    if (query === 'Nakuru, Nakuru, Kenya') return { latitude: -0.3031, longitude: 36.08 };
    return null;
  });
  const provider: GeocodeProvider = { name: 'fake', geocode };
  return { provider, geocode };
}

const noSleep = async (): Promise<void> => undefined;

describe('geocode command', () => {
  let dir: string;
  const logger = createCLILogger({ level: 'error' });

  async function configFor(overrides: LoadConfigOptions['overrides'] = {}): Promise<CLIConfig> {
    return loadConfig({
      cwd: dir,
      overrides: {
        input: join(dir, 'providers.csv'),
        output: join(dir, 'out', 'providers_geocoded.csv'),
        cachePath: join(dir, 'cache.json'),
        cacheBackend: 'json',
        ...overrides,
      },
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'panel-geocoder-cli-'));
    await writeFile(join(dir, 'providers.csv'), CSV);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('geocodes the panel and writes the enriched CSV', async () => {
    const { provider, geocode } = fakeProvider();
    const config = await configFor();

    const outcome = await runGeocodeCommand(config, logger, { provider, sleep: noSleep });

    expect(outcome.kind).toBe('run');
    if (outcome.kind !== 'run') return;

    expect(outcome.result.records.map((r) => r.geoSource)).toEqual([
      'PHYSICAL',
      'VIRTUAL',
      'TOWN_CENTROID',
    ]);
    // Moi: 1; Lakeside: 3 full + 1 town
    expect(geocode).toHaveBeenCalledTimes(5);

    const lines = (await readFile(outcome.outputPath, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(4);
    expect(lines[1]).toBe(
      '"12 moi ave","Nairobi","Nairobi","Active","Moi Clinic","GP","","","-1.2833","36.8167","PHYSICAL","STREET"'
    );
    expect(lines[2]).toBe(
      '"online consultations","Nairobi","Nairobi","Active","Care Online","Psychiatry","","",,,"VIRTUAL","N/A"'
    );
  });

  it('answers a second run from the cache', async () => {
    const first = fakeProvider();
    await runGeocodeCommand(await configFor(), logger, { provider: first.provider, sleep: noSleep });

    const second = fakeProvider();
    const outcome = await runGeocodeCommand(await configFor(), logger, {
      provider: second.provider,
      sleep: noSleep,
    });

    expect(second.geocode).not.toHaveBeenCalled();
    expect(outcome.kind === 'run' && outcome.result.states.CACHE_HIT).toBe(2);
  });

  it('plans a dry run without network calls or output', async () => {
    const { provider, geocode } = fakeProvider();
    const config = await configFor({ dryRun: true });

    const outcome = await runGeocodeCommand(config, logger, { provider, sleep: noSleep });

    expect(outcome).toEqual({
      kind: 'plan',
      plan: {
        total: 3,
        virtual: 1,
        cached: 0,
        pendingQueries: ['12 moi ave, Nairobi, Nairobi, Kenya', 'unknown lane, Nakuru, Nakuru, Kenya'],
      },
    });
    expect(geocode).not.toHaveBeenCalled();
    expect(existsSync(join(dir, 'out', 'providers_geocoded.csv'))).toBe(false);
  });

  it('fails with an input error for a missing panel', async () => {
    const config = await configFor({ input: join(dir, 'missing.csv') });

    const error = await runGeocodeCommand(config, logger, fakeProvider()).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(PermanentInputError);
    expect(exitCodeFor(error)).toBe(EXIT_CODES.INPUT_ERROR);
  });

  it('keeps outcomes resolved before an interrupt', async () => {
    const exit = vi.fn<(code: number) => void>();
    const geocode = vi.fn(async (query: string): Promise<Coordinates | null> => {
      if (query.startsWith('12 moi ave')) return { latitude: -1.2833, longitude: 36.8167 };
      if (exit.mock.calls.length === 0) {
        await shutdown('SIGINT', { exit, report: () => undefined });
      }
      return null;
    });
    const config = await configFor();

    await runGeocodeCommand(config, logger, { provider: { name: 'fake', geocode }, sleep: noSleep });

    expect(exit).toHaveBeenCalledWith(130);
    const document: unknown = JSON.parse(await readFile(join(dir, 'cache.json'), 'utf-8'));
    expect(document).toEqual({
      version: 1,
      entries: {
        '12 moi ave, Nairobi, Nairobi, Kenya': physicalOutcome({
          latitude: -1.2833,
          longitude: 36.8167,
        }),
      },
    });
    expect(pendingCleanups()).toBe(0);
  });

  it('reports and clears cache entries', async () => {
    const { provider } = fakeProvider();
    await runGeocodeCommand(await configFor(), logger, { provider, sleep: noSleep });

    const config = await configFor();
    await expect(runCacheStats(config, logger)).resolves.toEqual({
      entries: 2,
      bySource: { PHYSICAL: 1, TOWN_CENTROID: 1, FAILED: 0 },
    });

    await expect(runCacheClear(config, logger, { source: 'TOWN_CENTROID' })).resolves.toBe(1);
    await expect(runCacheStats(config, logger)).resolves.toEqual({
      entries: 1,
      bySource: { PHYSICAL: 1, TOWN_CENTROID: 0, FAILED: 0 },
    });
  });
});

describe('exitCodeFor', () => {
  it('maps unknown errors to ERRORS', () => {
    expect(exitCodeFor(new Error('boom'))).toBe(EXIT_CODES.ERRORS);
  });
});
