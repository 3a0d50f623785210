import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FAILED_OUTCOME } from '../../../core/types.js';
import { JsonFileResolutionCache } from '../../../persistence/json-file-resolution-cache.js';
import {
  SIGNAL_EXIT_CODES,
  installSignalHandlers,
  onShutdown,
  pendingCleanups,
  shutdown,
  withShutdownCleanup,
} from '../../../cli/lib/shutdown.js';

describe('shutdown', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'panel-geocoder-shutdown-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it('closes an open JSON cache before exiting with 130 on SIGINT', async () => {
    const path = join(dir, 'cache.json');
    const cache = await JsonFileResolutionCache.open(path);
    await cache.put('unknown lane, Nakuru, Nakuru, Kenya', FAILED_OUTCOME);
    onShutdown(() => cache.close());
    const exit = vi.fn<(code: number) => void>();

    await shutdown('SIGINT', { exit, report: () => undefined });

    const document: unknown = JSON.parse(await readFile(path, 'utf-8'));
    expect(document).toEqual({
      version: 1,
      entries: { 'unknown lane, Nakuru, Nakuru, Kenya': FAILED_OUTCOME },
    });
    expect(exit).toHaveBeenCalledWith(130);
    expect(pendingCleanups()).toBe(0);
  });

  it('runs the remaining cleanups when one fails', async () => {
    const second = vi.fn(async (): Promise<void> => undefined);
    onShutdown(async () => {
      throw new Error('disk full');
    });
    onShutdown(second);
    const report = vi.fn<(message: string) => void>();
    const exit = vi.fn<(code: number) => void>();

    await shutdown('SIGTERM', { exit, report });

    expect(second).toHaveBeenCalledTimes(1);
    expect(report.mock.calls).toEqual([
      ['Received SIGTERM, closing 2 open resource(s)'],
      ['Cleanup failed: disk full'],
    ]);
    expect(exit).toHaveBeenCalledWith(SIGNAL_EXIT_CODES.SIGTERM);
  });

  it('unregisters a scoped cleanup when the work settles', async () => {
    await withShutdownCleanup(
      () => undefined,
      async () => {
        expect(pendingCleanups()).toBe(1);
      }
    );
    expect(pendingCleanups()).toBe(0);

    await expect(
      withShutdownCleanup(
        () => undefined,
        async () => {
          throw new Error('boom');
        }
      )
    ).rejects.toThrow('boom');
    expect(pendingCleanups()).toBe(0);
  });

  it('listens once for SIGINT and SIGTERM', () => {
    const once = vi.spyOn(process, 'once').mockImplementation(() => process);

    installSignalHandlers();

    expect(once.mock.calls.map(([event]) => event)).toEqual(['SIGINT', 'SIGTERM']);
  });
});
