/**
 * Cache Commands
 *
 * Inspect and prune the resolution cache.
 *
 * Usage:
 *   panel-geocoder cache stats
 *   panel-geocoder cache clear [--source <source>]
 *
 * Clearing FAILED entries makes the next run retry those addresses.
 *
 * @module cli/commands/cache
 */

import { Option, type Command } from 'commander';
import type { CacheableOutcome } from '../../core/types.js';
import { openInspectableCache } from '../../persistence/open-cache.js';
import {
  CACHEABLE_SOURCES,
  isCacheableSource,
  withResolutionCache,
  type CacheStats,
} from '../../persistence/resolution-cache.js';
import { resolvePath, type CLIConfig } from '../lib/config.js';
import { getGlobalContext } from '../lib/context.js';
import { EXIT_CODES, exitCodeFor } from '../lib/exit-codes.js';
import type { CLILogger } from '../lib/logger.js';
import { withShutdownCleanup } from '../lib/shutdown.js';

export interface CacheClearOptions {
  readonly source?: CacheableOutcome['source'];
}

function openConfiguredCache(config: CLIConfig) {
  return () =>
    openInspectableCache({ backend: config.cache.backend, path: resolvePath(config, 'cache') });
}

export async function runCacheStats(config: CLIConfig, logger: CLILogger): Promise<CacheStats> {
  logger.commandStart('cache stats', { backend: config.cache.backend });

  const stats = await withResolutionCache(openConfiguredCache(config), (cache) => cache.stats());

  logger.table(
    CACHEABLE_SOURCES.map((source) => ({ Source: source, Entries: stats.bySource[source] })),
    ['Source', 'Entries']
  );
  logger.info('Cache entries', { total: stats.entries });

  return stats;
}

/**
 * @returns number of entries removed
 */
export async function runCacheClear(
  config: CLIConfig,
  logger: CLILogger,
  options: CacheClearOptions = {}
): Promise<number> {
  logger.commandStart('cache clear', {
    backend: config.cache.backend,
    source: options.source ?? 'all',
  });

  if (config.dryRun) {
    const stats = await withResolutionCache(openConfiguredCache(config), (cache) => cache.stats());
    const wouldRemove = options.source === undefined ? stats.entries : stats.bySource[options.source];
    logger.info('Dry run: nothing removed', { wouldRemove });
    return 0;
  }

  const removed = await withResolutionCache(openConfiguredCache(config), (cache) =>
    withShutdownCleanup(
      () => cache.close(),
      () => cache.clear({ source: options.source })
    )
  );

  logger.info('Cache entries removed', { removed });
  return removed;
}

async function runAction(logger: CLILogger, fn: () => Promise<unknown>): Promise<void> {
  try {
    await fn();
    logger.commandEnd(true);
    process.exitCode = EXIT_CODES.SUCCESS;
  } catch (error) {
    logger.error(error instanceof Error ? error.message : String(error));
    logger.commandEnd(false);
    process.exitCode = exitCodeFor(error);
  }
}

export function registerCacheCommands(program: Command): void {
  const cache = program
    .command('cache')
    .description('Inspect and prune the resolution cache')
    .option('--cache <file>', 'Cache file for the sqlite and json backends')
    .addOption(
      new Option('--cache-backend <name>', 'Resolution cache backend').choices(['sqlite', 'json'])
    );

  cache
    .command('stats')
    .description('Show cache entry counts per source')
    .action(async () => {
      const { config, logger } = getGlobalContext();
      await runAction(logger, () => runCacheStats(config, logger));
    });

  cache
    .command('clear')
    .description('Delete cached outcomes (all, or one source)')
    .addOption(
      new Option('--source <source>', 'Only remove entries with this source').choices([
        ...CACHEABLE_SOURCES,
      ])
    )
    .option('--dry-run', 'Report what would be removed')
    .action(async (options: { source?: string }) => {
      const { config, logger } = getGlobalContext();
      const source =
        options.source !== undefined && isCacheableSource(options.source) ? options.source : undefined;
      await runAction(logger, () => runCacheClear(config, logger, { source }));
    });
}
