/**
 * Geocode Command
 *
 * Geocode a provider panel and write the enriched records.
 *
 * Usage:
 *   panel-geocoder geocode [options]
 *
 * Options:
 *   --input <file>           Provider panel (.csv, .ndjson, .jsonl)
 *   --output <file>          Enriched output (.csv or .ndjson)
 *   --cache <file>           Cache file for the sqlite and json backends
 *   --cache-backend <name>   sqlite|json|memory|none
 *   --country <name>         Country appended to every query
 *   --min-delay <ms>         Minimum delay between provider requests
 *   --dry-run                Classify and check the cache without network calls
 *
 * Examples:
 *   panel-geocoder geocode --input data/providers.csv
 *   panel-geocoder geocode --cache-backend none --output out.ndjson
 *   panel-geocoder --json geocode --dry-run
 *
 * @module cli/commands/geocode
 */

import { Option, InvalidArgumentError, type Command } from 'commander';
import type { AddressRecord } from '../../core/types.js';
import { readRecords } from '../../io/record-source.js';
import { createResultSink } from '../../io/result-sink.js';
import { NominatimGeocoder } from '../../providers/nominatim-geocoder.js';
import { RateLimitedGeocodeClient } from '../../providers/rate-limited-client.js';
import type { GeocodeProvider } from '../../providers/types.js';
import { openResolutionCache } from '../../persistence/open-cache.js';
import { CACHE_BACKENDS, withResolutionCache } from '../../persistence/resolution-cache.js';
import type { ResolutionCache } from '../../persistence/resolution-cache.js';
import { createRateGate } from '../../resilience/rate-limiter.js';
import { createFixedBackoffRetry } from '../../resilience/retry.js';
import type { ClockFn, SleepFn } from '../../resilience/types.js';
import { FallbackResolver } from '../../services/fallback-resolver.js';
import {
  planPipeline,
  runPipeline,
  type PipelinePlan,
  type PipelineResult,
} from '../../services/pipeline-driver.js';
import { resolvePath, type CLIConfig } from '../lib/config.js';
import { getGlobalContext } from '../lib/context.js';
import { EXIT_CODES, exitCodeFor } from '../lib/exit-codes.js';
import type { CLILogger } from '../lib/logger.js';
import { withShutdownCleanup } from '../lib/shutdown.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Seams for tests: a stand-in provider and a virtual clock
 */
export interface GeocodeDependencies {
  readonly provider?: GeocodeProvider;
  readonly sleep?: SleepFn;
  readonly now?: ClockFn;
}

export type GeocodeCommandResult =
  | { readonly kind: 'plan'; readonly plan: PipelinePlan }
  | { readonly kind: 'run'; readonly result: PipelineResult; readonly outputPath: string };

// ============================================================================
// Execution
// ============================================================================

/**
 * Run the geocode command against a loaded configuration
 *
 * @throws {PermanentInputError} If the input cannot be read
 * @throws {CacheUnavailableError} If the cache cannot be opened
 */
export async function runGeocodeCommand(
  config: CLIConfig,
  logger: CLILogger,
  deps: GeocodeDependencies = {}
): Promise<GeocodeCommandResult> {
  const inputPath = resolvePath(config, 'input');
  const outputPath = resolvePath(config, 'output');
  const cachePath = resolvePath(config, 'cache');

  logger.commandStart('geocode', {
    input: inputPath,
    output: outputPath,
    cacheBackend: config.cache.backend,
    dryRun: config.dryRun,
  });

  const records = await readRecords(inputPath);
  logger.info('Loaded records', { count: records.length });

  return withResolutionCache(
    () => openResolutionCache({ backend: config.cache.backend, path: cachePath }),
    (cache) =>
      // An interrupted run still closes the cache, keeping what it resolved
      withShutdownCleanup(
        () => cache.close(),
        async (): Promise<GeocodeCommandResult> => {
          if (config.dryRun) {
            const plan = await planPipeline(records, cache, config.geocoder.country);
            reportPlan(plan, logger);
            return { kind: 'plan', plan };
          }

          const result = await geocodeRecords(records, cache, config, logger, outputPath, deps);
          return { kind: 'run', result, outputPath };
        }
      )
  );
}

async function geocodeRecords(
  records: readonly AddressRecord[],
  cache: ResolutionCache,
  config: CLIConfig,
  logger: CLILogger,
  outputPath: string,
  deps: GeocodeDependencies
): Promise<PipelineResult> {
  const provider =
    deps.provider ??
    new NominatimGeocoder({
      baseUrl: config.geocoder.baseUrl,
      userAgent: config.geocoder.userAgent,
      timeoutMs: config.geocoder.timeoutMs,
      countryCodes: config.geocoder.countryCodes,
    });

  const client = new RateLimitedGeocodeClient(
    provider,
    createRateGate({ minIntervalMs: config.geocoder.minDelayMs, sleep: deps.sleep, now: deps.now })
  );

  const resolver = new FallbackResolver({
    client,
    cache,
    retry: createFixedBackoffRetry({
      maxAttempts: config.retry.maxAttempts,
      delayMs: config.retry.delayMs,
      sleep: deps.sleep,
    }),
  });

  const sink = createResultSink(outputPath);
  const result = await runPipeline(records, {
    resolver,
    sink,
    country: config.geocoder.country,
    onProgress: (progress) =>
      logger.progress({
        current: progress.current,
        total: progress.total,
        label: progress.state,
      }),
  });

  // Only a completed run produces an output file
  await sink.close();

  reportRun(result, client.getStats().calls, outputPath, logger);
  return result;
}

// ============================================================================
// Reporting
// ============================================================================

function reportPlan(plan: PipelinePlan, logger: CLILogger): void {
  logger.info('Dry run: no requests sent', {
    total: plan.total,
    virtual: plan.virtual,
    cached: plan.cached,
    pending: plan.pendingQueries.length,
  });

  for (const query of plan.pendingQueries) {
    logger.debug('Would geocode', { query });
  }
}

function reportRun(
  result: PipelineResult,
  requests: number,
  outputPath: string,
  logger: CLILogger
): void {
  const { summary } = result;

  logger.info('Geocoding summary', {
    total: summary.total,
    mapped: summary.mapped,
    physicalActive: summary.physicalActive,
    centroidActive: summary.centroidActive,
    inactive: summary.inactive,
    virtual: summary.bySource.VIRTUAL,
    failed: summary.bySource.FAILED,
    cacheHits: result.states.CACHE_HIT,
    requests,
  });

  logger.table(
    summary.byCounty.map((county) => ({
      County: county.county,
      Total: county.total,
      Active: county.active,
      Inactive: county.inactive,
    })),
    ['County', 'Total', 'Active', 'Inactive']
  );

  logger.info('Output written', { path: outputPath, records: result.records.length });
}

// ============================================================================
// Registration
// ============================================================================

function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function registerGeocodeCommand(program: Command): void {
  program
    .command('geocode')
    .description('Geocode a provider panel and write enriched records')
    .option('-i, --input <file>', 'Provider panel (.csv, .ndjson, .jsonl)')
    .option('-o, --output <file>', 'Enriched output (.csv or .ndjson)')
    .option('--cache <file>', 'Cache file for the sqlite and json backends')
    .addOption(
      new Option('--cache-backend <name>', 'Resolution cache backend').choices([...CACHE_BACKENDS])
    )
    .option('--country <name>', 'Country appended to every query')
    .option('--min-delay <ms>', 'Minimum delay between provider requests', parseNonNegativeInt)
    .option('--dry-run', 'Classify and check the cache without network calls')
    .action(async () => {
      const { config, logger } = getGlobalContext();

      try {
        await runGeocodeCommand(config, logger);
        logger.commandEnd(true);
        process.exitCode = EXIT_CODES.SUCCESS;
      } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        logger.commandEnd(false);
        process.exitCode = exitCodeFor(error);
      }
    });
}
