/**
 * CLI Commands Index
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerGeocodeCommand } from './geocode.js';
import { registerCacheCommands } from './cache.js';

export {
  runGeocodeCommand,
  registerGeocodeCommand,
  type GeocodeDependencies,
  type GeocodeCommandResult,
} from './geocode.js';
export { runCacheStats, runCacheClear, registerCacheCommands, type CacheClearOptions } from './cache.js';

/**
 * Register every command group on the program
 */
export function registerCommands(program: Command): void {
  registerGeocodeCommand(program);
  registerCacheCommands(program);
}
