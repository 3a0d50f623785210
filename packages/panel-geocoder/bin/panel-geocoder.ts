#!/usr/bin/env tsx
/**
 * Panel Geocoder CLI Entry Point
 *
 * Geocodes a healthcare provider panel against Nominatim with caching,
 * rate limiting and a town-centroid fallback.
 *
 * @module panel-geocoder-cli
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { initializeContext, toLoadConfigOptions } from '../src/cli/lib/context.js';
import { EXIT_CODES } from '../src/cli/lib/exit-codes.js';
import { registerCommands } from '../src/cli/commands/index.js';
import { installSignalHandlers } from '../src/cli/lib/shutdown.js';

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('panel-geocoder')
    .description('Geocode provider panels with caching, rate limiting and town-centroid fallback')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .panel-geocoderrc)')
    .hook('preAction', async (_thisCommand, actionCommand) => {
      try {
        await initializeContext(toLoadConfigOptions(actionCommand.optsWithGlobals()));
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerCommands(program);

  return program;
}

async function main(): Promise<void> {
  installSignalHandlers();
  const program = createProgram();
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(EXIT_CODES.ERRORS);
});
