/**
 * CLI exit codes and error-to-code mapping.
 */

import { CacheUnavailableError, ConfigError, PermanentInputError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  INPUT_ERROR: 4,
  CACHE_ERROR: 5,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG_ERROR;
  if (error instanceof PermanentInputError) return EXIT_CODES.INPUT_ERROR;
  if (error instanceof CacheUnavailableError) return EXIT_CODES.CACHE_ERROR;
  return EXIT_CODES.ERRORS;
}
