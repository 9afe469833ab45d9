/**
 * Process exit codes of the muni-harvest CLI
 */

import {
  ConfigError,
  ExtractionAbortedError,
  IndexResolutionError,
} from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ConfigError) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof IndexResolutionError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (error instanceof ExtractionAbortedError) {
    return EXIT_CODES.USER_CANCELLED;
  }
  return EXIT_CODES.ERRORS;
}
