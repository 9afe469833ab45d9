/**
 * Global test setup for muni-harvest
 *
 * Module loggers read LOG_LEVEL when they are created, so this runs before
 * any test file imports the sources.
 */

if (process.env.LOG_LEVEL === undefined) {
  process.env.LOG_LEVEL = 'error';
}

export const isCI = process.env.CI === 'true';
