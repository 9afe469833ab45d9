/**
 * Extraction Configuration
 *
 * The configuration object the extraction core receives at call time.
 * The core never reads environment variables; the CLI loader
 * (cli/lib/config.ts) builds this object from flags, env and config file.
 *
 * TYPE SAFETY: All configuration is strongly typed and immutable.
 */

import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

export interface ExtractionConfig {
  /** The single page enumerating every target entity */
  readonly indexUrl: string;
  /** Path prefix an index link must carry to count as an entity page */
  readonly entityPathPrefix: string;
  readonly userAgent: string;
  /** Worker pool size */
  readonly concurrency: number;
  /** Fetch attempts per page, first one included */
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly maxDelayMs: number;
  /** Per-request timeout */
  readonly requestTimeoutMs: number;
  /** Upper bound on one job's total wall time (fetch + parse) */
  readonly jobTimeoutMs: number;
  /** Default body-text budget in characters */
  readonly charLimit: number;
}

export const DEFAULT_EXTRACTION_CONFIG: ExtractionConfig = {
  indexUrl:
    'https://de.wikipedia.org/wiki/Liste_der_St%C3%A4dte_und_Gemeinden_in_Nordrhein-Westfalen',
  entityPathPrefix: '/wiki/',
  userAgent: 'muni-harvest/1.0 (municipal data extraction)',
  concurrency: 8,
  maxAttempts: 3,
  initialDelayMs: 2000,
  maxDelayMs: 30000,
  requestTimeoutMs: 30000,
  jobTimeoutMs: 60000,
  charLimit: 10000,
};

const positiveInt = z.number().int().positive();

export const ExtractionConfigSchema = z.object({
  indexUrl: z.string().url(),
  entityPathPrefix: z.string().startsWith('/'),
  userAgent: z.string().min(1),
  concurrency: positiveInt.max(100),
  maxAttempts: positiveInt.max(10),
  initialDelayMs: z.number().int().nonnegative(),
  maxDelayMs: z.number().int().nonnegative(),
  requestTimeoutMs: positiveInt,
  jobTimeoutMs: positiveInt,
  charLimit: positiveInt,
});

/**
 * Merge overrides onto the defaults and validate
 *
 * @throws {ConfigError} listing every invalid key
 */
export function createExtractionConfig(
  overrides: Partial<ExtractionConfig> = {}
): ExtractionConfig {
  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  const result = ExtractionConfigSchema.safeParse({
    ...DEFAULT_EXTRACTION_CONFIG,
    ...definedOverrides,
  });

  if (!result.success) {
    throw new ConfigError(
      'Invalid extraction configuration',
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return Object.freeze(result.data);
}
