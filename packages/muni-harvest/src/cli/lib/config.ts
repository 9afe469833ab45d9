/**
 * muni-harvest CLI Configuration Management
 *
 * Loads configuration from .muni-harvestrc (YAML or JSON) with environment
 * variable overrides and defaults, and turns it into the ExtractionConfig
 * the core receives plus the collaborators' settings.
 *
 * Configuration precedence (highest to lowest):
 * 1. Command-line options
 * 2. Environment variables (MUNI_HARVEST_*, after .env is loaded)
 * 3. Config file (.muni-harvestrc or --config path)
 * 4. Default values
 *
 * Secrets are read only from the environment: ANTHROPIC_API_KEY,
 * ANTHROPIC_MODEL, AIRTABLE_API_KEY, AIRTABLE_BASE_ID, AIRTABLE_TABLE_NAME.
 *
 * @module cli/lib/config
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  createExtractionConfig,
  type ExtractionConfig,
} from '../../config/extraction-config.js';
import { ConfigError } from '../../core/errors.js';

// ============================================================================
// Configuration Types
// ============================================================================

export interface OutputConfig {
  readonly csv: string;
  readonly stats: string | null;
}

export interface AnthropicSettings {
  readonly apiKey: string | null;
  readonly model: string | null;
}

export interface AirtableSettings {
  readonly apiKey: string | null;
  readonly baseId: string | null;
  readonly tableName: string;
}

export interface CLIConfig {
  readonly extraction: ExtractionConfig;
  readonly output: OutputConfig;
  readonly anthropic: AnthropicSettings;
  readonly airtable: AirtableSettings;
  /** 0 processes every index entry */
  readonly limit: number;
  readonly verbose: boolean;
  readonly json: boolean;
  /** Resolved config file path */
  readonly configPath: string | null;
}

/**
 * Config file structure
 */
const ConfigFileSchema = z
  .object({
    limit: z.number().int().nonnegative().optional(),
    extraction: z
      .object({
        indexUrl: z.string().optional(),
        entityPathPrefix: z.string().optional(),
        userAgent: z.string().optional(),
        concurrency: z.number().optional(),
        maxAttempts: z.number().optional(),
        initialDelayMs: z.number().optional(),
        maxDelayMs: z.number().optional(),
        requestTimeoutMs: z.number().optional(),
        jobTimeoutMs: z.number().optional(),
        charLimit: z.number().optional(),
      })
      .strict()
      .optional(),
    output: z
      .object({
        csv: z.string().optional(),
        stats: z.string().optional(),
      })
      .strict()
      .optional(),
    airtable: z.object({ tableName: z.string().optional() }).strict().optional(),
    anthropic: z.object({ model: z.string().optional() }).strict().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export const DEFAULT_CSV_PATH = 'output.csv';
export const DEFAULT_AIRTABLE_TABLE = 'Kommunen';

// ============================================================================
// Configuration Loading
// ============================================================================

const CONFIG_FILE_NAMES = [
  '.muni-harvestrc',
  '.muni-harvestrc.yaml',
  '.muni-harvestrc.yml',
  '.muni-harvestrc.json',
];

/**
 * Find config file in the start directory or its parents
 */
export function findConfigFile(startDir: string): string | null {
  let dir = resolve(startDir);

  for (;;) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = join(dir, fileName);
      if (existsSync(filePath)) {
        return filePath;
      }
    }
    const parent = resolve(dir, '..');
    if (parent === dir) {
      return null;
    }
    dir = parent;
  }
}

/**
 * @throws {ConfigError} on unreadable content or unknown keys
 */
export function parseConfigFile(filePath: string): ConfigFile {
  let raw: unknown;
  try {
    const content = readFileSync(filePath, 'utf-8');
    // Parse as YAML (also handles plain JSON)
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(
      `Invalid config file ${filePath}`,
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * CLI flag overrides
 */
export interface ConfigOverrides {
  readonly limit?: number;
  readonly charLimit?: number;
  readonly concurrency?: number;
  readonly jobTimeoutMs?: number;
  readonly maxAttempts?: number;
  readonly csv?: string;
  readonly stats?: string;
  readonly verbose?: boolean;
  readonly json?: boolean;
}

export interface LoadConfigOptions {
  /** Explicit config file path */
  readonly configPath?: string;
  readonly overrides?: ConfigOverrides;
  /** Environment to read (default: process.env) */
  readonly env?: NodeJS.ProcessEnv;
  /** Directory the config file search starts in (default: process.cwd()) */
  readonly cwd?: string;
}

/**
 * Load and merge configuration from all sources
 *
 * @throws {ConfigError} on any invalid value
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<CLIConfig> {
  const env = new EnvReader(options.env ?? process.env);
  const overrides = options.overrides ?? {};

  let configPath: string | null = null;
  let fileConfig: ConfigFile = {};

  const explicitPath = options.configPath ?? env.string('CONFIG');
  if (explicitPath !== undefined) {
    configPath = resolve(options.cwd ?? process.cwd(), explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigError(`Config file not found: ${configPath}`);
    }
    fileConfig = parseConfigFile(configPath);
  } else {
    configPath = findConfigFile(options.cwd ?? process.cwd());
    if (configPath !== null) {
      fileConfig = parseConfigFile(configPath);
    }
  }

  const file = fileConfig.extraction ?? {};

  const extraction = createExtractionConfig({
    indexUrl: env.string('INDEX_URL') ?? file.indexUrl,
    entityPathPrefix: env.string('ENTITY_PATH_PREFIX') ?? file.entityPathPrefix,
    userAgent: env.string('USER_AGENT') ?? file.userAgent,
    concurrency: overrides.concurrency ?? env.number('CONCURRENCY') ?? file.concurrency,
    maxAttempts: overrides.maxAttempts ?? env.number('MAX_ATTEMPTS') ?? file.maxAttempts,
    initialDelayMs: env.number('INITIAL_DELAY_MS') ?? file.initialDelayMs,
    maxDelayMs: env.number('MAX_DELAY_MS') ?? file.maxDelayMs,
    requestTimeoutMs: env.number('REQUEST_TIMEOUT_MS') ?? file.requestTimeoutMs,
    jobTimeoutMs: overrides.jobTimeoutMs ?? env.number('JOB_TIMEOUT_MS') ?? file.jobTimeoutMs,
    charLimit: overrides.charLimit ?? env.number('CHAR_LIMIT') ?? file.charLimit,
  });

  const limit = overrides.limit ?? env.number('LIMIT') ?? fileConfig.limit ?? 0;
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ConfigError('Invalid CLI configuration', [`limit: must be a non-negative integer, got ${limit}`]);
  }

  return {
    extraction,
    output: {
      csv: overrides.csv ?? env.string('CSV') ?? fileConfig.output?.csv ?? DEFAULT_CSV_PATH,
      stats: overrides.stats ?? env.string('STATS') ?? fileConfig.output?.stats ?? null,
    },
    anthropic: {
      apiKey: env.secret('ANTHROPIC_API_KEY'),
      model: env.secret('ANTHROPIC_MODEL') ?? fileConfig.anthropic?.model ?? null,
    },
    airtable: {
      apiKey: env.secret('AIRTABLE_API_KEY'),
      baseId: env.secret('AIRTABLE_BASE_ID'),
      tableName:
        env.secret('AIRTABLE_TABLE_NAME') ?? fileConfig.airtable?.tableName ?? DEFAULT_AIRTABLE_TABLE,
    },
    limit,
    verbose: overrides.verbose ?? env.boolean('VERBOSE') ?? false,
    json: overrides.json ?? env.boolean('JSON') ?? false,
    configPath,
  };
}

// ============================================================================
// Environment
// ============================================================================

const ENV_PREFIX = 'MUNI_HARVEST_';

class EnvReader {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  string(name: string): string | undefined {
    const value = this.env[`${ENV_PREFIX}${name}`];
    return value === undefined || value === '' ? undefined : value;
  }

  number(name: string): number | undefined {
    const value = this.string(name);
    if (value === undefined) {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      throw new ConfigError('Invalid environment variable', [
        `${ENV_PREFIX}${name}: expected a number, got "${value}"`,
      ]);
    }
    return parsed;
  }

  boolean(name: string): boolean | undefined {
    const value = this.string(name);
    if (value === undefined) {
      return undefined;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  /** Unprefixed variable; empty counts as unset */
  secret(name: string): string | null {
    const value = this.env[name]?.trim();
    return value === undefined || value === '' ? null : value;
  }
}
