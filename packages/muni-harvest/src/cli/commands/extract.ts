/**
 * Extract Command
 *
 * Resolve the index, extract every entity page and export the records.
 *
 * Usage:
 *   muni-harvest extract [options]
 *
 * Options:
 *   --limit <n>          Process only the first n index entries (0 = all)
 *   --char-limit <n>     Body-text budget per record (default: 10000)
 *   --concurrency <n>    Parallel page fetches (default: 8)
 *   --timeout <ms>       Wall-time budget per entity (default: 60000)
 *   --retries <n>        Fetch attempts per page (default: 3)
 *   --csv <path>         CSV output path (default: output.csv)
 *   --stats <path>       Also write summary statistics as JSON
 *   --summarize          Attach generated summaries (needs ANTHROPIC_API_KEY)
 *   --upsert             Upsert records into Airtable (needs AIRTABLE_API_KEY, AIRTABLE_BASE_ID)
 *
 * Examples:
 *   muni-harvest extract --limit 10 --csv out/sample.csv
 *   muni-harvest extract --summarize --stats out/stats.json --json
 */

import { InvalidArgumentError, type Command } from 'commander';
import { ConfigError } from '../../core/errors.js';
import { HTTPClient, type FetchImplementation } from '../../core/http-client.js';
import type { EntityRecord } from '../../core/types.js';
import { errorMessage } from '../../core/utils/logger.js';
import { writeRecordsCsv } from '../../export/csv-writer.js';
import { AirtableRecordStore, type UpsertResult } from '../../export/record-store.js';
import { writeSummaryStats } from '../../export/summary-stats.js';
import {
  createExtractionClient,
  ExtractionOrchestrator,
} from '../../extraction/orchestrator.js';
import { AnthropicSummarizer } from '../../summarization/anthropic-summarizer.js';
import { attachSummaries } from '../../summarization/summarizer.js';
import { loadConfig, type CLIConfig } from '../lib/config.js';
import { EXIT_CODES, exitCodeFor, type ExitCode } from '../lib/exit-codes.js';
import { createCLILogger } from '../lib/logger.js';

/**
 * Extract options from CLI
 */
export interface ExtractOptions {
  readonly limit?: number;
  readonly charLimit?: number;
  readonly concurrency?: number;
  readonly timeout?: number;
  readonly retries?: number;
  readonly csv?: string;
  readonly stats?: string;
  readonly summarize?: boolean;
  readonly upsert?: boolean;
  readonly json?: boolean;
  readonly verbose?: boolean;
  readonly config?: string;
}

/**
 * Process-level collaborators, replaceable in tests
 */
export interface ExtractDependencies {
  /** Run cancellation (SIGINT) */
  readonly signal?: AbortSignal;
  readonly fetchImpl?: FetchImplementation;
  readonly env?: NodeJS.ProcessEnv;
  readonly cwd?: string;
  /** Log stream (default: stderr) */
  readonly stream?: NodeJS.WritableStream;
  /** Machine-readable result sink for --json (default: stdout) */
  readonly stdout?: (line: string) => void;
}

export interface ExtractResult {
  readonly records: number;
  readonly complete: number;
  readonly partial: number;
  readonly fallback: number;
  readonly summaries: number;
  readonly csvPath: string | null;
  readonly statsPath: string | null;
  readonly upsert: UpsertResult | null;
  readonly durationMs: number;
}

function parseIntegerOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

/**
 * Register the extract command
 */
export function registerExtractCommand(program: Command, deps: ExtractDependencies = {}): void {
  program
    .command('extract')
    .description('Extract municipality records from the index page and export them')
    .option('--limit <n>', 'Process only the first n index entries (0 = all)', parseIntegerOption)
    .option('--char-limit <n>', 'Body-text budget per record', parseIntegerOption)
    .option('--concurrency <n>', 'Parallel page fetches', parseIntegerOption)
    .option('--timeout <ms>', 'Wall-time budget per entity in milliseconds', parseIntegerOption)
    .option('--retries <n>', 'Fetch attempts per page', parseIntegerOption)
    .option('--csv <path>', 'CSV output path (default: output.csv)')
    .option('--stats <path>', 'Write summary statistics JSON to path')
    .option('--summarize', 'Attach generated summaries')
    .option('--upsert', 'Upsert records into Airtable')
    .option('--json', 'Output result as JSON (machine-readable)')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--config <path>', 'Path to config file (default: .muni-harvestrc)')
    .action(async (options: ExtractOptions) => {
      process.exitCode = await runExtractCommand(options, deps);
    });
}

/**
 * Execute the extract command
 */
export async function runExtractCommand(
  options: ExtractOptions,
  deps: ExtractDependencies = {}
): Promise<ExitCode> {
  let config: CLIConfig;
  try {
    config = await loadConfig({
      configPath: options.config,
      env: deps.env,
      cwd: deps.cwd,
      overrides: {
        limit: options.limit,
        charLimit: options.charLimit,
        concurrency: options.concurrency,
        jobTimeoutMs: options.timeout,
        maxAttempts: options.retries,
        csv: options.csv,
        stats: options.stats,
        verbose: options.verbose,
        json: options.json,
      },
    });
  } catch (error) {
    (deps.stream ?? process.stderr).write(`Configuration error: ${errorMessage(error)}\n`);
    return exitCodeFor(error);
  }

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
    stream: deps.stream,
  });
  const stdout = deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));

  logger.commandStart('extract', {
    indexUrl: config.extraction.indexUrl,
    limit: config.limit,
    concurrency: config.extraction.concurrency,
  });

  try {
    const anthropicKey = options.summarize
      ? requireSecret(config.anthropic.apiKey, 'ANTHROPIC_API_KEY', '--summarize')
      : null;
    const airtable = options.upsert
      ? {
          apiKey: requireSecret(config.airtable.apiKey, 'AIRTABLE_API_KEY', '--upsert'),
          baseId: requireSecret(config.airtable.baseId, 'AIRTABLE_BASE_ID', '--upsert'),
          tableName: config.airtable.tableName,
        }
      : null;

    const orchestrator = new ExtractionOrchestrator(
      config.extraction,
      createExtractionClient(config.extraction, deps.fetchImpl)
    );
    const run = await orchestrator.run({
      limit: config.limit,
      signal: deps.signal,
      onProgress: ({ completed, total, record }) => {
        logger.progress({ current: completed, total, label: record.name });
      },
    });

    let records: EntityRecord[] = [...run.records];
    let summaries = 0;

    if (anthropicKey !== null) {
      const summarizer = new AnthropicSummarizer(
        {
          apiKey: anthropicKey,
          ...(config.anthropic.model !== null ? { model: config.anthropic.model } : {}),
        },
        collaboratorClient(deps)
      );
      records = await attachSummaries(records, summarizer, { signal: deps.signal });
      summaries = records.filter((record) => record.summary !== null).length;
    }

    let csvPath: string | null = null;
    let statsPath: string | null = null;
    let upsert: UpsertResult | null = null;

    if (records.length === 0) {
      logger.warn('Index yielded no entities, nothing to export');
    } else {
      csvPath = await writeRecordsCsv(records, config.output.csv);
      logger.info('CSV written', { path: csvPath, records: records.length });

      if (config.output.stats !== null) {
        await writeSummaryStats(records, config.output.stats);
        statsPath = config.output.stats;
        logger.info('Summary statistics written', { path: statsPath });
      }

      if (airtable !== null) {
        const store = new AirtableRecordStore(airtable, collaboratorClient(deps));
        upsert = await store.upsert(records);
      }
    }

    if (run.stats.fallback > 0) {
      logger.warn('Some entities produced identity-only records', { fallback: run.stats.fallback });
    }

    const result: ExtractResult = {
      records: records.length,
      complete: run.stats.complete,
      partial: run.stats.partial,
      fallback: run.stats.fallback,
      summaries,
      csvPath,
      statsPath,
      upsert,
      durationMs: run.stats.durationMs,
    };

    if (config.json) {
      stdout(JSON.stringify(result));
    }

    const exitCode = upsert !== null && upsert.failed > 0 ? EXIT_CODES.ERRORS : EXIT_CODES.SUCCESS;
    logger.commandEnd(exitCode === EXIT_CODES.SUCCESS, {
      records: result.records,
      fallback: result.fallback,
    });
    return exitCode;
  } catch (error) {
    logger.error(errorMessage(error));
    logger.commandEnd(false);
    return deps.signal?.aborted ? EXIT_CODES.USER_CANCELLED : exitCodeFor(error);
  }
}

function requireSecret(value: string | null, name: string, flag: string): string {
  if (value === null) {
    throw new ConfigError(`${flag} requires ${name}`);
  }
  return value;
}

function collaboratorClient(deps: ExtractDependencies): HTTPClient {
  return new HTTPClient({
    initialDelayMs: 1000,
    timeoutMs: 60000,
    ...(deps.fetchImpl ? { fetchImpl: deps.fetchImpl } : {}),
  });
}
