/**
 * Extraction Orchestrator
 *
 * Resolves the index, fans jobs out over a bounded worker pool and collects
 * exactly one record per job, in index order.
 *
 * FAILURE CONTAINMENT:
 * - Fetch/parse problems degrade a record (absent fields + skip entries)
 * - A job that rejects or exceeds `jobTimeoutMs` yields an identity-only
 *   fallback record
 * - IndexResolutionError is fatal and propagates unchanged
 * - Aborting the run signal rejects with ExtractionAbortedError
 *
 * USAGE:
 * ```typescript
 * const orchestrator = new ExtractionOrchestrator(createExtractionConfig());
 * const { records, stats } = await orchestrator.run({ limit: 10 });
 * ```
 */

import {
  createExtractionConfig,
  DEFAULT_EXTRACTION_CONFIG,
  type ExtractionConfig,
} from '../config/extraction-config.js';
import { ExtractionAbortedError, JobTimeoutError } from '../core/errors.js';
import { HTTPClient, type FetchImplementation } from '../core/http-client.js';
import { completeRecord, createEmptyRecord, findDuplicateNames } from '../core/record.js';
import type {
  EntityRecord,
  ExtractionJob,
  IndexEntry,
  JobReport,
  JobStatus,
  ParseOutcome,
} from '../core/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import { createBulkhead } from '../resilience/bulkhead.js';
import { resolveIndex } from './index-resolver.js';
import { parsePage } from './page-parser.js';

const log = createLogger({ module: 'orchestrator' });

// ============================================================================
// Types
// ============================================================================

export interface ExtractionProgress {
  readonly completed: number;
  readonly total: number;
  readonly record: EntityRecord;
  readonly report: JobReport;
}

export interface ExtractionRunOptions {
  /** Keep the first `limit` index entries; 0 or unset processes all */
  readonly limit?: number;
  /** Body-text budget per record (default: config.charLimit) */
  readonly charLimit?: number;
  /** Run cancellation */
  readonly signal?: AbortSignal;
  /** Attach collected records to ExtractionAbortedError */
  readonly keepPartialOnAbort?: boolean;
  /** Called in completion order */
  readonly onProgress?: (progress: ExtractionProgress) => void;
}

export interface ExtractionStats {
  readonly indexEntries: number;
  readonly totalJobs: number;
  readonly complete: number;
  readonly partial: number;
  readonly fallback: number;
  readonly durationMs: number;
  readonly duplicateNames: readonly string[];
}

export interface ExtractionRun {
  /** One record per job, index order */
  readonly records: readonly EntityRecord[];
  readonly jobs: readonly JobReport[];
  readonly stats: ExtractionStats;
}

interface JobResult {
  readonly record: EntityRecord;
  readonly report: JobReport;
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * HTTP client carrying the retry and timeout settings of an extraction config
 */
export function createExtractionClient(
  config: ExtractionConfig,
  fetchImpl?: FetchImplementation
): HTTPClient {
  return new HTTPClient({
    maxAttempts: config.maxAttempts,
    initialDelayMs: config.initialDelayMs,
    maxDelayMs: config.maxDelayMs,
    timeoutMs: config.requestTimeoutMs,
    userAgent: config.userAgent,
    ...(fetchImpl ? { fetchImpl } : {}),
  });
}

export class ExtractionOrchestrator {
  private readonly config: ExtractionConfig;
  private readonly client: HTTPClient;

  constructor(config: ExtractionConfig = DEFAULT_EXTRACTION_CONFIG, client?: HTTPClient) {
    this.config = config;
    this.client = client ?? createExtractionClient(config);
  }

  /**
   * @throws {RangeError} on an invalid limit or charLimit
   * @throws {IndexResolutionError} when the index cannot be resolved
   * @throws {ExtractionAbortedError} when options.signal aborts
   */
  async run(options: ExtractionRunOptions = {}): Promise<ExtractionRun> {
    const { signal, keepPartialOnAbort = false, onProgress } = options;
    const limit = options.limit ?? 0;
    const charLimit = options.charLimit ?? this.config.charLimit;

    if (!Number.isInteger(limit) || limit < 0) {
      throw new RangeError(`limit must be a non-negative integer, got ${limit}`);
    }
    if (!Number.isInteger(charLimit) || charLimit < 1) {
      throw new RangeError(`charLimit must be a positive integer, got ${charLimit}`);
    }
    if (signal?.aborted) {
      throw new ExtractionAbortedError(0, 0);
    }

    const startTime = Date.now();

    let entries: IndexEntry[];
    try {
      entries = await resolveIndex(this.client, this.config, signal);
    } catch (error) {
      if (signal?.aborted) {
        throw new ExtractionAbortedError(0, 0);
      }
      throw error;
    }

    const selected = limit > 0 ? entries.slice(0, limit) : entries;
    const jobs: ExtractionJob[] = selected.map((entry, index) => ({
      index,
      name: entry.name,
      url: entry.url,
      charLimit,
    }));

    log.info('Starting extraction', {
      indexEntries: entries.length,
      jobs: jobs.length,
      concurrency: this.config.concurrency,
      charLimit,
    });

    const slots: Array<JobResult | undefined> = Array.from({ length: jobs.length }, () => undefined);
    let completed = 0;

    const bulkhead = createBulkhead('entity-pages', this.config.concurrency);
    const runController = new AbortController();
    const onRunAbort = (): void => {
      runController.abort(signal?.reason);
      const dropped = bulkhead.rejectQueued(new Error('Extraction run aborted'));
      log.warn('Extraction aborted', { completed, total: jobs.length, droppedQueued: dropped });
    };
    signal?.addEventListener('abort', onRunAbort, { once: true });

    const tasks = jobs.map((job) =>
      bulkhead
        .execute(() => this.runJob(job, runController.signal))
        .then((result) => {
          slots[job.index] = result;
          completed++;
          this.reportProgress(onProgress, { completed, total: jobs.length, ...result });
        })
    );

    try {
      await Promise.allSettled(tasks);
    } finally {
      signal?.removeEventListener('abort', onRunAbort);
    }

    if (signal?.aborted) {
      const partialRecords = keepPartialOnAbort
        ? slots.flatMap((slot) => (slot ? [slot.record] : []))
        : [];
      throw new ExtractionAbortedError(completed, jobs.length, partialRecords);
    }

    const results = jobs.map(
      (job) => slots[job.index] ?? fallbackResult(job, 0, 'Job produced no result')
    );
    const records = results.map((result) => result.record);
    const reports = results.map((result) => result.report);
    const duplicateNames = findDuplicateNames(records);

    if (duplicateNames.length > 0) {
      log.warn('Duplicate entity names in collected records', { duplicateNames });
    }

    const stats: ExtractionStats = {
      indexEntries: entries.length,
      totalJobs: jobs.length,
      complete: countStatus(reports, 'complete'),
      partial: countStatus(reports, 'partial'),
      fallback: countStatus(reports, 'fallback'),
      durationMs: Date.now() - startTime,
      duplicateNames,
    };

    log.info('Extraction complete', {
      ...stats,
      duplicateNames: duplicateNames.length,
      avgJobMs: Math.round(bulkhead.getStats().avgExecutionMs),
    });

    return { records, jobs: reports, stats };
  }

  /**
   * One job bounded by jobTimeoutMs. Rejects only when the run is aborted.
   */
  private async runJob(job: ExtractionJob, runSignal: AbortSignal): Promise<JobResult> {
    if (runSignal.aborted) {
      throw new Error('Extraction run aborted');
    }

    const startTime = Date.now();
    const jobController = new AbortController();
    const onRunAbort = (): void => jobController.abort(runSignal.reason);
    runSignal.addEventListener('abort', onRunAbort, { once: true });

    const timeoutId = setTimeout(() => {
      jobController.abort(new JobTimeoutError(job.name, job.url, this.config.jobTimeoutMs));
    }, this.config.jobTimeoutMs);

    try {
      const outcome = await raceAbort(
        parsePage(this.client, job, jobController.signal),
        jobController.signal
      );
      const result = outcomeResult(job, outcome, Date.now() - startTime);

      log.debug('Job finished', {
        index: job.index,
        name: job.name,
        status: result.report.status,
        skipped: outcome.skipped.length,
      });

      return result;
    } catch (error) {
      if (runSignal.aborted) {
        throw error;
      }

      log.warn('Job failed, emitting fallback record', {
        index: job.index,
        name: job.name,
        url: job.url,
        error: errorMessage(error),
      });
      return fallbackResult(job, Date.now() - startTime, errorMessage(error));
    } finally {
      clearTimeout(timeoutId);
      runSignal.removeEventListener('abort', onRunAbort);
    }
  }

  private reportProgress(
    onProgress: ExtractionRunOptions['onProgress'],
    progress: ExtractionProgress
  ): void {
    if (!onProgress) {
      return;
    }
    try {
      onProgress(progress);
    } catch (error) {
      log.warn('Progress callback failed', { error: errorMessage(error) });
    }
  }
}

/**
 * Resolve the index and return one record per selected entry, index order
 */
export async function runExtraction(
  options: ExtractionRunOptions & {
    readonly config?: Partial<ExtractionConfig>;
    readonly client?: HTTPClient;
  } = {}
): Promise<EntityRecord[]> {
  const { config, client, ...runOptions } = options;
  const orchestrator = new ExtractionOrchestrator(createExtractionConfig(config), client);
  const run = await orchestrator.run(runOptions);
  return [...run.records];
}

// ============================================================================
// Helpers
// ============================================================================

function outcomeResult(job: ExtractionJob, outcome: ParseOutcome, durationMs: number): JobResult {
  const fetchFailed = outcome.skipped.some((skip) => skip.step === 'fetch');
  const status: JobStatus = fetchFailed
    ? 'fallback'
    : outcome.skipped.length === 0
      ? 'complete'
      : 'partial';

  return {
    record: completeRecord(createEmptyRecord(job.name, job.url), outcome.fields),
    report: {
      index: job.index,
      name: job.name,
      url: job.url,
      status,
      skipped: outcome.skipped,
      durationMs,
    },
  };
}

function fallbackResult(job: ExtractionJob, durationMs: number, error: string): JobResult {
  return {
    record: Object.freeze(createEmptyRecord(job.name, job.url)),
    report: {
      index: job.index,
      name: job.name,
      url: job.url,
      status: 'fallback',
      skipped: [],
      durationMs,
      error,
    },
  };
}

function countStatus(reports: readonly JobReport[], status: JobStatus): number {
  return reports.filter((report) => report.status === status).length;
}

/**
 * Settle with `promise`, or reject with the abort reason as soon as `signal`
 * aborts
 */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason instanceof Error ? signal.reason : new Error('Job aborted'));
    };

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
