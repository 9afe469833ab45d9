/**
 * muni-harvest Error Types
 *
 * Only IndexResolutionError and ExtractionAbortedError ever leave the
 * extraction core. Everything below the per-entity boundary is contained
 * and surfaces as absent fields, skip entries or fallback records.
 */

import type { EntityRecord } from './types.js';

/**
 * The one-time index fetch or parse failed. Fatal to the whole run.
 *
 * RECOVERY:
 * - Inspect `cause` (usually a FetchError) for the network failure
 * - Check that `indexUrl` still points at the list page and that the page
 *   still carries a data table
 */
export class IndexResolutionError extends Error {
  readonly indexUrl: string;
  readonly cause: Error | undefined;

  constructor(message: string, indexUrl: string, cause?: Error) {
    super(message);
    this.name = 'IndexResolutionError';
    this.indexUrl = indexUrl;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, IndexResolutionError);
    }
  }
}

/**
 * The caller aborted the run. Collected records are discarded unless the
 * caller asked to keep them.
 */
export class ExtractionAbortedError extends Error {
  readonly completedJobs: number;
  readonly totalJobs: number;
  readonly partialRecords: readonly EntityRecord[];

  constructor(completedJobs: number, totalJobs: number, partialRecords: readonly EntityRecord[] = []) {
    super(`Extraction aborted after ${completedJobs}/${totalJobs} jobs`);
    this.name = 'ExtractionAbortedError';
    this.completedJobs = completedJobs;
    this.totalJobs = totalJobs;
    this.partialRecords = partialRecords;
  }
}

/**
 * One job exceeded its wall-time budget. Contained by the orchestrator,
 * which emits a fallback record instead.
 */
export class JobTimeoutError extends Error {
  readonly entityName: string;
  readonly url: string;
  readonly timeoutMs: number;

  constructor(entityName: string, url: string, timeoutMs: number) {
    super(`Job "${entityName}" timed out after ${timeoutMs}ms`);
    this.name = 'JobTimeoutError';
    this.entityName = entityName;
    this.url = url;
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A second summary write was attempted on a record
 */
export class SummaryAlreadySetError extends Error {
  readonly recordName: string;
  readonly sourceUrl: string;

  constructor(recordName: string, sourceUrl: string) {
    super(`Summary already set for "${recordName}" (${sourceUrl})`);
    this.name = 'SummaryAlreadySetError';
    this.recordName = recordName;
    this.sourceUrl = sourceUrl;
  }
}

/**
 * CSV / statistics / record store export failure
 */
export class ExportError extends Error {
  readonly cause: Error | undefined;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ExportError';
    this.cause = cause;
  }
}

/**
 * Invalid configuration value
 */
export class ConfigError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
