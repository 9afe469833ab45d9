/**
 * Summarization collaborator
 *
 * Runs a Summarizer over collected records and performs the single allowed
 * summary write on each. Failures leave `summary` null; they never fail the
 * batch.
 */

import { applySummary, toFlatRecord } from '../core/record.js';
import type { EntityRecord, FlatRecord } from '../core/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import { createBulkhead } from '../resilience/bulkhead.js';

const log = createLogger({ module: 'summarizer' });

export interface Summarizer {
  /** Summary text, or null when nothing should be attached */
  summarize(record: FlatRecord, signal?: AbortSignal): Promise<string | null>;
}

export interface AttachSummariesOptions {
  /** Parallel summarizer calls (default: 3) */
  readonly concurrency?: number;
  readonly signal?: AbortSignal;
}

/**
 * Returns new records in input order; records that already carry a summary
 * are passed through untouched.
 */
export async function attachSummaries(
  records: readonly EntityRecord[],
  summarizer: Summarizer,
  options: AttachSummariesOptions = {}
): Promise<EntityRecord[]> {
  const bulkhead = createBulkhead('summaries', options.concurrency ?? 3);
  let attached = 0;

  const results = await Promise.all(
    records.map((record) =>
      bulkhead.execute(async () => {
        if (record.summary !== null) {
          return record;
        }

        try {
          const summary = await summarizer.summarize(toFlatRecord(record), options.signal);
          if (summary === null) {
            log.debug('No summary produced', { name: record.name });
            return record;
          }
          attached++;
          return applySummary(record, summary);
        } catch (error) {
          if (options.signal?.aborted) {
            throw error;
          }
          log.warn('Summary generation failed', {
            name: record.name,
            url: record.sourceUrl,
            error: errorMessage(error),
          });
          return record;
        }
      })
    )
  );

  log.info('Summaries attached', { attached, total: records.length });
  return results;
}
