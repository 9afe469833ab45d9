/**
 * Record store upsert (Airtable REST API)
 *
 * Records are keyed by `name`. Within one upsert call a repeated name keeps
 * the last record's fields (last-write-wins) and is reported in
 * `duplicates`.
 *
 * USAGE:
 * ```typescript
 * const store = new AirtableRecordStore({ apiKey, baseId, tableName: 'Kommunen' });
 * const result = await store.upsert(records);
 * ```
 */

import { z } from 'zod';
import { ExportError } from '../core/errors.js';
import { HTTPClient } from '../core/http-client.js';
import { findDuplicateNames, RECORD_COLUMNS, toFlatRecord } from '../core/record.js';
import type { EntityRecord } from '../core/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';

const log = createLogger({ module: 'record-store' });

/** Longer string values are cut and suffixed with "..." */
export const MAX_FIELD_LENGTH = 50000;

export type UpsertFields = Readonly<Record<string, string | number>>;

export interface UpsertBatchPlan {
  readonly batches: readonly (readonly UpsertFields[])[];
  readonly duplicates: readonly string[];
  /** Records dropped for an empty name */
  readonly skipped: number;
}

export interface UpsertResult {
  readonly succeeded: number;
  readonly failed: number;
  readonly skipped: number;
  readonly duplicates: readonly string[];
}

export interface RecordStore {
  upsert(records: readonly EntityRecord[]): Promise<UpsertResult>;
}

/**
 * Store payload of one record: nulls omitted, long strings cut
 */
export function toUpsertFields(record: EntityRecord): UpsertFields {
  const flat = toFlatRecord(record);
  const fields: Record<string, string | number> = {};

  for (const column of RECORD_COLUMNS) {
    const value = flat[column];
    if (value === null) {
      continue;
    }
    fields[column] =
      typeof value === 'string' && value.length > MAX_FIELD_LENGTH
        ? `${value.slice(0, MAX_FIELD_LENGTH)}...`
        : value;
  }

  return fields;
}

/**
 * Deduplicate by name (first-seen position, last-seen fields) and split
 * into batches
 */
export function buildUpsertBatches(
  records: readonly EntityRecord[],
  batchSize = 10
): UpsertBatchPlan {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const named = records.filter((record) => record.name.trim().length > 0);
  const byName = new Map<string, UpsertFields>();
  for (const record of named) {
    byName.set(record.name, toUpsertFields(record));
  }

  const unique = Array.from(byName.values());
  const batches: UpsertFields[][] = [];
  for (let i = 0; i < unique.length; i += batchSize) {
    batches.push(unique.slice(i, i + batchSize));
  }

  return {
    batches,
    duplicates: findDuplicateNames(named),
    skipped: records.length - named.length,
  };
}

// ============================================================================
// Airtable
// ============================================================================

export interface AirtableConfig {
  readonly apiKey: string;
  readonly baseId: string;
  readonly tableName: string;
  readonly endpoint: string;
  readonly batchSize: number;
}

const UpsertResponseSchema = z.object({
  records: z.array(z.object({ id: z.string() })),
});

export class AirtableRecordStore implements RecordStore {
  private readonly config: AirtableConfig;
  private readonly client: HTTPClient;

  /**
   * @throws {ExportError} when the API key or base id is missing
   */
  constructor(
    config: Pick<AirtableConfig, 'apiKey' | 'baseId' | 'tableName'> & Partial<AirtableConfig>,
    client: HTTPClient = new HTTPClient({ initialDelayMs: 1000 })
  ) {
    if (config.apiKey.length === 0 || config.baseId.length === 0) {
      throw new ExportError('Airtable is not configured: API key and base id are required');
    }
    this.config = { endpoint: 'https://api.airtable.com/v0', batchSize: 10, ...config };
    this.client = client;
  }

  async upsert(records: readonly EntityRecord[]): Promise<UpsertResult> {
    const plan = buildUpsertBatches(records, this.config.batchSize);

    if (plan.duplicates.length > 0) {
      log.warn('Duplicate names, last record wins', { duplicates: plan.duplicates });
    }
    if (plan.skipped > 0) {
      log.warn('Records without name skipped', { skipped: plan.skipped });
    }

    const url = `${this.config.endpoint}/${this.config.baseId}/${encodeURIComponent(this.config.tableName)}`;
    let succeeded = 0;
    let failed = 0;

    for (const [index, batch] of plan.batches.entries()) {
      try {
        const response = await this.client.fetchJSON(url, {
          method: 'PATCH',
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            'Content-Type': 'application/json',
          },
          body: JSON.stringify({
            performUpsert: { fieldsToMergeOn: ['name'] },
            typecast: true,
            records: batch.map((fields) => ({ fields })),
          }),
        });
        const parsed = UpsertResponseSchema.parse(response);
        succeeded += parsed.records.length;
        log.debug('Batch upserted', { batch: index + 1, records: parsed.records.length });
      } catch (error) {
        failed += batch.length;
        log.error('Batch upsert failed', {
          batch: index + 1,
          records: batch.length,
          error: errorMessage(error),
        });
      }
    }

    log.info('Upsert complete', { succeeded, failed, batches: plan.batches.length });
    if (failed > 0) {
      log.warn('Some records could not be upserted', { failed });
    }

    return { succeeded, failed, skipped: plan.skipped, duplicates: plan.duplicates };
  }
}
