/**
 * Aggregate statistics over a finished run
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { ExportError } from '../core/errors.js';
import type { EntityRecord } from '../core/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';

const log = createLogger({ module: 'summary-stats' });

export interface SummaryStats {
  readonly exportTimestamp: string;
  readonly totalRecords: number;
  readonly withPopulation: number;
  readonly withArea: number;
  readonly withSummary: number;
  readonly withWebsite: number;
  readonly withCoordinates: number;
  readonly population: {
    readonly total: number;
    readonly average: number;
    readonly max: number;
    readonly min: number;
  };
  readonly area: {
    readonly totalKm2: number;
    readonly averageKm2: number;
  };
  /** Distinct regions, first-seen order */
  readonly regions: readonly string[];
  readonly districtCount: number;
}

export function computeSummaryStats(
  records: readonly EntityRecord[],
  now: Date = new Date()
): SummaryStats {
  const populations = records.flatMap((r) => (r.population === null ? [] : [r.population]));
  const areas = records.flatMap((r) => (r.areaKm2 === null ? [] : [r.areaKm2]));

  const populationTotal = sum(populations);
  const areaTotal = sum(areas);

  return {
    exportTimestamp: now.toISOString(),
    totalRecords: records.length,
    withPopulation: populations.length,
    withArea: areas.length,
    withSummary: records.filter((r) => r.summary !== null).length,
    withWebsite: records.filter((r) => r.website !== null).length,
    withCoordinates: records.filter((r) => r.coordinates !== null).length,
    population: {
      total: populationTotal,
      average: populationTotal / Math.max(1, populations.length),
      max: populations.length > 0 ? Math.max(...populations) : 0,
      min: populations.length > 0 ? Math.min(...populations) : 0,
    },
    area: {
      totalKm2: areaTotal,
      averageKm2: areaTotal / Math.max(1, areas.length),
    },
    regions: distinct(records.map((r) => r.region)),
    districtCount: distinct(records.map((r) => r.district)).length,
  };
}

/**
 * @throws {ExportError} on an empty collection or an I/O failure
 */
export async function writeSummaryStats(
  records: readonly EntityRecord[],
  path: string,
  now: Date = new Date()
): Promise<SummaryStats> {
  if (records.length === 0) {
    throw new ExportError('No records for summary statistics');
  }

  const stats = computeSummaryStats(records, now);
  const target = resolve(path);

  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, JSON.stringify(stats, null, 2) + '\n', 'utf-8');
  } catch (error) {
    throw new ExportError(
      `Failed to write summary statistics to ${target}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  log.info('Summary statistics written', { path: target });
  return stats;
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function distinct(values: ReadonlyArray<string | null>): string[] {
  const seen = new Set<string>();
  for (const value of values) {
    if (value !== null) {
      seen.add(value);
    }
  }
  return Array.from(seen);
}
