/**
 * CSV export of collected records
 *
 * Header follows RECORD_COLUMNS; null cells are written empty.
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import { ExportError } from '../core/errors.js';
import { RECORD_COLUMNS, toFlatRecord } from '../core/record.js';
import type { EntityRecord } from '../core/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';

const log = createLogger({ module: 'csv-writer' });

/**
 * Quote values containing separators, quotes or line breaks
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatRecordsCsv(records: readonly EntityRecord[]): string {
  const headerRow = RECORD_COLUMNS.map(escapeCsv).join(',');

  const dataRows = records.map((record) => {
    const flat = toFlatRecord(record);
    return RECORD_COLUMNS.map((column) => {
      const value = flat[column];
      return value === null ? '' : escapeCsv(String(value));
    }).join(',');
  });

  return [headerRow, ...dataRows].join('\n') + '\n';
}

/**
 * Write records to `path`, creating parent directories
 *
 * @returns the absolute path written
 * @throws {ExportError} on an empty collection or an I/O failure
 */
export async function writeRecordsCsv(
  records: readonly EntityRecord[],
  path: string
): Promise<string> {
  if (records.length === 0) {
    throw new ExportError('No records to export');
  }

  const target = resolve(path);

  try {
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, formatRecordsCsv(records), 'utf-8');
  } catch (error) {
    throw new ExportError(
      `Failed to write CSV to ${target}: ${errorMessage(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  log.info('CSV written', { path: target, records: records.length });
  return target;
}
