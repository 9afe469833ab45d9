/**
 * Entity Record lifecycle helpers
 *
 * created empty -> filled from a ParseOutcome -> frozen on collection ->
 * at most one summary write.
 */

import { SummaryAlreadySetError } from './errors.js';
import type {
  EntityAttributes,
  EntityRecord,
  FlatRecord,
  FlatRecordKey,
} from './types.js';

/**
 * Header order for tabular output
 */
export const RECORD_COLUMNS: readonly FlatRecordKey[] = [
  'name',
  'source_url',
  'population',
  'population_date',
  'area_km2',
  'elevation_m',
  'municipality_code',
  'district',
  'region',
  'state',
  'postal_code',
  'area_code',
  'vehicle_code',
  'coordinates',
  'coordinates_url',
  'website',
  'mayor',
  'full_text',
  'summary_text',
] as const;

const EMPTY_ATTRIBUTES: EntityAttributes = {
  population: null,
  populationDate: null,
  areaKm2: null,
  elevationM: null,
  municipalityCode: null,
  district: null,
  region: null,
  state: null,
  postalCode: null,
  areaCode: null,
  vehicleCode: null,
  coordinates: null,
  coordinatesUrl: null,
  website: null,
  mayor: null,
  fullText: null,
};

/**
 * Identity-only record; also the fallback record of a failed job
 */
export function createEmptyRecord(name: string, sourceUrl: string): EntityRecord {
  return { name, sourceUrl, ...EMPTY_ATTRIBUTES, summary: null };
}

/**
 * Fill a record from parsed fields and freeze it
 */
export function completeRecord(
  record: EntityRecord,
  fields: Partial<EntityAttributes>
): EntityRecord {
  const filled: EntityRecord = { ...record };
  for (const [key, value] of Object.entries(fields)) {
    if (value !== undefined && key in EMPTY_ATTRIBUTES) {
      Object.assign(filled, { [key]: value });
    }
  }
  return Object.freeze(filled);
}

/**
 * The single post-hoc write allowed on a collected record
 *
 * @throws {SummaryAlreadySetError} if the record already carries a summary
 */
export function applySummary(record: EntityRecord, summary: string | null): EntityRecord {
  if (record.summary !== null) {
    throw new SummaryAlreadySetError(record.name, record.sourceUrl);
  }
  return Object.freeze({ ...record, summary });
}

export function toFlatRecord(record: EntityRecord): FlatRecord {
  return {
    name: record.name,
    source_url: record.sourceUrl,
    population: record.population,
    population_date: record.populationDate,
    area_km2: record.areaKm2,
    elevation_m: record.elevationM,
    municipality_code: record.municipalityCode,
    district: record.district,
    region: record.region,
    state: record.state,
    postal_code: record.postalCode,
    area_code: record.areaCode,
    vehicle_code: record.vehicleCode,
    coordinates: record.coordinates,
    coordinates_url: record.coordinatesUrl,
    website: record.website,
    mayor: record.mayor,
    full_text: record.fullText,
    summary_text: record.summary,
  };
}

/**
 * Names carried by more than one record, in first-seen order
 */
export function findDuplicateNames(records: readonly EntityRecord[]): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();

  for (const record of records) {
    if (seen.has(record.name)) {
      duplicates.add(record.name);
    }
    seen.add(record.name);
  }

  return Array.from(duplicates);
}
