/**
 * Core record types for muni-harvest
 *
 * TYPE SAFETY: every optional attribute is `T | null`; no sentinel strings.
 */

// ============================================================================
// Entity Record
// ============================================================================

/**
 * Extracted attributes of one municipality page
 */
export interface EntityAttributes {
  /** Inhabitants, integer >= 0 */
  readonly population: number | null;
  /** Reference date of the population figure (free text, e.g. "31. Dez. 2023") */
  readonly populationDate: string | null;
  readonly areaKm2: number | null;
  readonly elevationM: number | null;
  /** Official municipality key (Gemeindeschlüssel) */
  readonly municipalityCode: string | null;
  readonly district: string | null;
  readonly region: string | null;
  /** Top-level administrative unit (Bundesland) */
  readonly state: string | null;
  readonly postalCode: string | null;
  readonly areaCode: string | null;
  readonly vehicleCode: string | null;
  readonly coordinates: string | null;
  readonly coordinatesUrl: string | null;
  readonly website: string | null;
  readonly mayor: string | null;
  /** Body text, hard-cut to the job's character budget */
  readonly fullText: string | null;
}

export type EntityAttribute = keyof EntityAttributes;

/**
 * One output row per municipality.
 *
 * `summary` is written at most once, by the summarization collaborator.
 */
export interface EntityRecord extends EntityAttributes {
  readonly name: string;
  readonly sourceUrl: string;
  readonly summary: string | null;
}

/**
 * Flat key -> value form handed to summarizers and exporters
 */
export interface FlatRecord {
  readonly name: string;
  readonly source_url: string;
  readonly population: number | null;
  readonly population_date: string | null;
  readonly area_km2: number | null;
  readonly elevation_m: number | null;
  readonly municipality_code: string | null;
  readonly district: string | null;
  readonly region: string | null;
  readonly state: string | null;
  readonly postal_code: string | null;
  readonly area_code: string | null;
  readonly vehicle_code: string | null;
  readonly coordinates: string | null;
  readonly coordinates_url: string | null;
  readonly website: string | null;
  readonly mayor: string | null;
  readonly full_text: string | null;
  readonly summary_text: string | null;
}

export type FlatRecordKey = keyof FlatRecord;

// ============================================================================
// Jobs and Outcomes
// ============================================================================

/**
 * Entry of the index page, in source order
 */
export interface IndexEntry {
  readonly name: string;
  readonly url: string;
}

/**
 * One unit of work: fetch + parse a single entity page
 */
export interface ExtractionJob {
  readonly index: number;
  readonly name: string;
  readonly url: string;
  readonly charLimit: number;
}

export type ParseStep = 'fetch' | 'infobox' | 'coordinates' | 'body-text';

/**
 * Why a field (or a whole step) was not populated
 */
export interface SkippedField {
  readonly step: ParseStep;
  readonly reason: string;
  readonly attribute?: EntityAttribute;
  readonly label?: string;
}

/**
 * Partial result of parsing one page
 */
export interface ParseOutcome {
  readonly fields: Partial<EntityAttributes>;
  readonly skipped: readonly SkippedField[];
}

export type JobStatus = 'complete' | 'partial' | 'fallback';

/**
 * Per-job report collected by the orchestrator
 */
export interface JobReport {
  readonly index: number;
  readonly name: string;
  readonly url: string;
  readonly status: JobStatus;
  readonly skipped: readonly SkippedField[];
  readonly durationMs: number;
  readonly error?: string;
}
