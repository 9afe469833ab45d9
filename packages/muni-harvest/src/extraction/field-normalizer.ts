/**
 * Field Normalizer
 *
 * Pure functions that turn raw infobox label/value text into typed
 * attributes. No I/O, no exceptions: unparsable input yields null.
 *
 * Numeric values follow German formatting: "." groups thousands, ","
 * separates decimals.
 */

import type { EntityAttributes } from '../core/types.js';
import {
  FIELD_MAPPING_TABLE,
  type LabelMapping,
  type MappedAttribute,
} from './field-mapping.js';

// ============================================================================
// Types
// ============================================================================

/**
 * One row of a key/value table, as read from the page
 */
export interface LabeledValue {
  readonly label: string;
  readonly value: string;
}

export interface ResolvedLabel {
  readonly mapping: LabelMapping;
  /** Position in the mapping table; lower wins */
  readonly priority: number;
}

/**
 * Recognized label whose value did not survive its parser
 */
export interface RejectedValue {
  readonly attribute: MappedAttribute;
  readonly label: string;
  readonly raw: string;
}

export interface NormalizedFields {
  readonly fields: Partial<EntityAttributes>;
  readonly rejected: readonly RejectedValue[];
}

// ============================================================================
// Text Helpers
// ============================================================================

const FOOTNOTE_PATTERN = /\[[^\]]*\]/g;
const SCHEME_PATTERN = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Remove footnote markers ("[1]", "[Anm. 2]"), non-breaking spaces and
 * redundant whitespace
 */
export function cleanText(raw: string): string {
  return raw
    .replace(FOOTNOTE_PATTERN, '')
    .replace(/\u00a0/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * At most `limit` UTF-16 units of `text`. A cut never splits a surrogate
 * pair and never leaves trailing whitespace, so re-truncating is a no-op.
 */
export function truncateText(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }

  let end = limit;
  const last = text.charCodeAt(end - 1);
  if (end > 0 && last >= 0xd800 && last <= 0xdbff) {
    end--;
  }
  return text.slice(0, end).trimEnd();
}

/**
 * Lower-case label with trailing colons and whitespace removed
 */
export function normalizeLabel(raw: string): string {
  return cleanText(raw).toLowerCase().replace(/[\s:]+$/, '');
}

/**
 * The longest matching variant wins ("area code" over "area")
 */
export function resolveLabel(raw: string): ResolvedLabel | null {
  const key = normalizeLabel(raw);
  if (key.length === 0) {
    return null;
  }

  let best: ResolvedLabel | null = null;

  for (const [priority, mapping] of FIELD_MAPPING_TABLE.entries()) {
    const matches =
      key === mapping.label ||
      (mapping.match === 'prefix' && key.startsWith(mapping.label));

    if (matches && (best === null || mapping.label.length > best.mapping.label.length)) {
      best = { mapping, priority };
    }
  }

  return best;
}

// ============================================================================
// Value Parsers
// ============================================================================

/**
 * Drop every non-digit ("653.253" -> 653253)
 */
export function parseInteger(raw: string): number | null {
  const digits = raw.replace(/\D/g, '');
  if (digits.length === 0) {
    return null;
  }
  const value = Number.parseInt(digits, 10);
  return Number.isSafeInteger(value) ? value : null;
}

/**
 * Keep digits, "," and "."; "," becomes the decimal point ("45,7 km²" -> 45.7)
 */
export function parseDecimal(raw: string): number | null {
  const kept = raw.replace(/[^\d,.]/g, '').replace(/,/g, '.');
  if (kept.length === 0) {
    return null;
  }
  const value = Number(kept);
  return Number.isFinite(value) ? value : null;
}

/**
 * "12.345 (2021)" -> { population: 12345, populationDate: "2021" }
 *
 * The parenthesized text is the reference date and is never parsed as a
 * number.
 */
export function parsePopulation(raw: string): {
  readonly population: number | null;
  readonly populationDate: string | null;
} {
  const text = cleanText(raw);
  const open = text.indexOf('(');

  if (open === -1) {
    return { population: parseInteger(text), populationDate: null };
  }

  const close = text.indexOf(')', open);
  const date = cleanText(text.slice(open + 1, close === -1 ? undefined : close));

  return {
    population: parseInteger(text.slice(0, open)),
    populationDate: date.length > 0 ? date : null,
  };
}

export function parseText(raw: string): string | null {
  const text = cleanText(raw);
  return text.length > 0 ? text : null;
}

/**
 * Prefix scheme-less values with https://
 */
export function normalizeWebsite(raw: string): string | null {
  const text = parseText(raw);
  if (text === null) {
    return null;
  }
  return SCHEME_PATTERN.test(text) ? text : `https://${text}`;
}

/**
 * Strip parenthetical annotations such as party names
 */
export function normalizeHeadOfGovernment(raw: string): string | null {
  return parseText(cleanText(raw).replace(/\([^)]*\)/g, ''));
}

// ============================================================================
// Field Dispatch
// ============================================================================

/**
 * Parse one value for its attribute. Returns null when nothing usable is left.
 */
export function normalizeValue(
  attribute: MappedAttribute,
  raw: string
): Partial<EntityAttributes> | null {
  switch (attribute) {
    case 'population': {
      const { population, populationDate } = parsePopulation(raw);
      return population === null ? null : { population, populationDate };
    }
    case 'areaKm2': {
      const areaKm2 = parseDecimal(raw);
      return areaKm2 === null ? null : { areaKm2 };
    }
    case 'elevationM': {
      const elevationM = parseInteger(raw);
      return elevationM === null ? null : { elevationM };
    }
    case 'website': {
      const website = normalizeWebsite(raw);
      return website === null ? null : { website };
    }
    case 'mayor': {
      const mayor = normalizeHeadOfGovernment(raw);
      return mayor === null ? null : { mayor };
    }
    case 'municipalityCode':
    case 'district':
    case 'region':
    case 'state':
    case 'postalCode':
    case 'areaCode':
    case 'vehicleCode':
    case 'coordinates':
      return textField(attribute, raw);
  }
}

type TextAttribute = Exclude<
  MappedAttribute,
  'population' | 'areaKm2' | 'elevationM' | 'website' | 'mayor'
>;

function textField(attribute: TextAttribute, raw: string): Partial<EntityAttributes> | null {
  const text = parseText(raw);
  if (text === null) {
    return null;
  }
  const fields: Partial<Record<TextAttribute, string>> = {};
  fields[attribute] = text;
  return fields;
}

/**
 * Populate attributes from table rows.
 *
 * Per attribute, the populated value of the highest-priority label variant
 * wins; rows of the same variant keep the first one. Later synonyms are
 * ignored even when present.
 */
export function normalizeFields(rows: readonly LabeledValue[]): NormalizedFields {
  const winners = new Map<MappedAttribute, { priority: number; fields: Partial<EntityAttributes> }>();
  const rejected: RejectedValue[] = [];

  for (const row of rows) {
    const resolved = resolveLabel(row.label);
    if (resolved === null) {
      continue;
    }

    const { attribute } = resolved.mapping;
    const fields = normalizeValue(attribute, row.value);

    if (fields === null) {
      rejected.push({ attribute, label: cleanText(row.label), raw: row.value });
      continue;
    }

    const current = winners.get(attribute);
    if (current === undefined || resolved.priority < current.priority) {
      winners.set(attribute, { priority: resolved.priority, fields });
    }
  }

  let fields: Partial<EntityAttributes> = {};
  for (const winner of winners.values()) {
    fields = { ...fields, ...winner.fields };
  }

  return { fields, rejected };
}
