/**
 * Page Parser
 *
 * Fetches one entity page and extracts a ParseOutcome in three isolated
 * steps:
 *
 * 1. infobox      - key/value table -> Field Normalizer
 * 2. coordinates  - display string and coordinate-lookup link
 * 3. body-text    - visible article text, hard-cut to the job's budget
 *
 * A failing step records a skip entry and leaves earlier fields in place.
 * parsePage() never rejects except when its signal aborts.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { HTTPClient } from '../core/http-client.js';
import type {
  EntityAttributes,
  ExtractionJob,
  ParseOutcome,
  ParseStep,
  SkippedField,
} from '../core/types.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import {
  cleanText,
  normalizeFields,
  resolveLabel,
  truncateText,
  type LabeledValue,
} from './field-normalizer.js';

const log = createLogger({ module: 'page-parser' });

type CheerioAPI = cheerio.CheerioAPI;

const INFOBOX_CLASS = /infobox/i;
const STRIPPED_CLASS = /^(?:infobox|navbox|navframe|toc$|toclimit|mw-editsection|reference)/i;
const BODY_CONTAINERS = ['#mw-content-text .mw-parser-output', '#mw-content-text', 'main', 'body'];
const BLOCK_ELEMENTS = 'p, li, dd, dt, h1, h2, h3, h4, h5, h6, td, th, br';
const COORDINATE_LINK = 'a[href*="geohack"]';

interface BoxResult {
  readonly table: Element;
  readonly rows: readonly LabeledValue[];
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Fetch and parse a single entity page
 */
export async function parsePage(
  client: HTTPClient,
  job: ExtractionJob,
  signal?: AbortSignal
): Promise<ParseOutcome> {
  let html: string;

  try {
    html = await client.fetchText(job.url, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    log.warn('Page fetch failed', { name: job.name, url: job.url, error: errorMessage(error) });
    return { fields: {}, skipped: [{ step: 'fetch', reason: errorMessage(error) }] };
  }

  const outcome = parseDocument(html, job.charLimit);

  for (const skip of outcome.skipped) {
    log.debug('Field skipped', { name: job.name, url: job.url, ...skip });
  }

  return outcome;
}

/**
 * Parse an already-fetched page. Pure; never throws.
 */
export function parseDocument(html: string, charLimit: number): ParseOutcome {
  const skipped: SkippedField[] = [];
  let fields: Partial<EntityAttributes> = {};

  const $ = cheerio.load(html);

  const box = runStep('infobox', skipped, () => extractBox($, skipped));
  if (box !== null) {
    fields = { ...fields, ...box.fields };
  }

  const coordinates = runStep('coordinates', skipped, () =>
    extractCoordinates($, box?.table ?? null, skipped)
  );
  if (coordinates !== null) {
    fields = { ...fields, ...coordinates };
  }

  const fullText = runStep('body-text', skipped, () => extractBodyText($, charLimit, skipped));
  if (fullText !== null) {
    fields = { ...fields, fullText };
  }

  return { fields, skipped };
}

// ============================================================================
// Step Isolation
// ============================================================================

function runStep<T>(step: ParseStep, skipped: SkippedField[], fn: () => T | null): T | null {
  try {
    return fn();
  } catch (error) {
    skipped.push({ step, reason: errorMessage(error) });
    return null;
  }
}

// ============================================================================
// Step 1: Structured Box
// ============================================================================

function extractBox(
  $: CheerioAPI,
  skipped: SkippedField[]
): { readonly table: Element; readonly fields: Partial<EntityAttributes> } | null {
  const box = selectBox($);

  if (box === null) {
    skipped.push({ step: 'infobox', reason: 'No key/value table found' });
    return null;
  }

  const { fields, rejected } = normalizeFields(box.rows);

  for (const entry of rejected) {
    skipped.push({
      step: 'infobox',
      attribute: entry.attribute,
      label: entry.label,
      reason: `Unparsable value "${cleanText(entry.raw)}"`,
    });
  }

  return { table: box.table, fields };
}

/**
 * Infobox-classed tables first, then the rest in document order. The first
 * table with a recognized label wins, else the first with any pair.
 */
function selectBox($: CheerioAPI): BoxResult | null {
  const tables = $('table').toArray();
  const candidates = [
    ...tables.filter((table) => INFOBOX_CLASS.test($(table).attr('class') ?? '')),
    ...tables.filter((table) => !INFOBOX_CLASS.test($(table).attr('class') ?? '')),
  ];

  let firstWithPairs: BoxResult | null = null;

  for (const table of candidates) {
    const rows = readRows($, table);
    if (rows.length === 0) {
      continue;
    }
    if (rows.some((row) => resolveLabel(row.label) !== null)) {
      return { table, rows };
    }
    if (firstWithPairs === null) {
      firstWithPairs = { table, rows };
    }
  }

  return firstWithPairs;
}

/**
 * Label/value pairs from the first two cells of the table's own rows
 */
function readRows($: CheerioAPI, table: Element): LabeledValue[] {
  const rows: LabeledValue[] = [];

  $(table)
    .find('tr')
    .each((_, row) => {
      if ($(row).closest('table').get(0) !== table) {
        return;
      }
      const cells = $(row).children('th, td');
      if (cells.length < 2) {
        return;
      }
      rows.push({ label: cellText($, cells.get(0)), value: cellText($, cells.get(1)) });
    });

  return rows;
}

function cellText($: CheerioAPI, cell: Element | undefined): string {
  if (cell === undefined) {
    return '';
  }
  const copy = $(cell).clone();
  copy.find('br').replaceWith(' ');
  return copy.text();
}

// ============================================================================
// Step 2: Coordinates
// ============================================================================

function extractCoordinates(
  $: CheerioAPI,
  box: Element | null,
  skipped: SkippedField[]
): Pick<EntityAttributes, 'coordinates' | 'coordinatesUrl'> | null {
  const element = box === null ? null : findCoordinateElement($, box);

  const display = element === null ? '' : cleanText(cellText($, element));
  const directLink = element === null ? undefined : $(element).find(COORDINATE_LINK).attr('href');
  const href = directLink ?? $(COORDINATE_LINK).first().attr('href');

  if (display.length === 0 && href === undefined) {
    skipped.push({ step: 'coordinates', attribute: 'coordinates', reason: 'No coordinates found' });
    return null;
  }

  return {
    coordinates: display.length > 0 ? display : null,
    coordinatesUrl: href === undefined ? null : absolutizeLink(href),
  };
}

/**
 * Value cell of the box's coordinate row, else a coordinates/geo-dms element
 */
function findCoordinateElement($: CheerioAPI, box: Element): Element | null {
  for (const row of $(box).find('tr').toArray()) {
    const cells = $(row).children('th, td');
    const label = cells.get(0);
    const value = cells.get(1);
    if (label === undefined || value === undefined) {
      continue;
    }
    if (resolveLabel($(label).text())?.mapping.attribute === 'coordinates') {
      return value;
    }
  }

  return $(box).find('.coordinates, .geo-dms').get(0) ?? null;
}

function absolutizeLink(href: string): string {
  return href.startsWith('//') ? `https:${href}` : href;
}

// ============================================================================
// Step 3: Body Text
// ============================================================================

function extractBodyText(
  $: CheerioAPI,
  charLimit: number,
  skipped: SkippedField[]
): string | null {
  const container = BODY_CONTAINERS.map((selector) => $(selector).first()).find(
    (candidate) => candidate.length > 0
  );

  if (container === undefined) {
    skipped.push({ step: 'body-text', attribute: 'fullText', reason: 'No content container' });
    return null;
  }

  container.find('script, style').remove();
  container
    .find('[class]')
    .filter((_, element) =>
      ($(element).attr('class') ?? '').split(/\s+/).some((name) => STRIPPED_CLASS.test(name))
    )
    .remove();
  container.find(BLOCK_ELEMENTS).after(' ');

  const text = truncateText(cleanText(container.text()), charLimit);

  if (text.length === 0) {
    skipped.push({ step: 'body-text', attribute: 'fullText', reason: 'No visible text' });
    return null;
  }

  return text;
}
