/**
 * Index Resolver
 *
 * Turns the single list page into an ordered list of entity pages.
 *
 * ALGORITHM:
 * 1. Fetch `config.indexUrl` once (fatal on failure)
 * 2. Pick the data table: first `table.wikitable`, else the first table
 *    with data cells
 * 3. For every row with data cells, take each link of the row's first cell
 *    (a `th` row header counts) whose resolved URL stays on the index host
 *    under `config.entityPathPrefix`
 *
 * Row order is preserved. A table without matching links is not an error.
 */

import * as cheerio from 'cheerio';
import type { Element } from 'domhandler';
import type { ExtractionConfig } from '../config/extraction-config.js';
import type { HTTPClient } from '../core/http-client.js';
import { IndexResolutionError } from '../core/errors.js';
import type { IndexEntry } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'index-resolver' });

export type IndexResolverConfig = Pick<ExtractionConfig, 'indexUrl' | 'entityPathPrefix'>;

/**
 * @throws {IndexResolutionError} when the page cannot be fetched or has no data table
 */
export async function resolveIndex(
  client: HTTPClient,
  config: IndexResolverConfig,
  signal?: AbortSignal
): Promise<IndexEntry[]> {
  let html: string;

  try {
    html = await client.fetchText(config.indexUrl, { signal });
  } catch (error) {
    if (signal?.aborted) {
      throw error;
    }
    throw new IndexResolutionError(
      `Failed to fetch index page ${config.indexUrl}`,
      config.indexUrl,
      error instanceof Error ? error : new Error(String(error))
    );
  }

  const entries = parseIndexDocument(html, config);

  log.info('Index resolved', { indexUrl: config.indexUrl, entries: entries.length });
  if (entries.length === 0) {
    log.warn('Index table contains no entity links', { indexUrl: config.indexUrl });
  }

  return entries;
}

/**
 * Pure part of resolveIndex
 *
 * @throws {IndexResolutionError} when the document has no data table
 */
export function parseIndexDocument(html: string, config: IndexResolverConfig): IndexEntry[] {
  const $ = cheerio.load(html);
  const table = selectDataTable($);

  if (table === null) {
    throw new IndexResolutionError('Index page has no data table', config.indexUrl);
  }

  const base = new URL(config.indexUrl);
  const entries: IndexEntry[] = [];

  $(table)
    .find('tr')
    .each((_, row) => {
      const cells = $(row).children('th, td');
      if (cells.filter('td').length === 0) {
        return;
      }
      const firstCell = cells.first();

      firstCell.find('a[href]').each((_, link) => {
        const entry = toIndexEntry($(link).attr('href'), $(link).attr('title'), base, config);
        if (entry !== null) {
          entries.push(entry);
        }
      });
    });

  return entries;
}

function selectDataTable($: cheerio.CheerioAPI): Element | null {
  const wikitable = $('table.wikitable').first();
  if (wikitable.length > 0) {
    return wikitable.get(0) ?? null;
  }

  const withCells = $('table')
    .filter((_, table) => $(table).find('td').length > 0)
    .first();
  return withCells.get(0) ?? null;
}

function toIndexEntry(
  href: string | undefined,
  title: string | undefined,
  base: URL,
  config: IndexResolverConfig
): IndexEntry | null {
  if (href === undefined || href.startsWith('#')) {
    return null;
  }

  let url: URL;
  try {
    url = new URL(href, base);
  } catch {
    log.debug('Skipping malformed index link', { href });
    return null;
  }

  if (url.host !== base.host || !url.pathname.startsWith(config.entityPathPrefix)) {
    return null;
  }

  url.hash = '';
  const segment = url.pathname.slice(config.entityPathPrefix.length);
  if (segment.length === 0) {
    return null;
  }

  const trimmedTitle = title?.trim() ?? '';
  const name = trimmedTitle.length > 0 ? trimmedTitle : decodeSegment(segment).replace(/_/g, ' ');

  return { name, url: url.toString() };
}

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}
