/**
 * Anthropic Messages API summarizer
 *
 * Posts one prompt per record through the shared HTTPClient (same retry
 * policy as page fetches) and validates the response with zod.
 */

import { z } from 'zod';
import { HTTPClient } from '../core/http-client.js';
import { RECORD_COLUMNS } from '../core/record.js';
import type { FlatRecord } from '../core/types.js';
import { createLogger } from '../core/utils/logger.js';
import type { Summarizer } from './summarizer.js';

const log = createLogger({ module: 'anthropic-summarizer' });

export interface AnthropicSummarizerConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly maxTokens: number;
  readonly temperature: number;
  readonly endpoint: string;
  readonly apiVersion: string;
}

export const DEFAULT_ANTHROPIC_CONFIG: Omit<AnthropicSummarizerConfig, 'apiKey'> = {
  model: 'claude-3-5-haiku-20241022',
  maxTokens: 400,
  temperature: 0.3,
  endpoint: 'https://api.anthropic.com/v1/messages',
  apiVersion: '2023-06-01',
};

/** Body text beyond this many characters is cut from the prompt payload */
export const PROMPT_TEXT_LIMIT = 5000;

const PROMPT_TEMPLATE = `Die folgenden JSON-Daten beschreiben eine Kommune, einschließlich eines gekürzten Artikeltexts.

Schreibe daraus eine sachliche Kurzbeschreibung auf Deutsch:
- höchstens 120 Wörter
- beginne mit dem Namen der Kommune
- nenne Einwohnerzahl, Lage und Besonderheiten, soweit bekannt

Daten:
{{data}}

Kurzbeschreibung:`;

const MessagesResponseSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

/**
 * Prompt for one record: null fields omitted, full_text cut to
 * PROMPT_TEXT_LIMIT characters plus "..."
 */
export function buildSummaryPrompt(record: FlatRecord): string {
  const data: Record<string, string | number> = {};

  for (const key of RECORD_COLUMNS) {
    const value = record[key];
    if (value === null) {
      continue;
    }
    data[key] =
      key === 'full_text' && typeof value === 'string' && value.length > PROMPT_TEXT_LIMIT
        ? `${value.slice(0, PROMPT_TEXT_LIMIT)}...`
        : value;
  }

  return PROMPT_TEMPLATE.replace('{{data}}', JSON.stringify(data, null, 2));
}

export class AnthropicSummarizer implements Summarizer {
  private readonly config: AnthropicSummarizerConfig;
  private readonly client: HTTPClient;

  constructor(
    config: Pick<AnthropicSummarizerConfig, 'apiKey'> & Partial<AnthropicSummarizerConfig>,
    client: HTTPClient = new HTTPClient({ initialDelayMs: 1000, timeoutMs: 60000 })
  ) {
    this.config = { ...DEFAULT_ANTHROPIC_CONFIG, ...config };
    this.client = client;
  }

  async summarize(record: FlatRecord, signal?: AbortSignal): Promise<string | null> {
    if (record.name.trim().length === 0) {
      log.warn('Record without name, skipping summary', { url: record.source_url });
      return null;
    }

    const response = await this.client.fetchJSON(this.config.endpoint, {
      method: 'POST',
      headers: {
        'content-type': 'application/json',
        'x-api-key': this.config.apiKey,
        'anthropic-version': this.config.apiVersion,
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
        messages: [{ role: 'user', content: buildSummaryPrompt(record) }],
      }),
      signal,
    });

    const parsed = MessagesResponseSchema.safeParse(response);
    if (!parsed.success) {
      throw new Error(`Unexpected Messages API response: ${parsed.error.message}`);
    }

    const text = parsed.data.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('')
      .trim();

    if (text.length === 0) {
      log.warn('Empty summary returned', { name: record.name });
      return null;
    }

    log.debug('Summary generated', { name: record.name, model: this.config.model });
    return text;
  }
}
