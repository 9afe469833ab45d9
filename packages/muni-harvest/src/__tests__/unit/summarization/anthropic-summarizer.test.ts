/**
 * Anthropic summarizer tests (in-process Messages API)
 */

import { describe, it, expect, vi } from 'vitest';
import { HTTPClient, type FetchImplementation } from '../../../core/http-client.js';
import { completeRecord, createEmptyRecord, toFlatRecord } from '../../../core/record.js';
import type { FlatRecord } from '../../../core/types.js';
import {
  AnthropicSummarizer,
  DEFAULT_ANTHROPIC_CONFIG,
  PROMPT_TEXT_LIMIT,
  buildSummaryPrompt,
} from '../../../summarization/anthropic-summarizer.js';
import { jsonResponse } from '../../utils/fake-fetch.js';

function flatRecord(overrides: Parameters<typeof completeRecord>[1] = {}, name = 'Beispielstadt'): FlatRecord {
  return toFlatRecord(
    completeRecord(createEmptyRecord(name, 'https://wiki.example/wiki/Beispielstadt'), {
      population: 12345,
      ...overrides,
    })
  );
}

function messagesFetch(body: unknown) {
  return vi.fn<FetchImplementation>(async () => jsonResponse(body));
}

function createSummarizer(fetchImpl: FetchImplementation, model?: string): AnthropicSummarizer {
  return new AnthropicSummarizer(
    { apiKey: 'test-secret', ...(model !== undefined ? { model } : {}) },
    new HTTPClient({ fetchImpl, initialDelayMs: 0, maxAttempts: 1 })
  );
}

describe('buildSummaryPrompt', () => {
  it('should embed populated fields and omit null ones', () => {
    const prompt = buildSummaryPrompt(flatRecord());

    expect(prompt.startsWith('Die folgenden JSON-Daten beschreiben eine Kommune')).toBe(true);
    expect(prompt).toContain('"name": "Beispielstadt"');
    expect(prompt).toContain('"population": 12345');
    expect(prompt).not.toContain('"website"');
    expect(prompt).not.toContain('{{data}}');
  });

  it('should cut long body text and mark the cut', () => {
    const prompt = buildSummaryPrompt(flatRecord({ fullText: 'a'.repeat(PROMPT_TEXT_LIMIT + 1000) }));

    expect(prompt).toContain(`"full_text": "${'a'.repeat(PROMPT_TEXT_LIMIT)}..."`);
    expect(prompt).not.toContain('a'.repeat(PROMPT_TEXT_LIMIT + 1));
  });

  it('should keep body text at the limit unchanged', () => {
    const prompt = buildSummaryPrompt(flatRecord({ fullText: 'b'.repeat(PROMPT_TEXT_LIMIT) }));

    expect(prompt).toContain(`"full_text": "${'b'.repeat(PROMPT_TEXT_LIMIT)}"`);
  });
});

describe('AnthropicSummarizer', () => {
  it('should post the prompt and return the trimmed text', async () => {
    const fetchImpl = messagesFetch({ content: [{ type: 'text', text: '  Beispielstadt ist klein. ' }] });
    const flat = flatRecord();

    const summary = await createSummarizer(fetchImpl).summarize(flat);

    expect(summary).toBe('Beispielstadt ist klein.');
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe(DEFAULT_ANTHROPIC_CONFIG.endpoint);
    expect(init?.method).toBe('POST');

    const headers = new Headers(init?.headers);
    expect(headers.get('x-api-key')).toBe('test-secret');
    expect(headers.get('anthropic-version')).toBe('2023-06-01');

    expect(JSON.parse(String(init?.body))).toEqual({
      model: DEFAULT_ANTHROPIC_CONFIG.model,
      max_tokens: 400,
      temperature: 0.3,
      messages: [{ role: 'user', content: buildSummaryPrompt(flat) }],
    });
  });

  it('should use a configured model', async () => {
    const fetchImpl = messagesFetch({ content: [{ type: 'text', text: 'Text' }] });

    await createSummarizer(fetchImpl, 'test-model').summarize(flatRecord());

    const init = fetchImpl.mock.calls[0]?.[1];
    expect(JSON.parse(String(init?.body))).toMatchObject({ model: 'test-model' });
  });

  it('should join text blocks and skip other block types', async () => {
    const fetchImpl = messagesFetch({
      content: [
        { type: 'text', text: 'Teil eins. ' },
        { type: 'tool_use', id: 'tool-1' },
        { type: 'text', text: 'Teil zwei.' },
      ],
    });

    await expect(createSummarizer(fetchImpl).summarize(flatRecord())).resolves.toBe(
      'Teil eins. Teil zwei.'
    );
  });

  it('should return null for an empty answer', async () => {
    const fetchImpl = messagesFetch({ content: [] });

    await expect(createSummarizer(fetchImpl).summarize(flatRecord())).resolves.toBeNull();
  });

  it('should reject an unexpected response shape', async () => {
    const fetchImpl = messagesFetch({ completion: 'alt' });

    await expect(createSummarizer(fetchImpl).summarize(flatRecord())).rejects.toThrow(
      'Unexpected Messages API response'
    );
  });

  it('should skip records without a name', async () => {
    const fetchImpl = messagesFetch({ content: [{ type: 'text', text: 'Text' }] });

    await expect(createSummarizer(fetchImpl).summarize(flatRecord({}, '  '))).resolves.toBeNull();
    expect(fetchImpl).not.toHaveBeenCalled();
  });
});
