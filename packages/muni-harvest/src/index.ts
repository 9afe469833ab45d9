/**
 * muni-harvest
 *
 * Concurrent extraction of structured municipality records from an
 * encyclopedia index page, with CSV, statistics, summary and record-store
 * collaborators.
 */

// Core
export * from './core/types.js';
export * from './core/errors.js';
export {
  RECORD_COLUMNS,
  applySummary,
  completeRecord,
  createEmptyRecord,
  findDuplicateNames,
  toFlatRecord,
} from './core/record.js';
export {
  HTTPClient,
  HTTPError,
  HTTPTimeoutError,
  HTTPNetworkError,
  HTTPJSONParseError,
  FetchError,
  DEFAULT_HTTP_CLIENT_CONFIG,
  type FetchImplementation,
  type FetchOptions,
  type HTTPClientConfig,
} from './core/http-client.js';
export { logger, createLogger, type Logger, type LogLevel } from './core/utils/logger.js';

// Configuration
export {
  DEFAULT_EXTRACTION_CONFIG,
  ExtractionConfigSchema,
  createExtractionConfig,
  type ExtractionConfig,
} from './config/extraction-config.js';

// Resilience
export {
  Bulkhead,
  createBulkhead,
  type BulkheadConfig,
  type BulkheadStats,
} from './resilience/bulkhead.js';

// Extraction
export { FIELD_MAPPING_TABLE, type LabelMapping, type MappedAttribute } from './extraction/field-mapping.js';
export {
  cleanText,
  normalizeFields,
  normalizeHeadOfGovernment,
  normalizeLabel,
  normalizeWebsite,
  parseDecimal,
  parseInteger,
  parsePopulation,
  resolveLabel,
  type LabeledValue,
  type NormalizedFields,
} from './extraction/field-normalizer.js';
export { resolveIndex, parseIndexDocument } from './extraction/index-resolver.js';
export { parsePage, parseDocument } from './extraction/page-parser.js';
export {
  ExtractionOrchestrator,
  createExtractionClient,
  runExtraction,
  type ExtractionProgress,
  type ExtractionRun,
  type ExtractionRunOptions,
  type ExtractionStats,
} from './extraction/orchestrator.js';

// Collaborators
export { attachSummaries, type Summarizer } from './summarization/summarizer.js';
export {
  AnthropicSummarizer,
  buildSummaryPrompt,
  type AnthropicSummarizerConfig,
} from './summarization/anthropic-summarizer.js';
export { formatRecordsCsv, writeRecordsCsv } from './export/csv-writer.js';
export { computeSummaryStats, writeSummaryStats, type SummaryStats } from './export/summary-stats.js';
export {
  AirtableRecordStore,
  buildUpsertBatches,
  toUpsertFields,
  type RecordStore,
  type UpsertBatchPlan,
  type UpsertResult,
} from './export/record-store.js';
