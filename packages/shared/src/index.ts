/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  type RequestContext,
} from './context';

// Logger
export { logger, describeError, reserveStdout, type LogContext } from './logger';

// Config
export { config, TOKEN_BUDGET_CEILING, type Config } from './config';

// Errors
export {
  PipelineError,
  ConfigError,
  ChunkOverflowError,
  AuthError,
  ExtractionFailedError,
  RunCancelledError,
  PdfTextError,
  errorMessage,
} from './errors';

// Types
export * from './types';

// Metrics
export {
  register,
  enableDefaultMetrics,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  llmRetriesCounter,
  chunksProcessedCounter,
  recordsExtractedCounter,
  rowsProducedCounter,
  runDurationHistogram,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  getMetrics,
  getMetricsContentType,
} from './metrics';

// Schemas
export {
  isRecordCandidate,
  isJsonRecordItem,
  isPipelineOptions,
  describeRecordCandidateErrors,
  describeJsonRecordItemErrors,
  describePipelineOptionsErrors,
  formatErrors,
  type RecordCandidate,
  type JsonRecordItem,
  type PipelineOptions,
} from './schemas';

// Templates
export { RECORD_EXTRACTION_TEMPLATE, PROMPT_VERSION, type ExtractionTemplate } from './templates';

// Pipeline
export * from './pipeline';

// PDF text
export { extractPdfText, extractPdfTextFromBuffer, normalizePdfText } from './pdf';

// Export
export {
  buildWorkbook,
  writeWorkbookBuffer,
  writeWorkbookFile,
  toCellValue,
  XLSX_MIME_TYPE,
  OUTPUT_SHEET_NAME,
  SUMMARY_SHEET_NAME,
  OUTPUT_HEADERS,
  DATE_NUMBER_FORMAT,
} from './export/workbook';
