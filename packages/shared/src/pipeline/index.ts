/**
 * Extraction pipeline: chunk -> prompt -> model -> parse -> dedup -> sequence
 */

export { defaultPipelineOptions, resolvePipelineOptions } from './options';
export {
  TiktokenEstimator,
  CharTokenEstimator,
  defaultTokenEstimator,
  type TokenEstimator,
} from './token-estimator';
export {
  planChunks,
  splitOversizedLine,
  isStructuredRow,
  toOverflowReport,
  type ChunkPlan,
  type ChunkPlannerOptions,
} from './chunk-planner';
export { buildPromptText, buildExtractionRequest, type PromptOptions } from './prompt-builder';
export { OpenAiTransport, type ModelTransport, type CompletionRequest, type OpenAiTransportOptions } from './openai-transport';
export {
  ExtractionClient,
  classifyError,
  abortableSleep,
  type ExtractionClientOptions,
  type FailureKind,
  type Sleep,
} from './extraction-client';
export { parseModelResponse, type ParseResult } from './response-parser';
export { Deduplicator, mergeComment, type MergeOutcome, type MergeResult } from './deduplicator';
export {
  sequenceRecords,
  dedupeCommentsAcrossRows,
  COMMENT_SEPARATOR,
  type SequenceOptions,
} from './record-sequencer';
export {
  normalizeKey,
  normalizeWhitespace,
  parseDateValue,
  normalizeNumber,
  formatIsoDate,
  valueIdentity,
  type CalendarDate,
} from './value-normalization';
export { runExtraction, type RunDependencies } from './run';
