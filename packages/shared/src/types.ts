/**
 * Shared TypeScript Types
 *
 * Types for the PDF key/value extraction pipeline.
 */

// ============================================================================
// Input
// ============================================================================

export interface Document {
  id: string;
  /** Full extracted raw text; never mutated during a run */
  text: string;
}

// ============================================================================
// Chunking & Requests
// ============================================================================

export interface TextChunk {
  index: number;
  text: string;
  /** Always <= the token budget the chunk was planned with */
  estimatedTokens: number;
}

export interface ExtractionRequest {
  chunk: TextChunk;
  promptText: string;
}

export interface RawModelResponse {
  chunkIndex: number;
  text: string;
  receivedAt: Date;
}

// ============================================================================
// Records
// ============================================================================

export interface ExtractedRecord {
  key: string;
  /** As written by the model; dates are kept as strings */
  value: string;
  comment: string;
  sourceChunkIndex: number;
}

export interface CanonicalRecord {
  normalizedKey: string;
  /** Key spelling of the first observation */
  key: string;
  value: string;
  /** Equality form of the value (see valueIdentity) */
  valueIdentity: string;
  /** Ordered set, first-seen order */
  comments: string[];
  firstSeenChunk: number;
  /** Global first-observation order across the run */
  sequence: number;
  /** Secondary variant whose value differs from an earlier one for the same key */
  conflict: boolean;
  /** Value of the primary record this variant conflicts with */
  conflictsWith?: string;
}

export interface OutputRow {
  readonly srNo: number;
  readonly key: string;
  readonly value: string;
  readonly comments: string;
  readonly conflict: boolean;
  readonly conflictsWith?: string;
}

// ============================================================================
// Diagnostics
// ============================================================================

export type ParseWarningCode =
  | 'malformed_line'
  | 'invalid_json'
  | 'invalid_item'
  | 'empty_response'
  | 'no_records_parsed';

export interface ParseWarning {
  chunkIndex: number;
  code: ParseWarningCode;
  message: string;
  /** 1-based line number in the response, when the warning is about a line */
  line?: number;
  raw?: string;
}

export interface ChunkFailure {
  chunkIndex: number;
  attempts: number;
  error: string;
}

export interface ChunkOverflowReport {
  lineNumber: number;
  estimatedTokens: number;
  tokenBudget: number;
  preview: string;
}

export interface RunSummary {
  runId: string;
  documentId: string;
  promptVersion: string;
  totalChunks: number;
  processedChunks: number;
  failedChunks: ChunkFailure[];
  /** Chunks never dispatched because the run aborted */
  skippedChunks: number[];
  overflows: ChunkOverflowReport[];
  parseWarnings: ParseWarning[];
  extractedRecordCount: number;
  canonicalRecordCount: number;
  conflictCount: number;
  rowCount: number;
  aborted: boolean;
  abortReason?: string;
  durationMs: number;
}

export interface ExtractionRun {
  rows: readonly OutputRow[];
  summary: RunSummary;
}

// ============================================================================
// API
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: string;
    message: string;
    correlation_id: string;
  };
}
