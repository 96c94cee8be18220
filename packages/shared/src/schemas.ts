/**
 * JSON Schema Validation
 *
 * Ajv validators for the record contract enforced at the parser boundary
 * and for pipeline options. Schemas live in ../contracts.
 */

import Ajv2020 from 'ajv/dist/2020';
import type { ErrorObject } from 'ajv';
import recordCandidateSchema from '../contracts/record_candidate.schema.json';
import jsonRecordItemSchema from '../contracts/json_record_item.schema.json';
import pipelineOptionsSchema from '../contracts/pipeline_options.schema.json';

const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
});

/** Key/value/comment triple as recovered from model text */
export interface RecordCandidate {
  key: string;
  value: string;
  comment: string;
}

/** Item of a JSON-array response */
export interface JsonRecordItem {
  key: string;
  value?: string | number | boolean | null;
  comments?: string | null;
  comment?: string | null;
}

export interface PipelineOptions {
  /** Max estimated tokens per chunk (ceiling 7000) */
  tokenBudget: number;
  /** Tokens of trailing lines repeated at the head of the next chunk */
  chunkOverlap: number;
  /** Maximum attempts per model call, first attempt included */
  maxRetries: number;
  backoffBaseSeconds: number;
  /** Elapsed time plus the next backoff may not exceed this */
  retryTimeCeilingSeconds: number;
  concurrency: number;
  maxConsecutiveFailures: number;
  maxResponseTokens: number;
  dedupeCommentsAcrossKeys: boolean;
}

const recordCandidateValidator = ajv.compile<RecordCandidate>(recordCandidateSchema);
const jsonRecordItemValidator = ajv.compile<JsonRecordItem>(jsonRecordItemSchema);
const pipelineOptionsValidator = ajv.compile<PipelineOptions>(pipelineOptionsSchema);

export function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors || []).map((e) => `${e.instancePath || '/'} ${e.message || 'is invalid'}`);
}

export function isRecordCandidate(data: unknown): data is RecordCandidate {
  return recordCandidateValidator(data);
}

export function isJsonRecordItem(data: unknown): data is JsonRecordItem {
  return jsonRecordItemValidator(data);
}

export function describeRecordCandidateErrors(): string[] {
  return formatErrors(recordCandidateValidator.errors);
}

export function describeJsonRecordItemErrors(): string[] {
  return formatErrors(jsonRecordItemValidator.errors);
}

export function isPipelineOptions(data: unknown): data is PipelineOptions {
  return pipelineOptionsValidator(data);
}

export function describePipelineOptionsErrors(): string[] {
  return formatErrors(pipelineOptionsValidator.errors);
}
