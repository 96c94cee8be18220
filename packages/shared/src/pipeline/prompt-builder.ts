/**
 * Prompt Builder
 *
 * Pure: the same chunk and template always produce the same prompt.
 */

import type { ExtractionRequest, TextChunk } from '../types';
import type { ExtractionTemplate } from '../templates/types';
import { RECORD_EXTRACTION_TEMPLATE } from '../templates';

export interface PromptOptions {
  template?: ExtractionTemplate;
  /** Total chunks in the document; defaults to "?" when unknown */
  chunkCount?: number;
}

function fill(template: string, values: Record<string, string>): string {
  // Function replacer so "$&" and friends in document text stay literal
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(values, name) ? values[name] : placeholder
  );
}

export function buildPromptText(chunk: TextChunk, options: PromptOptions = {}): string {
  const template = options.template ?? RECORD_EXTRACTION_TEMPLATE;

  return fill(template.promptTemplate, {
    chunk_number: String(chunk.index + 1),
    chunk_count: options.chunkCount !== undefined ? String(options.chunkCount) : '?',
    chunk_text: chunk.text,
  });
}

export function buildExtractionRequest(chunk: TextChunk, options: PromptOptions = {}): ExtractionRequest {
  return {
    chunk,
    promptText: buildPromptText(chunk, options),
  };
}
