/**
 * Prompt Builder Tests
 */

import {
  buildPromptText,
  buildExtractionRequest,
  RECORD_EXTRACTION_TEMPLATE,
  PROMPT_VERSION,
  type ExtractionTemplate,
  type TextChunk,
} from '@formtable/shared';

const chunk: TextChunk = { index: 2, text: 'Invoice Number: INV-001\nTotal: $& 5', estimatedTokens: 12 };

describe('buildPromptText', () => {
  it('embeds the chunk text, its position and the record format', () => {
    const prompt = buildPromptText(chunk, { chunkCount: 4 });

    expect(prompt).toContain('This is part 3 of 4 of the document.');
    expect(prompt).toContain('DOCUMENT TEXT:\nInvoice Number: INV-001\nTotal: $& 5\n');
    expect(prompt).toContain('BEGIN RECORDS\nKey: <key> | Value: <value> | Comment: <comment>');
    expect(prompt).not.toContain('{{');
  });

  it('is deterministic', () => {
    expect(buildPromptText(chunk, { chunkCount: 4 })).toBe(buildPromptText(chunk, { chunkCount: 4 }));
  });

  it('fills a custom template and leaves unknown placeholders alone', () => {
    const template: ExtractionTemplate = {
      version: 'test/1',
      description: 'test template',
      promptTemplate: 'Part {{chunk_number}}/{{chunk_count}}: {{chunk_text}} {{unknown}}',
    };

    expect(buildPromptText(chunk, { template, chunkCount: 4 })).toBe(
      'Part 3/4: Invoice Number: INV-001\nTotal: $& 5 {{unknown}}'
    );
    expect(buildPromptText(chunk, { template })).toBe('Part 3/?: Invoice Number: INV-001\nTotal: $& 5 {{unknown}}');
  });

  it('does not expand placeholders that appear inside the document text', () => {
    const template: ExtractionTemplate = { version: 't', description: 't', promptTemplate: '[{{chunk_text}}]' };
    const tricky: TextChunk = { index: 0, text: 'see {{chunk_number}}', estimatedTokens: 5 };

    expect(buildPromptText(tricky, { template })).toBe('[see {{chunk_number}}]');
  });
});

describe('buildExtractionRequest', () => {
  it('pairs the chunk with its prompt', () => {
    const request = buildExtractionRequest(chunk, { chunkCount: 4 });

    expect(request.chunk).toBe(chunk);
    expect(request.promptText).toBe(buildPromptText(chunk, { chunkCount: 4 }));
  });

  it('exposes the template version', () => {
    expect(PROMPT_VERSION).toBe(RECORD_EXTRACTION_TEMPLATE.version);
    expect(PROMPT_VERSION).toBe('record-extraction/v1');
  });
});
