/**
 * Key/Value/Comment Extraction Template
 *
 * Document semantics:
 * - Any form, report, statement or narrative converted to text
 * - Each factual element becomes one key/value pair
 * - Context around a value goes in the comment, in the document's own words
 * - Output is line oriented so a truncated response still yields whole records
 */

import type { ExtractionTemplate } from './types';

export const RECORD_EXTRACTION_TEMPLATE: ExtractionTemplate = {
  version: 'record-extraction/v1',
  description: 'Generic key/value/comment extraction for forms and reports',

  promptTemplate: `You are an expert data extraction assistant that converts unstructured document text into structured key-value records.

This is part {{chunk_number}} of {{chunk_count}} of the document. Records from other parts are merged later, so extract only what appears below.

DOCUMENT TEXT:
{{chunk_text}}

EXTRACTION RULES:
1. Identify every factual element and express it as a key-value pair. Keys are concise and descriptive (e.g. "Invoice Number", "Date of Birth", "Total Amount Due").
2. Values use the exact original data. Keep units when they are integral to the value (e.g. "35 years", "92.5%").
3. Write dates exactly as they appear in the text.
4. For lists (line items, certifications, skills), create sequential keys (e.g. "Line Item 1", "Line Item 2").
5. Put contextual sentences or phrases in the comment, using the document's exact wording. Scales, qualifiers and explanations belong there.
6. If a section is purely descriptive, leave the value empty and put the full description in the comment.
7. Do not summarize, omit or paraphrase. Do not introduce information that is not in the text.
8. Order records as they appear in the document.

OUTPUT FORMAT (exactly this, nothing else):
BEGIN RECORDS
Key: <key> | Value: <value> | Comment: <comment>
Key: <key> | Value: <value> | Comment: <comment>
END RECORDS

Write one record per line. Never use the "|" character inside a key, value or comment. Leave the comment empty when there is no context.`,
};
