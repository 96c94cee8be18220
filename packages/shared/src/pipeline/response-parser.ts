/**
 * Response Parser
 *
 * Turns a free-text model response into ExtractedRecords. Line oriented and
 * best effort: a malformed line becomes a ParseWarning and parsing moves on.
 * Never throws.
 *
 * Accepted shapes:
 * - `Key: Invoice Date | Value: 2024-01-05 | Comment: as printed`
 * - several records on one line, each starting with its own `Key:` label
 * - a JSON array of `{ "key", "value", "comments" }` objects
 * - either of the above wrapped in a Markdown code fence and/or between
 *   `BEGIN RECORDS` and `END RECORDS`, with prose around it
 */

import type { ExtractedRecord, ParseWarning, RawModelResponse } from '../types';
import {
  describeJsonRecordItemErrors,
  describeRecordCandidateErrors,
  isJsonRecordItem,
  isRecordCandidate,
} from '../schemas';
import { logger } from '../logger';
import { normalizeWhitespace } from './value-normalization';

export interface ParseResult {
  records: ExtractedRecord[];
  warnings: ParseWarning[];
}

type Field = 'key' | 'value' | 'comment';

interface NumberedLine {
  number: number;
  text: string;
}

interface FieldGroup {
  fields: Partial<Record<Field, string>>;
  last?: Field;
  repeated?: Field;
}

const LABEL = /^\s*(key|value|comments?|note)\s*:\s*(.*)$/is;
const FENCE = /^\s*```[\w-]*\s*$/;
const BEGIN = /^\s*BEGIN RECORDS\s*$/i;
const END = /^\s*END RECORDS\s*$/i;
const RAW_PREVIEW_LENGTH = 500;

function toField(label: string): Field {
  const lower = label.toLowerCase();
  if (lower === 'key') return 'key';
  if (lower === 'value') return 'value';
  return 'comment';
}

/**
 * Lines of the record section, numbered as in the full response.
 */
function recordSection(text: string): NumberedLine[] {
  const lines = text
    .split(/\r?\n/)
    .map((line, i) => ({ number: i + 1, text: FENCE.test(line) ? '' : line }));

  const begin = lines.findIndex((line) => BEGIN.test(line.text));
  if (begin === -1) return lines;

  const end = lines.findIndex((line, i) => i > begin && END.test(line.text));
  return lines.slice(begin + 1, end === -1 ? lines.length : end);
}

function stripDecoration(line: string): string {
  return line
    .replace(/^\s*(?:[-*•]|\d+[.)])\s+/, '')
    .replace(/\*\*/g, '');
}

function groupFields(line: string): FieldGroup[] {
  const groups: FieldGroup[] = [];

  for (const segment of stripDecoration(line).split('|')) {
    const match = segment.match(LABEL);
    const current = groups[groups.length - 1];

    if (match) {
      const field = toField(match[1]);
      const content = match[2].trim();

      if (field === 'key' || !current) {
        const fields: Partial<Record<Field, string>> = {};
        fields[field] = content;
        groups.push({ fields, last: field });
        continue;
      }
      if (current.fields[field] !== undefined) {
        current.repeated = current.repeated ?? field;
      } else {
        current.fields[field] = content;
      }
      current.last = field;
      continue;
    }

    // Unlabelled segment: the field value itself contained a "|"
    const extra = segment.trim();
    if (current?.last && extra) {
      const previous = current.fields[current.last] ?? '';
      current.fields[current.last] = previous ? `${previous} | ${extra}` : extra;
    }
  }

  return groups;
}

function parseLines(lines: NumberedLine[], chunkIndex: number, result: ParseResult): void {
  for (const line of lines) {
    if (!line.text.trim()) continue;

    const groups = groupFields(line.text);
    if (groups.length === 0) continue;

    for (const group of groups) {
      const { key, value, comment } = group.fields;

      if (group.repeated || key === undefined || value === undefined) {
        const problem = group.repeated
          ? `repeated "${group.repeated}" field`
          : key === undefined
            ? 'missing key'
            : 'missing value';
        result.warnings.push({
          chunkIndex,
          code: 'malformed_line',
          message: `Skipped record on line ${line.number}: ${problem}`,
          line: line.number,
          raw: line.text,
        });
        continue;
      }

      const candidate = {
        key: normalizeWhitespace(key),
        value: value.trim(),
        comment: (comment ?? '').trim(),
      };
      if (!isRecordCandidate(candidate)) {
        result.warnings.push({
          chunkIndex,
          code: 'malformed_line',
          message: `Skipped record on line ${line.number}: ${describeRecordCandidateErrors().join('; ')}`,
          line: line.number,
          raw: line.text,
        });
        continue;
      }

      result.records.push({ ...candidate, sourceChunkIndex: chunkIndex });
    }
  }
}

function parseJsonArray(sectionText: string, chunkIndex: number, result: ParseResult): void {
  const start = sectionText.indexOf('[');
  const end = sectionText.lastIndexOf(']');

  let parsed: unknown;
  try {
    parsed = JSON.parse(sectionText.slice(start, end + 1));
  } catch (error) {
    result.warnings.push({
      chunkIndex,
      code: 'invalid_json',
      message: `Response looks like JSON but does not parse: ${error instanceof Error ? error.message : String(error)}`,
      raw: sectionText.slice(0, RAW_PREVIEW_LENGTH),
    });
    return;
  }

  if (!Array.isArray(parsed)) {
    result.warnings.push({
      chunkIndex,
      code: 'invalid_json',
      message: 'JSON response is not an array of records',
      raw: sectionText.slice(0, RAW_PREVIEW_LENGTH),
    });
    return;
  }

  parsed.forEach((item: unknown, i) => {
    if (!isJsonRecordItem(item)) {
      result.warnings.push({
        chunkIndex,
        code: 'invalid_item',
        message: `Skipped JSON item ${i}: ${describeJsonRecordItemErrors().join('; ')}`,
        raw: JSON.stringify(item),
      });
      return;
    }

    const candidate = {
      key: normalizeWhitespace(item.key),
      value: item.value === undefined || item.value === null ? '' : String(item.value).trim(),
      comment: (item.comments ?? item.comment ?? '').trim(),
    };
    if (!isRecordCandidate(candidate)) {
      result.warnings.push({
        chunkIndex,
        code: 'invalid_item',
        message: `Skipped JSON item ${i}: ${describeRecordCandidateErrors().join('; ')}`,
        raw: JSON.stringify(item),
      });
      return;
    }

    result.records.push({ ...candidate, sourceChunkIndex: chunkIndex });
  });
}

export function parseModelResponse(response: RawModelResponse): ParseResult {
  const { chunkIndex, text } = response;
  const result: ParseResult = { records: [], warnings: [] };

  if (!text.trim()) {
    result.warnings.push({
      chunkIndex,
      code: 'empty_response',
      message: `Model returned an empty response for chunk ${chunkIndex}`,
    });
    return result;
  }

  const section = recordSection(text);
  const sectionText = section.map((line) => line.text).join('\n').trim();

  if (sectionText.startsWith('[')) {
    parseJsonArray(sectionText, chunkIndex, result);
  } else {
    parseLines(section, chunkIndex, result);
  }

  if (result.records.length === 0) {
    result.warnings.push({
      chunkIndex,
      code: 'no_records_parsed',
      message: `No records could be parsed from the response for chunk ${chunkIndex}`,
      raw: text.slice(0, RAW_PREVIEW_LENGTH),
    });
    logger.warn('No records parsed from model response', {
      chunk_index: chunkIndex,
      response_length: text.length,
    });
  }

  logger.debug('Parsed model response', {
    chunk_index: chunkIndex,
    record_count: result.records.length,
    warning_count: result.warnings.length,
  });

  return result;
}
