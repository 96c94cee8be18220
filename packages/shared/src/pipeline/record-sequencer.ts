/**
 * Record Sequencer
 *
 * Orders canonical records by where they were first seen and numbers them
 * into frozen OutputRows.
 */

import type { CanonicalRecord, OutputRow } from '../types';

export interface SequenceOptions {
  /** Blank a row's comment when another row's comment already contains it */
  dedupeCommentsAcrossKeys?: boolean;
}

export const COMMENT_SEPARATOR = '; ';

/**
 * Document-wide comment cleanup: a comment contained (case-insensitively) in
 * a longer comment of another row is blanked; of identical comments only
 * the last occurrence is kept.
 */
export function dedupeCommentsAcrossRows(comments: readonly string[]): string[] {
  const lowered = comments.map((c) => c.toLowerCase());

  return comments.map((comment, i) => {
    if (!comment) return comment;
    const covered = lowered.some(
      (other, j) =>
        j !== i &&
        other !== '' &&
        other.includes(lowered[i]) &&
        (comment.length < other.length || (comment.length === other.length && j > i))
    );
    return covered ? '' : comment;
  });
}

export function sequenceRecords(
  records: readonly CanonicalRecord[],
  options: SequenceOptions = {}
): readonly OutputRow[] {
  const ordered = [...records].sort(
    (a, b) => a.firstSeenChunk - b.firstSeenChunk || a.sequence - b.sequence
  );

  let comments = ordered.map((record) => record.comments.join(COMMENT_SEPARATOR));
  if (options.dedupeCommentsAcrossKeys) {
    comments = dedupeCommentsAcrossRows(comments);
  }

  const rows = ordered.map((record, i): OutputRow => {
    const row: OutputRow = {
      srNo: i + 1,
      key: record.key,
      value: record.value,
      comments: comments[i],
      conflict: record.conflict,
      ...(record.conflictsWith !== undefined ? { conflictsWith: record.conflictsWith } : {}),
    };
    return Object.freeze(row);
  });

  return Object.freeze(rows);
}
