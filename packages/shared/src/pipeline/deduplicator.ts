/**
 * Deduplicator
 *
 * Folds ExtractedRecords into CanonicalRecords keyed by normalized key.
 * Records must be added in chunk order; the first observation of a key
 * fixes its display spelling and its position.
 *
 * Same key, same value identity: the duplicate is dropped and its comment
 * merged. Same key, different value: kept as a conflict variant.
 *
 * Comment merging scans the existing set on every insertion, so a document
 * with n comments for one key costs O(n^2). Forms and reports stay far below
 * the size where that matters.
 */

import type { CanonicalRecord, ExtractedRecord } from '../types';
import { logger } from '../logger';
import { normalizeKey, normalizeWhitespace, valueIdentity } from './value-normalization';

export type MergeOutcome = 'created' | 'merged' | 'conflict';

export interface MergeResult {
  outcome: MergeOutcome;
  record: CanonicalRecord;
}

/**
 * Add a comment to an ordered comment set, keeping only the most complete
 * wording: a comment already contained in another is dropped, and comments
 * contained in the new one are replaced by it at the earliest of their
 * positions.
 */
export function mergeComment(comments: readonly string[], incoming: string): string[] {
  const comment = normalizeWhitespace(incoming);
  if (!comment) return [...comments];
  if (comments.some((existing) => existing.includes(comment))) return [...comments];

  const merged: string[] = [];
  let inserted = false;
  for (const existing of comments) {
    if (comment.includes(existing)) {
      if (!inserted) {
        merged.push(comment);
        inserted = true;
      }
      continue;
    }
    merged.push(existing);
  }
  if (!inserted) merged.push(comment);
  return merged;
}

function snapshot(record: CanonicalRecord): CanonicalRecord {
  return { ...record, comments: [...record.comments] };
}

export class Deduplicator {
  /** Per normalized key: the primary record first, then conflict variants */
  private readonly variantsByKey = new Map<string, CanonicalRecord[]>();
  private nextSequence = 0;
  private conflicts = 0;

  add(record: ExtractedRecord): MergeResult {
    const normalizedKey = normalizeKey(record.key);
    const identity = valueIdentity(record.value);
    const variants = this.variantsByKey.get(normalizedKey);

    if (!variants) {
      const created = this.create(record, normalizedKey, identity);
      this.variantsByKey.set(normalizedKey, [created]);
      return { outcome: 'created', record: snapshot(created) };
    }

    const match = variants.find((variant) => variant.valueIdentity === identity);
    if (match) {
      match.comments = mergeComment(match.comments, record.comment);
      return { outcome: 'merged', record: snapshot(match) };
    }

    const primary = variants[0];
    const variant = this.create(record, normalizedKey, identity);
    variant.conflict = true;
    variant.conflictsWith = primary.value;
    variants.push(variant);
    this.conflicts++;

    logger.info('Conflicting value for existing key', {
      key: primary.key,
      first_value: primary.value,
      conflicting_value: record.value,
      chunk_index: record.sourceChunkIndex,
    });

    return { outcome: 'conflict', record: snapshot(variant) };
  }

  addAll(records: readonly ExtractedRecord[]): MergeResult[] {
    return records.map((record) => this.add(record));
  }

  /** All canonical records and conflict variants, in first-observation order */
  records(): CanonicalRecord[] {
    return [...this.variantsByKey.values()]
      .flat()
      .sort((a, b) => a.sequence - b.sequence)
      .map(snapshot);
  }

  get size(): number {
    return this.nextSequence;
  }

  get conflictCount(): number {
    return this.conflicts;
  }

  private create(record: ExtractedRecord, normalizedKey: string, identity: string): CanonicalRecord {
    return {
      normalizedKey,
      key: normalizeWhitespace(record.key),
      value: record.value,
      valueIdentity: identity,
      comments: mergeComment([], record.comment),
      firstSeenChunk: record.sourceChunkIndex,
      sequence: this.nextSequence++,
      conflict: false,
    };
  }
}
