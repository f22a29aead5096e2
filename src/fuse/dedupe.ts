/**
 * Run-scoped deduplication of canonical records
 */

import { normalizeWhitespace } from '../util/address.js';
import type { CanonicalRecord } from '../types.js';

/**
 * Identity key: lowercase, whitespace-collapsed "name|address". Records with
 * neither a name nor an address have an empty key and never collide.
 */
export function dedupKey(record: Pick<CanonicalRecord, 'name' | 'address'>): string {
  if (!record.name.trim() && !record.address.trim()) {
    return '';
  }
  return normalizeWhitespace(`${record.name}|${record.address}`.trim().toLowerCase());
}

/**
 * Mutable set of keys already admitted during a run
 */
export class DedupContext {
  private seen: Set<string>;

  constructor(seed: Iterable<string> = []) {
    this.seen = new Set(seed);
  }

  has(key: string): boolean {
    return this.seen.has(key);
  }

  add(key: string): void {
    this.seen.add(key);
  }

  get size(): number {
    return this.seen.size;
  }
}

/**
 * First-seen wins: a record whose key was already admitted is discarded,
 * whatever its completeness, confidence or source.
 */
export function admit(record: CanonicalRecord, context: DedupContext): boolean {
  const key = dedupKey(record);
  if (!key) {
    return true;
  }
  if (context.has(key)) {
    return false;
  }
  context.add(key);
  return true;
}

export function dedupe(records: Iterable<CanonicalRecord>, context: DedupContext): CanonicalRecord[] {
  const kept: CanonicalRecord[] = [];
  for (const record of records) {
    if (admit(record, context)) {
      kept.push(record);
    }
  }
  return kept;
}
