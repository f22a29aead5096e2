/**
 * Output rows for discovered venues (CSV or JSON Lines)
 */

import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { objectsToCSV } from '../util/csv.js';
import { confidenceTag } from '../score/confidence.js';
import { SOURCE_DISPLAY_NAMES, type CanonicalRecord, type OutputRow } from '../types.js';

export type OutputFormat = 'csv' | 'jsonl';

export const OUTPUT_COLUMNS = [
  'name',
  'full_address',
  'description',
  'tags',
  'opening_date',
  'source',
  'last_modified',
] as const satisfies readonly (keyof OutputRow)[];

/**
 * Flatten a record; tags are sorted, ";"-joined and include the confidence tier
 */
export function toOutputRow(record: CanonicalRecord): OutputRow {
  const tags = new Set(record.tags);
  tags.add(confidenceTag(record.confidence));

  return {
    name: record.name,
    full_address: record.address,
    description: record.description,
    tags: [...tags].sort().join(';'),
    opening_date: record.openingDate ?? '',
    source: SOURCE_DISPLAY_NAMES[record.source],
    last_modified: record.lastModified ?? '',
  };
}

export function toJsonLines(rows: readonly OutputRow[]): string {
  return rows.map(row => JSON.stringify(row)).join('\n') + (rows.length > 0 ? '\n' : '');
}

export async function renderRows(records: readonly CanonicalRecord[], format: OutputFormat): Promise<string> {
  const rows = records.map(toOutputRow);
  if (format === 'jsonl') {
    return toJsonLines(rows);
  }
  return objectsToCSV(rows, OUTPUT_COLUMNS);
}

export async function writeOutput(
  path: string,
  records: readonly CanonicalRecord[],
  format: OutputFormat
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, await renderRows(records, format), 'utf-8');
}
