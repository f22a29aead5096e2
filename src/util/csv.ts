/**
 * CSV export utilities
 */

import { stringify } from 'csv-stringify';

export interface CsvExportOptions {
  headers?: boolean;
  delimiter?: string;
  quote?: string;
}

/**
 * Convert an array of flat objects to CSV, columns in the given order
 */
export async function objectsToCSV<T extends object>(
  objects: T[],
  columns: readonly (keyof T & string)[],
  options: CsvExportOptions = {}
): Promise<string> {
  const {
    headers = true,
    delimiter = ',',
    quote = '"',
  } = options;

  return new Promise((resolve, reject) => {
    stringify(objects, {
      header: headers,
      columns: [...columns],
      delimiter,
      quote,
    }, (err, output) => {
      if (err) {
        reject(err);
      } else {
        resolve(output);
      }
    });
  });
}
