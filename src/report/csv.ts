/**
 * @fileoverview Annotation CSV export and import.
 *
 * Fixed column order `id,category,confidence,notes,timestamp`, `\n` line
 * endings. Fields containing a comma, double quote, CR or LF are quoted, with
 * inner quotes doubled.
 */

import { ValidationError, describeValue } from '../core/errors.js';
import type { Annotation } from '../types.js';

export const CSV_COLUMNS = ['id', 'category', 'confidence', 'notes', 'timestamp'] as const;

export type CsvColumn = (typeof CSV_COLUMNS)[number];

const NEEDS_QUOTING = /[",\r\n]/;

export function escapeCsvField(value: string): string {
  if (!NEEDS_QUOTING.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

export function toCsv(annotations: readonly Annotation[]): string {
  const rows = annotations.map((annotation) =>
    CSV_COLUMNS.map((column) => escapeCsvField(String(annotation[column]))).join(','),
  );
  return [CSV_COLUMNS.join(','), ...rows].join('\n') + '\n';
}

/**
 * Split CSV text into rows of fields. Accepts `\n` and `\r\n` line endings and
 * quoted fields spanning lines. A trailing newline does not produce an empty
 * row.
 */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  let i = 0;

  while (i < text.length) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i += 1;
        continue;
      }
      field += char;
      i += 1;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
      if (char === '\r' && text[i + 1] === '\n') i += 1;
    } else {
      field += char;
    }
    i += 1;
  }

  if (inQuotes) {
    throw new ValidationError('csv', 'closed quoted field', 'end of input inside quotes');
  }
  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}

export interface CsvAnnotationRow {
  id: string;
  category: string;
  confidence: number;
  notes: string;
  timestamp: string;
}

/**
 * Read CSV written by `toCsv` back into annotation rows. The header must match
 * the export column order exactly.
 */
export function parseAnnotationsCsv(text: string): CsvAnnotationRow[] {
  const [header, ...rows] = parseCsv(text);
  if (!header || header.join(',') !== CSV_COLUMNS.join(',')) {
    throw new ValidationError('csv.header', CSV_COLUMNS.join(','), describeValue(header?.join(',')));
  }

  return rows.map((fields, index) => {
    const line = index + 2;
    if (fields.length !== CSV_COLUMNS.length) {
      throw new ValidationError(`csv.row[${line}]`, `${CSV_COLUMNS.length} fields`, `${fields.length}`);
    }
    const [id = '', category = '', confidenceText = '', notes = '', timestamp = ''] = fields;
    const confidence = Number(confidenceText);
    if (confidenceText.trim() === '' || !Number.isFinite(confidence)) {
      throw new ValidationError(`csv.row[${line}].confidence`, 'a number', describeValue(confidenceText));
    }
    return { id, category, confidence, notes, timestamp };
  });
}
