/**
 * @fileoverview JSON report and CSV export to disk.
 *
 * @packageDocumentation
 */

import type { RecordStore } from '../store/record_store.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import type { AnnotationReport } from '../types.js';
import { toCsv } from './csv.js';
import { writeFileAtomic, type WriteResult } from './file_writer.js';
import { generateReport } from './summary.js';

export const DEFAULT_REPORT_FILE = 'annotation_report.json';
export const DEFAULT_CSV_FILE = 'annotations.csv';
export const DEFAULT_JSON_INDENT = 2;

export interface JsonWriteOptions {
  indent?: number;
}

export function serializeReport(report: AnnotationReport, options: JsonWriteOptions = {}): string {
  return JSON.stringify(report, null, options.indent ?? DEFAULT_JSON_INDENT) + '\n';
}

export function writeReport(
  report: AnnotationReport,
  outputPath: string,
  options: JsonWriteOptions = {},
): WriteResult {
  const written = writeFileAtomic(outputPath, serializeReport(report, options));
  logInfo(`Report saved to ${written.path}`);
  return written;
}

/**
 * Generate a report from the store and write it in one go.
 */
export function saveReport(
  store: RecordStore,
  outputPath: string = DEFAULT_REPORT_FILE,
  options: JsonWriteOptions = {},
): AnnotationReport {
  const report = generateReport(store);
  writeReport(report, outputPath, options);
  return report;
}

export function exportToCsv(store: RecordStore, outputPath: string = DEFAULT_CSV_FILE): WriteResult {
  if (store.annotations.length === 0) {
    logWarning('No annotations to export; writing header only', { path: outputPath });
  }
  const written = writeFileAtomic(outputPath, toCsv(store.annotations));
  logInfo(`Annotations exported to ${written.path}`, { rows: store.annotations.length });
  return written;
}
