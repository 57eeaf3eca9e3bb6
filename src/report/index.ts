/**
 * @fileoverview Report Module
 *
 * Summary statistics, the JSON report and the annotation CSV.
 */

export { buildSummary, generateReport } from './summary.js';

export {
  DEFAULT_CSV_FILE,
  DEFAULT_JSON_INDENT,
  DEFAULT_REPORT_FILE,
  exportToCsv,
  saveReport,
  serializeReport,
  writeReport,
  type JsonWriteOptions,
} from './export.js';

export {
  CSV_COLUMNS,
  escapeCsvField,
  parseAnnotationsCsv,
  parseCsv,
  toCsv,
  type CsvAnnotationRow,
  type CsvColumn,
} from './csv.js';

export { AnnotationReportSchema, parseReport, readReport } from './schema.js';

export { writeFileAtomic, type WriteResult } from './file_writer.js';
