/**
 * @fileoverview Summary Command
 *
 * Loads a previously written annotation report, validates it and prints its
 * summary.
 *
 * Usage: labelbook summary <report.json> [--json]
 */

import * as path from 'node:path';
import { readReport } from '../../report/schema.js';
import type { ReportSummary } from '../../types.js';
import { createError } from '../errors.js';
import { formatPercent, printKeyValue, printTable } from '../output.js';

export interface SummaryCommandOptions {
  args: string[];
  cwd?: string;
  json?: boolean;
}

export function summaryCommand(options: SummaryCommandOptions): ReportSummary {
  const target = options.args[0];
  if (!target) {
    throw createError('INVALID_ARGUMENT', 'summary requires a report file path');
  }

  const report = readReport(path.resolve(options.cwd ?? process.cwd(), target));
  const { summary } = report;

  if (options.json) {
    console.log(JSON.stringify(summary, null, 2));
    return summary;
  }

  console.log('Annotation Report Summary');
  console.log('=========================\n');
  printKeyValue([
    { key: 'Generated At', value: summary.generatedAt },
    { key: 'Annotations', value: summary.totalAnnotations },
    { key: 'Quality Checks', value: summary.totalQualityChecks },
    { key: 'Comparisons', value: summary.totalComparisons },
    { key: 'Average Quality Score', value: formatPercent(summary.averageQualityScore) },
  ]);

  const categories = Object.entries(summary.categoryCounts);
  if (categories.length > 0) {
    console.log();
    printTable(['category', 'count'], categories.map(([category, count]) => [category, String(count)]));
  }

  return summary;
}
