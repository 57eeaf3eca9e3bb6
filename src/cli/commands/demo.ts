/**
 * @fileoverview Demo Command
 *
 * Walks through a complete labelling session: annotate five images, score the
 * first three, record two pairwise decisions, check consistency, then write
 * the JSON report and the CSV.
 *
 * Usage: labelbook demo [--out <dir>] [--config <file>] [--quiet]
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { Clock } from '../../core/clock.js';
import { unwrap } from '../../core/result.js';
import { csvPath, loadConfig, reportPath, type LabelbookConfig } from '../../config/index.js';
import { setLogLevel } from '../../telemetry/logger.js';
import type {
  AnnotationInput,
  AnnotationReport,
  ComparisonInput,
  DistributionReport,
  InconsistencyReport,
} from '../../types.js';
import { AnnotationWorkbench } from '../../workbench.js';
import { formatPercent, printBanner, printKeyValue, printTable } from '../output.js';

export const DEMO_ANNOTATIONS: readonly AnnotationInput[] = [
  { id: 'IMG_001', category: 'vehicle', confidence: 5, notes: 'Sedan, front three-quarter view' },
  { id: 'IMG_002', category: 'person', confidence: 4, notes: 'Pedestrian, even lighting' },
  { id: 'IMG_003', category: 'animal', confidence: 5, notes: 'Dog in the foreground' },
  { id: 'IMG_004', category: 'building', confidence: 4, notes: 'Office block, slight motion blur' },
  { id: 'IMG_005', category: 'vehicle', confidence: 5, notes: 'Truck, side view' },
];

export const DEMO_COMPARISONS: readonly ComparisonInput[] = [
  {
    itemA: 'Annotation with detailed notes',
    itemB: 'Annotation with minimal notes',
    criterion: 'completeness',
    winner: 'A',
  },
  {
    itemA: 'High confidence classification',
    itemB: 'Low confidence classification',
    criterion: 'reliability',
    winner: 'A',
  },
];

export interface DemoCommandOptions {
  /** Output directory; overrides `output.dir` from config. */
  out?: string;
  configPath?: string;
  cwd?: string;
  quiet?: boolean;
  clock?: Clock;
}

export interface DemoResult {
  report: AnnotationReport;
  reportFile: string;
  csvFile: string;
  inconsistencies: InconsistencyReport[];
  distribution: DistributionReport | null;
}

function resolveOutputPaths(config: LabelbookConfig, options: DemoCommandOptions): { report: string; csv: string } {
  const cwd = options.cwd ?? process.cwd();
  if (options.out === undefined) {
    return { report: reportPath(config, cwd), csv: csvPath(config, cwd) };
  }
  const dir = path.resolve(cwd, options.out);
  return {
    report: path.join(dir, config.output.reportFile),
    csv: path.join(dir, config.output.csvFile),
  };
}

export function demoCommand(options: DemoCommandOptions = {}): DemoResult {
  const config = unwrap(loadConfig({ configPath: options.configPath, cwd: options.cwd }));
  setLogLevel(options.quiet ? 'silent' : config.logLevel);

  const bench = new AnnotationWorkbench({
    clock: options.clock,
    requiredFields: config.quality.requiredFields,
    jsonIndent: config.output.jsonIndent,
  });

  printBanner('DATA ANNOTATION & QUALITY ASSESSMENT DEMO');

  const annotations = DEMO_ANNOTATIONS.map((input) => bench.annotateImage(input));
  console.log(`\nAnnotated ${annotations.length} images`);

  console.log('\nQuality checks:');
  for (const annotation of annotations.slice(0, 3)) {
    const result = bench.qualityCheck(annotation, config.quality.defaultCriteria);
    console.log(`  ${annotation.id}: ${result.passedCount}/${result.criteria.length} (${formatPercent(result.score)})`);
  }

  console.log('\nPairwise comparisons:');
  for (const input of DEMO_COMPARISONS) {
    const result = bench.pairwiseComparison(input);
    console.log(`  ${result.criterion}: ${result.winner === 'tie' ? 'tie' : `item ${result.winner} preferred`}`);
  }

  const inconsistencies = bench.consistencyCheck();
  const distribution = bench.analyzeDistribution();

  console.log('\nConsistency:');
  if (inconsistencies.length === 0) {
    console.log('  No conflicting labels');
  } else {
    printTable(
      ['id', 'categories', 'occurrences'],
      inconsistencies.map((r) => [r.id, r.conflictingCategories.join('/'), String(r.occurrences)]),
    );
  }
  if (distribution) {
    printKeyValue([
      { key: 'Unique Categories', value: distribution.uniqueCategories },
      { key: 'Average Confidence', value: `${distribution.averageConfidence.toFixed(2)}/5` },
      { key: 'Diversity Score', value: formatPercent(distribution.diversityScore) },
    ]);
  }

  const paths = resolveOutputPaths(config, options);
  const report = bench.saveReport(paths.report);
  bench.exportToCsv(paths.csv);

  console.log();
  printBanner('SUMMARY STATISTICS');
  printKeyValue([
    { key: 'Total Annotations', value: report.summary.totalAnnotations },
    { key: 'Quality Checks Performed', value: report.summary.totalQualityChecks },
    { key: 'Comparisons Completed', value: report.summary.totalComparisons },
    { key: 'Average Quality Score', value: formatPercent(report.summary.averageQualityScore) },
    { key: 'Report', value: paths.report },
    { key: 'CSV', value: paths.csv },
  ]);

  return {
    report,
    reportFile: paths.report,
    csvFile: paths.csv,
    inconsistencies,
    distribution,
  };
}
