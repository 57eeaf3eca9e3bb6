/**
 * @fileoverview AnnotationWorkbench
 *
 * Owns one RecordStore and exposes every labelbook operation as a method, so a
 * caller working on a single labelling session does not have to thread the
 * store through each call. Workbenches are independent of each other.
 *
 * @example
 * ```typescript
 * const bench = new AnnotationWorkbench();
 * const entry = bench.annotateImage({ id: 'IMG_001', category: 'vehicle', confidence: 5 });
 * bench.qualityCheck(entry, ['completeness']).score; // 100
 * bench.exportToCsv('out/annotations.csv');
 * ```
 */

import { annotateImage } from './annotation/annotate.js';
import { pairwiseComparison } from './comparison/comparator.js';
import { analyzeDistribution, consistencyCheck } from './consistency/checker.js';
import type { Clock } from './core/clock.js';
import type { CriterionRegistry } from './quality/criteria.js';
import { qualityCheck } from './quality/scorer.js';
import { exportToCsv, saveReport } from './report/export.js';
import type { WriteResult } from './report/file_writer.js';
import { generateReport } from './report/summary.js';
import { RecordStore } from './store/record_store.js';
import type {
  Annotation,
  AnnotationInput,
  AnnotationReport,
  ComparisonInput,
  ComparisonResult,
  DataEntry,
  DataEntryField,
  DistributionReport,
  InconsistencyReport,
  QualityCheckResult,
} from './types.js';

export interface WorkbenchOptions {
  clock?: Clock;
  registry?: CriterionRegistry;
  /** Fields the completeness criterion requires. */
  requiredFields?: readonly DataEntryField[];
  /** Indentation of saved JSON reports. */
  jsonIndent?: number;
}

export class AnnotationWorkbench {
  readonly store: RecordStore;
  private readonly options: WorkbenchOptions;

  constructor(options: WorkbenchOptions = {}) {
    this.store = new RecordStore({ clock: options.clock });
    this.options = options;
  }

  annotateImage(input: AnnotationInput): Annotation {
    return annotateImage(this.store, input);
  }

  qualityCheck(entry: DataEntry, criteria: readonly string[]): QualityCheckResult {
    return qualityCheck(this.store, entry, criteria, {
      registry: this.options.registry,
      requiredFields: this.options.requiredFields,
    });
  }

  pairwiseComparison(input: ComparisonInput): ComparisonResult {
    return pairwiseComparison(this.store, input);
  }

  consistencyCheck(): InconsistencyReport[] {
    return consistencyCheck(this.store);
  }

  analyzeDistribution(): DistributionReport | null {
    return analyzeDistribution(this.store);
  }

  generateReport(): AnnotationReport {
    return generateReport(this.store);
  }

  saveReport(outputPath?: string): AnnotationReport {
    return saveReport(this.store, outputPath, { indent: this.options.jsonIndent });
  }

  exportToCsv(outputPath?: string): WriteResult {
    return exportToCsv(this.store, outputPath);
  }
}
