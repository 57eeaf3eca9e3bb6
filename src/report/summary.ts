/**
 * @fileoverview Report assembly.
 *
 * Builds the summary and the full report object. Objects are created with
 * their keys in a fixed order and category maps are key-sorted, so the JSON
 * serialization is stable for the same records.
 */

import type { RecordStore } from '../store/record_store.js';
import type {
  Annotation,
  AnnotationReport,
  ComparisonResult,
  QualityCheckResult,
  ReportSummary,
} from '../types.js';
import { countSorted, mean, roundToHundredths } from '../utils/math.js';

export function buildSummary(store: RecordStore, generatedAt: string = store.now()): ReportSummary {
  const { annotations, qualityChecks, comparisons } = store;
  return {
    totalAnnotations: annotations.length,
    totalQualityChecks: qualityChecks.length,
    totalComparisons: comparisons.length,
    averageQualityScore: roundToHundredths(mean(qualityChecks.map((check) => check.score))),
    categoryCounts: countSorted(annotations.map((annotation) => annotation.category)),
    generatedAt,
  };
}

function orderAnnotation(a: Annotation): Annotation {
  return {
    id: a.id,
    category: a.category,
    confidence: a.confidence,
    notes: a.notes,
    timestamp: a.timestamp,
  };
}

function orderQualityCheck(q: QualityCheckResult): QualityCheckResult {
  return {
    entry: q.entry,
    criteria: q.criteria,
    outcomes: q.outcomes.map((o) => ({ criterion: o.criterion, passed: o.passed, feedback: o.feedback })),
    passedCount: q.passedCount,
    score: q.score,
    timestamp: q.timestamp,
  };
}

function orderComparison(c: ComparisonResult): ComparisonResult {
  return {
    itemA: c.itemA,
    itemB: c.itemB,
    criterion: c.criterion,
    winner: c.winner,
    timestamp: c.timestamp,
  };
}

/**
 * Snapshot of everything in the store. Never fails; an empty store yields
 * zero counts and empty record arrays.
 */
export function generateReport(store: RecordStore, generatedAt?: string): AnnotationReport {
  return {
    summary: buildSummary(store, generatedAt),
    records: {
      annotations: store.annotations.map(orderAnnotation),
      qualityChecks: store.qualityChecks.map(orderQualityCheck),
      comparisons: store.comparisons.map(orderComparison),
    },
  };
}
