/**
 * @fileoverview Label consistency analysis.
 *
 * Read-only scans over a store's annotations: conflicting labels for the same
 * item id, and the overall category distribution.
 */

import type { RecordStore } from '../store/record_store.js';
import { logInfo } from '../telemetry/logger.js';
import type { DistributionReport, InconsistencyReport } from '../types.js';
import { countSorted, mean, percentage, roundToHundredths } from '../utils/math.js';

interface IdGroup {
  categories: Set<string>;
  occurrences: number;
}

/**
 * Report every id that was labelled with more than one distinct category.
 * Reports follow the order in which ids were first annotated.
 */
export function consistencyCheck(store: RecordStore): InconsistencyReport[] {
  const groups = new Map<string, IdGroup>();
  for (const annotation of store.iterateAnnotations()) {
    const group = groups.get(annotation.id) ?? { categories: new Set<string>(), occurrences: 0 };
    group.categories.add(annotation.category);
    group.occurrences += 1;
    groups.set(annotation.id, group);
  }

  const reports: InconsistencyReport[] = [];
  for (const [id, group] of groups) {
    if (group.categories.size > 1) {
      reports.push({
        id,
        conflictingCategories: [...group.categories].sort(),
        occurrences: group.occurrences,
      });
    }
  }

  logInfo(`Consistency check: ${reports.length} conflicting id(s) across ${groups.size} id(s)`);
  return reports;
}

/**
 * Category spread across all annotations. Needs at least two annotations to
 * say anything; returns null otherwise.
 */
export function analyzeDistribution(store: RecordStore): DistributionReport | null {
  const annotations = store.annotations;
  if (annotations.length < 2) {
    logInfo('Need at least 2 annotations for a distribution analysis');
    return null;
  }

  const categoryDistribution = countSorted(annotations.map((a) => a.category));
  const uniqueCategories = Object.keys(categoryDistribution).length;

  return {
    totalAnnotations: annotations.length,
    uniqueCategories,
    averageConfidence: roundToHundredths(mean(annotations.map((a) => a.confidence))),
    categoryDistribution,
    diversityScore: percentage(uniqueCategories, annotations.length),
  };
}
