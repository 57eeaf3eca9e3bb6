/**
 * @fileoverview Quality scorer.
 *
 * Evaluates a DataEntry against an ordered list of criterion names and records
 * the outcome. Each criterion is all-or-nothing; the aggregate score is the
 * share of passing criteria as a percentage.
 *
 * @packageDocumentation
 */

import { ValidationError } from '../core/errors.js';
import type { RecordStore } from '../store/record_store.js';
import { logInfo, logWarning } from '../telemetry/logger.js';
import {
  DATA_ENTRY_FIELDS,
  type CriterionOutcome,
  type DataEntry,
  type DataEntryField,
  type QualityCheckResult,
} from '../types.js';
import { percentage } from '../utils/math.js';
import {
  DEFAULT_REQUIRED_FIELDS,
  createCriterionRegistry,
  type CriterionRegistry,
} from './criteria.js';

export interface QualityCheckOptions {
  /** Where criterion names are resolved; defaults to the built-ins. */
  registry?: CriterionRegistry;
  /** Fields `completeness` requires; defaults to id, category, confidence. */
  requiredFields?: readonly DataEntryField[];
}

const defaultRegistry = createCriterionRegistry();

type MutableEntry = { -readonly [K in DataEntryField]?: DataEntry[K] };

function copyField<K extends DataEntryField>(target: MutableEntry, source: DataEntry, key: K): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/**
 * Copy only the DataEntry fields, so extra properties on the caller's object
 * never leak into the recorded result.
 */
function snapshotEntry(entry: DataEntry): DataEntry {
  const snapshot: MutableEntry = {};
  for (const field of DATA_ENTRY_FIELDS) copyField(snapshot, entry, field);
  return snapshot;
}

export function evaluateCriteria(
  entry: DataEntry,
  criteria: readonly string[],
  options: QualityCheckOptions = {},
): CriterionOutcome[] {
  const registry = options.registry ?? defaultRegistry;
  const context = { requiredFields: options.requiredFields ?? DEFAULT_REQUIRED_FIELDS };

  return criteria.map((criterion) => {
    const definition = registry.get(criterion);
    if (!definition) {
      logWarning(`Unknown quality criterion '${criterion}' counted as failed`, {
        known: registry.names(),
      });
      return { criterion, passed: false, feedback: `✗ Unknown criterion '${criterion}'` };
    }
    const verdict = definition.evaluate(entry, context);
    return { criterion, passed: verdict.passed, feedback: verdict.feedback };
  });
}

export function qualityCheck(
  store: RecordStore,
  entry: DataEntry,
  criteria: readonly string[],
  options: QualityCheckOptions = {},
): QualityCheckResult {
  if (criteria.length === 0) {
    throw new ValidationError('criteria', 'at least one criterion', 'an empty list');
  }

  const outcomes = evaluateCriteria(entry, criteria, options);
  const passedCount = outcomes.filter((outcome) => outcome.passed).length;
  const score = percentage(passedCount, criteria.length);

  const result = store.appendQualityCheck({
    entry: snapshotEntry(entry),
    criteria,
    outcomes,
    passedCount,
    score,
    timestamp: store.now(),
  });

  logInfo(`Quality score: ${passedCount}/${criteria.length} (${score.toFixed(2)}%)`);
  return result;
}
