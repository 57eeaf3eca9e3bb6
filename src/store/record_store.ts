/**
 * @fileoverview Append-only in-memory record store.
 *
 * Holds the three record sequences every labelbook operation reads from or
 * appends to. Records are frozen on the way in and the sequences are exposed
 * as read-only views; there is no update or delete.
 *
 * The store is not reentrant. Embedding it somewhere with concurrent writers
 * requires external mutual exclusion.
 *
 * @packageDocumentation
 */

import { createMonotonicClock, type Clock } from '../core/clock.js';
import type {
  Annotation,
  ComparisonResult,
  QualityCheckResult,
} from '../types.js';

/**
 * Freeze a value and everything reachable from it. Compared items are opaque
 * JSON supplied by the caller, so they are cloned first and frozen in place.
 */
function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export interface RecordStoreOptions {
  /** Timestamp source; defaults to a monotonic wall clock. */
  clock?: Clock;
}

export interface RecordStoreSize {
  annotations: number;
  qualityChecks: number;
  comparisons: number;
}

export class RecordStore {
  private readonly clock: Clock;
  private readonly annotationLog: Annotation[] = [];
  private readonly qualityLog: QualityCheckResult[] = [];
  private readonly comparisonLog: ComparisonResult[] = [];

  constructor(options: RecordStoreOptions = {}) {
    this.clock = options.clock ?? createMonotonicClock();
  }

  /**
   * Next timestamp for a record created against this store.
   */
  now(): string {
    return this.clock.now();
  }

  // ==========================================================================
  // APPEND
  // ==========================================================================

  appendAnnotation(annotation: Annotation): Annotation {
    const frozen = Object.freeze({ ...annotation });
    this.annotationLog.push(frozen);
    return frozen;
  }

  appendQualityCheck(result: QualityCheckResult): QualityCheckResult {
    const frozen = Object.freeze({
      ...result,
      entry: Object.freeze({ ...result.entry }),
      criteria: Object.freeze([...result.criteria]),
      outcomes: Object.freeze(result.outcomes.map((outcome) => Object.freeze({ ...outcome }))),
    });
    this.qualityLog.push(frozen);
    return frozen;
  }

  appendComparison(result: ComparisonResult): ComparisonResult {
    const frozen = Object.freeze({
      ...result,
      itemA: deepFreeze(structuredClone(result.itemA)),
      itemB: deepFreeze(structuredClone(result.itemB)),
    });
    this.comparisonLog.push(frozen);
    return frozen;
  }

  // ==========================================================================
  // READ
  // ==========================================================================

  get annotations(): readonly Annotation[] {
    return this.annotationLog;
  }

  get qualityChecks(): readonly QualityCheckResult[] {
    return this.qualityLog;
  }

  get comparisons(): readonly ComparisonResult[] {
    return this.comparisonLog;
  }

  *iterateAnnotations(): IterableIterator<Annotation> {
    yield* this.annotationLog;
  }

  findAnnotations(id: string): Annotation[] {
    return this.annotationLog.filter((annotation) => annotation.id === id);
  }

  get size(): RecordStoreSize {
    return {
      annotations: this.annotationLog.length,
      qualityChecks: this.qualityLog.length,
      comparisons: this.comparisonLog.length,
    };
  }
}
