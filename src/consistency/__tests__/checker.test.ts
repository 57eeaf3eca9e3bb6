/**
 * @fileoverview Tests for label consistency analysis
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { annotateImage } from '../../annotation/annotate.js';
import { RecordStore } from '../../store/record_store.js';
import { analyzeDistribution, consistencyCheck } from '../checker.js';

describe('consistencyCheck', () => {
  let store: RecordStore;

  beforeEach(() => {
    store = new RecordStore();
  });

  it('reports one inconsistency for an id labelled cat and dog', () => {
    annotateImage(store, { id: 'A', category: 'cat', confidence: 4 });
    annotateImage(store, { id: 'A', category: 'dog', confidence: 3 });

    expect(consistencyCheck(store)).toEqual([{ id: 'A', conflictingCategories: ['cat', 'dog'], occurrences: 2 }]);
  });

  it('ignores ids whose repeated labels agree', () => {
    annotateImage(store, { id: 'A', category: 'cat', confidence: 4 });
    annotateImage(store, { id: 'A', category: 'cat', confidence: 2 });
    annotateImage(store, { id: 'B', category: 'dog', confidence: 5 });

    expect(consistencyCheck(store)).toEqual([]);
  });

  it('counts every occurrence and lists distinct categories sorted', () => {
    annotateImage(store, { id: 'B', category: 'zebra', confidence: 3 });
    annotateImage(store, { id: 'A', category: 'dog', confidence: 3 });
    annotateImage(store, { id: 'B', category: 'horse', confidence: 3 });
    annotateImage(store, { id: 'A', category: 'cat', confidence: 3 });
    annotateImage(store, { id: 'B', category: 'zebra', confidence: 3 });

    expect(consistencyCheck(store)).toEqual([
      { id: 'B', conflictingCategories: ['horse', 'zebra'], occurrences: 3 },
      { id: 'A', conflictingCategories: ['cat', 'dog'], occurrences: 2 },
    ]);
  });

  it('treats category labels case-sensitively', () => {
    annotateImage(store, { id: 'A', category: 'Cat', confidence: 3 });
    annotateImage(store, { id: 'A', category: 'cat', confidence: 3 });

    expect(consistencyCheck(store)[0]?.conflictingCategories).toEqual(['Cat', 'cat']);
  });

  it('does not modify the store', () => {
    annotateImage(store, { id: 'A', category: 'cat', confidence: 4 });
    consistencyCheck(store);

    expect(store.size).toEqual({ annotations: 1, qualityChecks: 0, comparisons: 0 });
  });
});

describe('analyzeDistribution', () => {
  it('returns null below two annotations', () => {
    const store = new RecordStore();
    expect(analyzeDistribution(store)).toBeNull();
    annotateImage(store, { id: 'A', category: 'cat', confidence: 4 });
    expect(analyzeDistribution(store)).toBeNull();
  });

  it('summarizes the category spread', () => {
    const store = new RecordStore();
    annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence: 5 });
    annotateImage(store, { id: 'IMG_002', category: 'person', confidence: 4 });
    annotateImage(store, { id: 'IMG_003', category: 'vehicle', confidence: 4 });

    expect(analyzeDistribution(store)).toEqual({
      totalAnnotations: 3,
      uniqueCategories: 2,
      averageConfidence: 4.33,
      categoryDistribution: { person: 1, vehicle: 2 },
      diversityScore: 66.67,
    });
  });
});
