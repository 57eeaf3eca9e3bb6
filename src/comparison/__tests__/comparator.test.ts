import { describe, it, expect, beforeEach } from 'vitest';
import { createSteppingClock } from '../../core/clock.js';
import { ValidationError } from '../../core/errors.js';
import { RecordStore } from '../../store/record_store.js';
import { pairwiseComparison } from '../comparator.js';
import type { ComparisonInput } from '../../types.js';

describe('pairwiseComparison', () => {
  let store: RecordStore;

  beforeEach(() => {
    store = new RecordStore({ clock: createSteppingClock(new Date('2025-06-02T09:00:00.000Z')) });
  });

  it('records the caller decision with a timestamp', () => {
    const result = pairwiseComparison(store, {
      itemA: 'Annotation with detailed notes',
      itemB: 'Annotation with minimal notes',
      criterion: 'completeness',
      winner: 'A',
    });

    expect(result).toEqual({
      itemA: 'Annotation with detailed notes',
      itemB: 'Annotation with minimal notes',
      criterion: 'completeness',
      winner: 'A',
      timestamp: '2025-06-02T09:00:00.000Z',
    });
    expect(store.comparisons).toEqual([result]);
  });

  it('accepts structured items and ties', () => {
    const result = pairwiseComparison(store, {
      itemA: { id: 'IMG_001', labels: ['vehicle'] },
      itemB: { id: 'IMG_005', labels: ['vehicle', 'truck'] },
      criterion: 'specificity',
      winner: 'tie',
    });

    expect(result.winner).toBe('tie');
    expect(result.itemB).toEqual({ id: 'IMG_005', labels: ['vehicle', 'truck'] });
  });

  it('stores a frozen copy of structured items', () => {
    const item = { id: 'IMG_001', labels: ['vehicle'] };
    pairwiseComparison(store, { itemA: item, itemB: 'other', criterion: 'specificity', winner: 'A' });

    item.labels.push('truck');
    const stored = store.comparisons[0];

    expect(stored?.itemA).toEqual({ id: 'IMG_001', labels: ['vehicle'] });
    expect(Object.isFrozen(stored?.itemA)).toBe(true);
    const labels: unknown = Reflect.get(Object(stored?.itemA), 'labels');
    expect(Object.isFrozen(labels)).toBe(true);
  });

  it('rejects an empty criterion', () => {
    expect(() =>
      pairwiseComparison(store, { itemA: 'a', itemB: 'b', criterion: '  ', winner: 'B' }),
    ).toThrow('Validation failed for criterion: expected a non-empty criterion, got "  "');
    expect(store.comparisons).toHaveLength(0);
  });

  it('rejects a winner outside A, B, tie', () => {
    const input: unknown = { itemA: 'a', itemB: 'b', criterion: 'quality', winner: 'C' };
    expect(() => pairwiseComparison(store, input as ComparisonInput)).toThrow(ValidationError);
  });
});
