/**
 * @fileoverview Tests for image annotation
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createSteppingClock } from '../../core/clock.js';
import { ValidationError } from '../../core/errors.js';
import { RecordStore } from '../../store/record_store.js';
import { setLogLevel } from '../../telemetry/logger.js';
import { annotateImage } from '../annotate.js';
import type { AnnotationInput } from '../../types.js';

describe('annotateImage', () => {
  let store: RecordStore;

  beforeEach(() => {
    store = new RecordStore({ clock: createSteppingClock(new Date('2025-06-01T12:00:00.000Z')) });
  });

  it.each([1, 2, 3, 4, 5])('stores confidence %i unchanged', (confidence) => {
    const annotation = annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence });

    expect(annotation.confidence).toBe(confidence);
    expect(store.annotations).toHaveLength(1);
  });

  it('returns the stored record with defaults filled in', () => {
    const annotation = annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence: 5 });

    expect(annotation).toEqual({
      id: 'IMG_001',
      category: 'vehicle',
      confidence: 5,
      notes: '',
      timestamp: '2025-06-01T12:00:00.000Z',
    });
    expect(store.annotations[0]).toBe(annotation);
  });

  it('keeps notes verbatim, commas and quotes included', () => {
    const notes = 'Truck, side view, "partially" occluded';
    const annotation = annotateImage(store, { id: 'IMG_005', category: 'vehicle', confidence: 4, notes });

    expect(annotation.notes).toBe(notes);
  });

  it('gives successive annotations non-decreasing timestamps', () => {
    const first = annotateImage(store, { id: 'A', category: 'cat', confidence: 3 });
    const second = annotateImage(store, { id: 'B', category: 'dog', confidence: 3 });

    expect(second.timestamp > first.timestamp).toBe(true);
  });

  it.each([0, 6, -1, 2.5, Number.NaN])('rejects confidence %s', (confidence) => {
    expect(() => annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence })).toThrow(ValidationError);
    expect(store.annotations).toHaveLength(0);
  });

  it('names the field and value in the error', () => {
    try {
      annotateImage(store, { id: 'IMG_001', category: 'vehicle', confidence: 7 });
      expect.unreachable('annotateImage should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.field).toBe('confidence');
        expect(error.expected).toBe('an integer between 1 and 5');
        expect(error.received).toBe('7');
      }
    }
  });

  it('rejects a blank id or category', () => {
    expect(() => annotateImage(store, { id: '  ', category: 'vehicle', confidence: 3 })).toThrow(
      'Validation failed for id: expected a non-empty string item id, got "  "',
    );
    expect(() => annotateImage(store, { id: 'IMG_001', category: '', confidence: 3 })).toThrow(
      'Validation failed for category: expected a non-empty string category, got ""',
    );
  });

  it('rejects a category that cannot round-trip as a report key', () => {
    expect(() => annotateImage(store, { id: 'IMG_001', category: '__proto__', confidence: 3 })).toThrow(
      'Validation failed for category: expected a category other than __proto__, got "__proto__"',
    );
    expect(store.annotations).toHaveLength(0);
  });

  it('rejects a non-numeric confidence coming from untyped callers', () => {
    const input: unknown = { id: 'IMG_001', category: 'vehicle', confidence: '5' };
    const call = (value: unknown) => annotateImage(store, value as AnnotationInput);

    expect(() => call(input)).toThrow('expected an integer between 1 and 5, got "5"');
  });

  it('logs the annotation', () => {
    setLogLevel('info');
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    annotateImage(store, { id: 'IMG_002', category: 'person', confidence: 4 });

    expect(spy).toHaveBeenCalledWith("Annotated image IMG_002 as 'person' (confidence: 4/5)");
    spy.mockRestore();
  });
});
