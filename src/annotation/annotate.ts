/**
 * @fileoverview Image annotation.
 *
 * Records a category label with a 1-5 confidence for an item id. Input is
 * validated before anything is appended, so a rejected call leaves the store
 * untouched.
 */

import { z } from 'zod';
import { parseOrThrow } from '../core/validation.js';
import type { RecordStore } from '../store/record_store.js';
import { logInfo } from '../telemetry/logger.js';
import {
  MAX_CONFIDENCE,
  MIN_CONFIDENCE,
  type Annotation,
  type AnnotationInput,
} from '../types.js';

const CONFIDENCE_EXPECTATION = `an integer between ${MIN_CONFIDENCE} and ${MAX_CONFIDENCE}`;

function nonEmptyString(what: string) {
  const expectation = `a non-empty string ${what}`;
  return z
    .string({ required_error: expectation, invalid_type_error: expectation })
    .refine((value) => value.trim().length > 0, expectation);
}

export const AnnotationInputSchema = z.object({
  id: nonEmptyString('item id'),
  // Categories become keys of the report's count records, where this name
  // cannot be read back as an own key.
  category: nonEmptyString('category').refine(
    (value) => value !== '__proto__',
    'a category other than __proto__',
  ),
  confidence: z
    .number({ required_error: CONFIDENCE_EXPECTATION, invalid_type_error: CONFIDENCE_EXPECTATION })
    .int(CONFIDENCE_EXPECTATION)
    .min(MIN_CONFIDENCE, CONFIDENCE_EXPECTATION)
    .max(MAX_CONFIDENCE, CONFIDENCE_EXPECTATION),
  notes: z.string({ invalid_type_error: 'a string' }).optional(),
});

export function annotateImage(store: RecordStore, input: AnnotationInput): Annotation {
  const { id, category, confidence, notes } = parseOrThrow(AnnotationInputSchema, input, 'annotation');

  const annotation = store.appendAnnotation({
    id,
    category,
    confidence,
    notes: notes ?? '',
    timestamp: store.now(),
  });

  logInfo(`Annotated image ${id} as '${category}' (confidence: ${confidence}/${MAX_CONFIDENCE})`);
  return annotation;
}
