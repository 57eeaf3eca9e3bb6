/**
 * @fileoverview Pairwise comparison log.
 *
 * The decision is made by the caller (a human rater or an automated judge);
 * this module only validates and timestamps it.
 */

import { z } from 'zod';
import { parseOrThrow } from '../core/validation.js';
import type { RecordStore } from '../store/record_store.js';
import { logInfo } from '../telemetry/logger.js';
import type { ComparisonInput, ComparisonResult } from '../types.js';

const ComparisonDecisionSchema = z.object({
  criterion: z
    .string({ required_error: 'a non-empty criterion', invalid_type_error: 'a non-empty criterion' })
    .refine((value) => value.trim().length > 0, 'a non-empty criterion'),
  winner: z.enum(['A', 'B', 'tie'], {
    errorMap: () => ({ message: "one of 'A', 'B', 'tie'" }),
  }),
});

export function pairwiseComparison(store: RecordStore, input: ComparisonInput): ComparisonResult {
  const { criterion, winner } = parseOrThrow(ComparisonDecisionSchema, input, 'comparison');

  const result = store.appendComparison({
    itemA: input.itemA,
    itemB: input.itemB,
    criterion,
    winner,
    timestamp: store.now(),
  });

  logInfo(
    winner === 'tie'
      ? `Comparison on '${criterion}': tie`
      : `Comparison on '${criterion}': item ${winner} preferred`,
  );
  return result;
}
