/**
 * @fileoverview Zod schema for annotation report files.
 *
 * Used when a report written earlier is loaded back, e.g. by
 * `labelbook summary`.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { IOError, ValidationError, getErrorMessage, toError } from '../core/errors.js';
import { parseOrThrow } from '../core/validation.js';
import type { AnnotationReport, JsonValue } from '../types.js';

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const AnnotationSchema = z.object({
  id: z.string(),
  category: z.string(),
  confidence: z.number().int().min(1).max(5),
  notes: z.string(),
  timestamp: z.string(),
});

// Scored entries may carry a non-finite confidence, which JSON writes as null.
const DataEntrySchema = z.object({
  id: z.string().optional(),
  category: z.string().optional(),
  confidence: z
    .number()
    .nullable()
    .optional()
    .transform((value) => (value === null ? Number.NaN : value)),
  notes: z.string().optional(),
  timestamp: z.string().optional(),
});

const QualityCheckSchema = z.object({
  entry: DataEntrySchema,
  criteria: z.array(z.string()).min(1),
  outcomes: z.array(
    z.object({
      criterion: z.string(),
      passed: z.boolean(),
      feedback: z.string(),
    }),
  ),
  passedCount: z.number().int().min(0),
  score: z.number().min(0).max(100),
  timestamp: z.string(),
});

const ComparisonSchema = z.object({
  itemA: JsonValueSchema,
  itemB: JsonValueSchema,
  criterion: z.string().min(1),
  winner: z.enum(['A', 'B', 'tie']),
  timestamp: z.string(),
});

export const AnnotationReportSchema = z.object({
  summary: z.object({
    totalAnnotations: z.number().int().min(0),
    totalQualityChecks: z.number().int().min(0),
    totalComparisons: z.number().int().min(0),
    averageQualityScore: z.number().min(0).max(100),
    categoryCounts: z.record(z.number().int().min(0)),
    generatedAt: z.string(),
  }),
  records: z.object({
    annotations: z.array(AnnotationSchema),
    qualityChecks: z.array(QualityCheckSchema),
    comparisons: z.array(ComparisonSchema),
  }),
});

export function parseReport(text: string): AnnotationReport {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ValidationError('report', 'valid JSON', getErrorMessage(error));
  }
  return parseOrThrow(AnnotationReportSchema, raw, 'report');
}

export function readReport(filePath: string): AnnotationReport {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new IOError('read', filePath, toError(error));
  }
  return parseReport(text);
}
