/**
 * @fileoverview Quality criteria and the registry that resolves them by name.
 *
 * A criterion is a pass/fail predicate over a DataEntry. Three built-ins
 * cover the common checks:
 * - `completeness`: required fields are present and non-empty
 * - `format`: fields have the expected type and shape
 * - `consistency`: confidence lies on the annotation scale
 *
 * Callers can register their own predicates on a registry and pass it to
 * `qualityCheck`; names are matched exactly.
 *
 * @packageDocumentation
 */

import { ValidationError, describeValue } from '../core/errors.js';
import {
  DATA_ENTRY_FIELDS,
  MAX_CONFIDENCE,
  MIN_CONFIDENCE,
  type DataEntry,
  type DataEntryField,
} from '../types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CriterionVerdict {
  passed: boolean;
  feedback: string;
}

export interface CriterionContext {
  /** Fields `completeness` insists on. */
  requiredFields: readonly DataEntryField[];
}

export type CriterionPredicate = (entry: DataEntry, context: CriterionContext) => CriterionVerdict;

export interface CriterionDefinition {
  name: string;
  description: string;
  evaluate: CriterionPredicate;
}

export type BuiltinCriterion = 'completeness' | 'format' | 'consistency';

export const DEFAULT_REQUIRED_FIELDS: readonly DataEntryField[] = ['id', 'category', 'confidence'];

export const DEFAULT_CRITERIA: readonly BuiltinCriterion[] = ['completeness', 'format', 'consistency'];

// ============================================================================
// PREDICATE HELPERS
// ============================================================================

function isFilled(value: unknown): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'string') return value.trim().length > 0;
  if (typeof value === 'number') return Number.isFinite(value);
  return true;
}

const ISO_8601 = /^\d{4}-\d{2}-\d{2}(T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?)?$/;

function isIsoTimestamp(value: string): boolean {
  return ISO_8601.test(value) && !Number.isNaN(Date.parse(value));
}

function isConfidence(value: unknown): boolean {
  return (
    typeof value === 'number' &&
    Number.isInteger(value) &&
    value >= MIN_CONFIDENCE &&
    value <= MAX_CONFIDENCE
  );
}

function pass(feedback: string): CriterionVerdict {
  return { passed: true, feedback: `✓ ${feedback}` };
}

function fail(feedback: string): CriterionVerdict {
  return { passed: false, feedback: `✗ ${feedback}` };
}

// ============================================================================
// BUILT-IN CRITERIA
// ============================================================================

const completeness: CriterionDefinition = {
  name: 'completeness',
  description: 'Required fields are present and non-empty',
  evaluate(entry, context) {
    const missing = context.requiredFields.filter((field) => !isFilled(entry[field]));
    if (missing.length === 0) return pass('Complete');
    return fail(`Missing data: ${missing.join(', ')}`);
  },
};

const format: CriterionDefinition = {
  name: 'format',
  description: 'Fields have the expected type and shape',
  evaluate(entry) {
    const problems: string[] = [];
    if (typeof entry.id !== 'string' || entry.id.length === 0) {
      problems.push('id must be a non-empty string');
    }
    if (entry.category !== undefined && typeof entry.category !== 'string') {
      problems.push('category must be a string');
    }
    if (entry.confidence !== undefined && !Number.isInteger(entry.confidence)) {
      problems.push('confidence must be an integer');
    }
    if (entry.notes !== undefined && typeof entry.notes !== 'string') {
      problems.push('notes must be a string');
    }
    if (
      entry.timestamp !== undefined &&
      (typeof entry.timestamp !== 'string' || !isIsoTimestamp(entry.timestamp))
    ) {
      problems.push('timestamp must be ISO 8601');
    }
    if (problems.length === 0) return pass('Correct format');
    return fail(`Format issue: ${problems.join('; ')}`);
  },
};

const consistency: CriterionDefinition = {
  name: 'consistency',
  description: `Confidence is an integer between ${MIN_CONFIDENCE} and ${MAX_CONFIDENCE}`,
  evaluate(entry) {
    if (isConfidence(entry.confidence)) return pass('Consistent');
    return fail(`Inconsistent value: confidence ${describeValue(entry.confidence)}`);
  },
};

// ============================================================================
// REGISTRY
// ============================================================================

export class CriterionRegistry {
  private readonly definitions = new Map<string, CriterionDefinition>();

  register(definition: CriterionDefinition): this {
    if (definition.name.trim().length === 0) {
      throw new ValidationError('criterion.name', 'a non-empty string', describeValue(definition.name));
    }
    this.definitions.set(definition.name, definition);
    return this;
  }

  get(name: string): CriterionDefinition | undefined {
    return this.definitions.get(name);
  }

  has(name: string): boolean {
    return this.definitions.has(name);
  }

  names(): string[] {
    return [...this.definitions.keys()];
  }
}

export const BUILTIN_CRITERIA: readonly CriterionDefinition[] = [completeness, format, consistency];

/**
 * Registry preloaded with the built-in criteria. Registering a definition
 * under a built-in name replaces it for this registry only.
 */
export function createCriterionRegistry(extra: readonly CriterionDefinition[] = []): CriterionRegistry {
  const registry = new CriterionRegistry();
  for (const definition of BUILTIN_CRITERIA) registry.register(definition);
  for (const definition of extra) registry.register(definition);
  return registry;
}

export function isDataEntryField(value: string): value is DataEntryField {
  return DATA_ENTRY_FIELDS.some((field) => field === value);
}
