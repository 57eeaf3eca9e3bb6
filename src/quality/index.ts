/**
 * @fileoverview Quality Module
 *
 * Scores data entries against named pass/fail criteria.
 *
 * Components:
 * - Criteria: built-in predicates and the registry that resolves names
 * - Scorer: evaluates an entry and records the QualityCheckResult
 */

export {
  BUILTIN_CRITERIA,
  CriterionRegistry,
  DEFAULT_CRITERIA,
  DEFAULT_REQUIRED_FIELDS,
  createCriterionRegistry,
  isDataEntryField,
} from './criteria.js';

export type {
  BuiltinCriterion,
  CriterionContext,
  CriterionDefinition,
  CriterionPredicate,
  CriterionVerdict,
} from './criteria.js';

export { evaluateCriteria, qualityCheck, type QualityCheckOptions } from './scorer.js';
