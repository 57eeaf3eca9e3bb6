/**
 * @fileoverview Core record types shared by every labelbook module.
 *
 * Records are created once and never updated, so every field is readonly and
 * stores hand out frozen objects.
 */

// ============================================================================
// ANNOTATIONS
// ============================================================================

/** Lowest and highest confidence an annotator may assign. */
export const MIN_CONFIDENCE = 1;
export const MAX_CONFIDENCE = 5;

export interface Annotation {
  /** Item identifier. Not unique: relabelling the same item adds another record. */
  readonly id: string;
  readonly category: string;
  /** Integer in [MIN_CONFIDENCE, MAX_CONFIDENCE]. */
  readonly confidence: number;
  readonly notes: string;
  /** ISO 8601 */
  readonly timestamp: string;
}

export interface AnnotationInput {
  id: string;
  category: string;
  confidence: number;
  notes?: string;
}

// ============================================================================
// QUALITY CHECKS
// ============================================================================

/**
 * The record a quality check evaluates. Every field is optional so partial or
 * malformed entries can be scored; an Annotation is always a valid DataEntry.
 */
export interface DataEntry {
  readonly id?: string;
  readonly category?: string;
  readonly confidence?: number;
  readonly notes?: string;
  readonly timestamp?: string;
}

export type DataEntryField = keyof DataEntry;

export const DATA_ENTRY_FIELDS: readonly DataEntryField[] = [
  'id',
  'category',
  'confidence',
  'notes',
  'timestamp',
];

export interface CriterionOutcome {
  readonly criterion: string;
  readonly passed: boolean;
  readonly feedback: string;
}

export interface QualityCheckResult {
  readonly entry: DataEntry;
  /** Criterion names in the order they were requested. */
  readonly criteria: readonly string[];
  /** One outcome per criterion, same order as `criteria`. */
  readonly outcomes: readonly CriterionOutcome[];
  readonly passedCount: number;
  /** passedCount / criteria.length * 100, two decimals. */
  readonly score: number;
  readonly timestamp: string;
}

// ============================================================================
// COMPARISONS
// ============================================================================

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type ComparisonWinner = 'A' | 'B' | 'tie';

export interface ComparisonInput {
  itemA: JsonValue;
  itemB: JsonValue;
  criterion: string;
  winner: ComparisonWinner;
}

export interface ComparisonResult {
  readonly itemA: JsonValue;
  readonly itemB: JsonValue;
  readonly criterion: string;
  readonly winner: ComparisonWinner;
  readonly timestamp: string;
}

// ============================================================================
// CONSISTENCY
// ============================================================================

export interface InconsistencyReport {
  readonly id: string;
  /** Distinct categories seen for the id, sorted. */
  readonly conflictingCategories: readonly string[];
  /** Number of annotations recorded for the id. */
  readonly occurrences: number;
}

export interface DistributionReport {
  readonly totalAnnotations: number;
  readonly uniqueCategories: number;
  readonly averageConfidence: number;
  readonly categoryDistribution: Readonly<Record<string, number>>;
  /** uniqueCategories / totalAnnotations * 100, two decimals. */
  readonly diversityScore: number;
}

// ============================================================================
// REPORTS
// ============================================================================

export interface ReportSummary {
  readonly totalAnnotations: number;
  readonly totalQualityChecks: number;
  readonly totalComparisons: number;
  readonly averageQualityScore: number;
  readonly categoryCounts: Readonly<Record<string, number>>;
  readonly generatedAt: string;
}

export interface AnnotationReport {
  readonly summary: ReportSummary;
  readonly records: {
    readonly annotations: readonly Annotation[];
    readonly qualityChecks: readonly QualityCheckResult[];
    readonly comparisons: readonly ComparisonResult[];
  };
}
