/**
 * Performance Module - Core Types
 *
 * Domain types for the NREGS hierarchical performance aggregation.
 */

// ============================================================================
// Scope
// ============================================================================

/**
 * Administrative tier whose units a scope returns.
 * - state scope lists districts
 * - district scope lists blocks
 * - block scope lists panchayats
 */
export type UnitLevel = 'district' | 'block' | 'panchayat';

/**
 * Narrows which tier of data the dashboard API returns.
 */
export interface MetricScope {
  /** Report date in YYYY-MM-DD format */
  date: string;
  district?: string;
  block?: string;
}

/**
 * Derives the tier of units a scope lists.
 */
export const levelForScope = (scope: MetricScope): UnitLevel => {
  if (scope.district === undefined) return 'district';
  if (scope.block === undefined) return 'block';
  return 'panchayat';
};

// ============================================================================
// Records
// ============================================================================

/**
 * One row returned by one endpoint for one administrative unit.
 * Field sets are endpoint specific; only `group_name` is shared.
 */
export type MetricRecord = Readonly<Record<string, unknown>>;

/**
 * Union of all endpoint rows for one unit, keyed by `group_name`.
 */
export interface MergedUnit {
  readonly group_name: string;
  readonly [field: string]: unknown;
}

export type Grade = 'A' | 'B' | 'C' | 'D';

/**
 * A merged unit with its composite score and grade.
 */
export interface ScoredUnit extends MergedUnit {
  readonly overall_total_marks: number;
  readonly grade: Grade;
}

// ============================================================================
// Score components
// ============================================================================

export type ComponentKey =
  | 'laborEngagement'
  | 'personDays'
  | 'categoryEmployment'
  | 'disabledWorkers'
  | 'transactions'
  | 'workManagement'
  | 'inspection'
  | 'pendingWorks'
  | 'recovery'
  | 'nmmsUsage'
  | 'geotagPendingWorks'
  | 'labourMaterialRatio'
  | 'womenMateEngagement'
  | 'timelyPayment'
  | 'zeroMuster'
  | 'fraBeneficiaries';

/**
 * One term of the composite score.
 */
export interface ScoreComponent {
  key: ComponentKey;
  label: string;
  /** Mark fields summed into this term */
  fields: readonly string[];
  /** Raw indicator fields shown next to the marks in analyses */
  indicatorFields: readonly string[];
}

/** Marks per score component */
export type ComponentMarks = Record<ComponentKey, number>;

// ============================================================================
// Summary
// ============================================================================

/**
 * Display entry for a unit in a ranked slice.
 */
export interface UnitPerformance {
  name: string;
  marks: number;
  grade: Grade;
  maxMarks: number;
}

export interface StateAverageComparison {
  /** marks minus state average, rounded to 2 decimals */
  difference: number;
  isAbove: boolean;
  stateAverage: number;
}

export interface RankedSlices {
  top5: UnitPerformance[];
  bottom5: UnitPerformance[];
}

/**
 * Panchayat slices for one block.
 * The lowest panchayat is kept out of `bottom5` once the list is long enough,
 * and reported in `excludedLowest` instead.
 */
export interface PanchayatList extends RankedSlices {
  total: number;
  excludedLowest: UnitPerformance | null;
}

export interface BlockDetail extends UnitPerformance {
  /** 1-based position among the district's blocks */
  rank: number;
  comparedToStateAverage: StateAverageComparison;
  componentMarks: ComponentMarks;
  panchayats?: PanchayatList;
}

export interface SelectedDistrict extends UnitPerformance {
  rank: number;
  totalDistricts: number;
  comparedToStateAverage: StateAverageComparison;
  componentMarks: ComponentMarks;
  blockDetails: BlockDetail[];
}

export interface SummaryMetadata {
  date: string;
  /** ISO timestamp of the aggregation run */
  generatedAt: string;
  maxMarks: number;
  stateAverage: number;
  totalDistricts: number;
}

/**
 * Root output of the aggregation, consumed by report assembly.
 */
export interface PerformanceSummary {
  metadata: SummaryMetadata;
  districts: RankedSlices;
  selectedDistrict?: SelectedDistrict;
}

/**
 * Scored lists gathered while building a summary, kept for report digests.
 */
export interface HierarchySnapshot {
  districts: ScoredUnit[];
  blocks: ScoredUnit[];
}
