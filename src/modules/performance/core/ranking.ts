/**
 * Ranking, slicing and state-average comparisons.
 */

import { BOTTOM_N, MAX_MARKS, TOP_N } from './endpoints.js';
import { round2 } from './rounding.js';

import type {
  PanchayatList,
  RankedSlices,
  ScoredUnit,
  StateAverageComparison,
  UnitPerformance,
} from './types.js';

export const toUnitPerformance = (unit: ScoredUnit): UnitPerformance => ({
  name: unit.group_name,
  marks: round2(unit.overall_total_marks),
  grade: unit.grade,
  maxMarks: MAX_MARKS,
});

/**
 * Takes the first `topN` and last `bottomN` units of a ranked list.
 * Short lists produce overlapping slices.
 */
export const rankedSlices = (
  ranked: readonly ScoredUnit[],
  topN: number = TOP_N,
  bottomN: number = BOTTOM_N
): RankedSlices => {
  const display = ranked.map(toUnitPerformance);

  return {
    top5: display.slice(0, topN),
    bottom5: display.slice(Math.max(display.length - bottomN, 0)),
  };
};

/**
 * Builds the panchayat slices for one block.
 *
 * When the list holds more than `bottomN + 1` panchayats, the very last one is
 * left out of the bottom slice, which then covers the `bottomN` units above it.
 */
export const panchayatSlices = (
  ranked: readonly ScoredUnit[],
  topN: number = TOP_N,
  bottomN: number = BOTTOM_N
): PanchayatList => {
  const display = ranked.map(toUnitPerformance);
  const dropLowest = display.length > bottomN + 1;

  return {
    total: display.length,
    top5: display.slice(0, topN),
    bottom5: dropLowest
      ? display.slice(display.length - bottomN - 1, display.length - 1)
      : display.slice(Math.max(display.length - bottomN, 0)),
    excludedLowest: dropLowest ? (display[display.length - 1] ?? null) : null,
  };
};

/**
 * Mean composite score across all units, rounded to 2 decimals. 0 for an empty list.
 */
export const calculateAverageMarks = (units: readonly ScoredUnit[]): number => {
  if (units.length === 0) {
    return 0;
  }

  const total = units.reduce((sum, unit) => sum + unit.overall_total_marks, 0);
  return round2(total / units.length);
};

export const compareToStateAverage = (
  marks: number,
  stateAverage: number
): StateAverageComparison => ({
  difference: round2(marks - stateAverage),
  isAbove: marks > stateAverage,
  stateAverage,
});

/**
 * Finds a unit by exact name and returns it with its 1-based rank.
 */
export const findRankedUnit = (
  ranked: readonly ScoredUnit[],
  name: string
): { unit: ScoredUnit; rank: number } | undefined => {
  const index = ranked.findIndex((unit) => unit.group_name === name);
  const unit = ranked[index];
  return unit === undefined ? undefined : { unit, rank: index + 1 };
};
