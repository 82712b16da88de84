/**
 * Composite score and grade calculation.
 */

import { componentTotal, SCORE_COMPONENTS } from './components.js';
import { GRADE_THRESHOLDS } from './endpoints.js';
import { round2 } from './rounding.js';

import type { Grade, MergedUnit, ScoredUnit } from './types.js';

/**
 * Sums all score components of a unit in component order, rounded to 2 decimals.
 */
export const computeOverallMarks = (unit: MergedUnit): number =>
  round2(SCORE_COMPONENTS.reduce((sum, component) => sum + componentTotal(unit, component), 0));

/**
 * Maps a composite score to its letter grade.
 */
export const gradeFor = (marks: number): Grade => {
  const match = GRADE_THRESHOLDS.find((threshold) => marks >= threshold.min);
  return match?.grade ?? 'D';
};

/**
 * Sorts units by composite score, highest first.
 * Array.prototype.sort is stable, so ties keep their input order.
 */
export const sortByMarks = <T extends { overall_total_marks: number }>(units: readonly T[]): T[] =>
  [...units].sort((a, b) => b.overall_total_marks - a.overall_total_marks);

/**
 * Adds `overall_total_marks` and `grade` to every unit and ranks them.
 * Never drops a unit.
 */
export function scoreUnits(units: readonly MergedUnit[]): ScoredUnit[] {
  const scored = units.map((unit): ScoredUnit => {
    const overallTotalMarks = computeOverallMarks(unit);
    return {
      ...unit,
      overall_total_marks: overallTotalMarks,
      grade: gradeFor(overallTotalMarks),
    };
  });

  return sortByMarks(scored);
}
