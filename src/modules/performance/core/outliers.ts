/**
 * Outlier filtering for block and panchayat lists.
 *
 * Two passes, in order:
 * 1. Name collision: the dashboard sometimes echoes the parent district (or,
 *    for panchayats, the parent block) as a child row with no workers.
 * 2. Low score: once a list is long enough, a unit scoring 40% or more below
 *    the mean of its peers is treated as a broken record.
 */

import { OUTLIER_MIN_UNITS, OUTLIER_SHORTFALL, WORKER_COUNT_FIELDS } from './endpoints.js';

import type { ScoredUnit } from './types.js';

export type ChildLevel = 'block' | 'panchayat';

export interface OutlierScope {
  level: ChildLevel;
  district: string;
  /** Parent block name, checked for collisions at panchayat level */
  block?: string;
}

export type ExclusionReason = 'NAME_COLLISION' | 'LOW_SCORE_OUTLIER';

export interface ExcludedUnit {
  unit: ScoredUnit;
  reason: ExclusionReason;
}

export interface OutlierPartition {
  kept: ScoredUnit[];
  excluded: ExcludedUnit[];
}

/**
 * Lowercases a name and strips all whitespace.
 */
export const normalizeUnitName = (name: string | null | undefined): string =>
  (name ?? '').toLowerCase().replace(/\s+/g, '');

/**
 * Returns the first worker-count alias present on the unit with a non-null
 * value, or null when none is.
 */
export const readWorkerCount = (unit: ScoredUnit): unknown => {
  for (const field of WORKER_COUNT_FIELDS) {
    const value = unit[field];
    if (value !== undefined && value !== null) {
      return value;
    }
  }
  return null;
};

const hasNoWorkers = (unit: ScoredUnit): boolean => {
  const count = readWorkerCount(unit);
  return count === null || count === 0;
};

/**
 * True when the unit is an empty echo of its parent district or block.
 */
export const isParentEcho = (unit: ScoredUnit, scope: OutlierScope): boolean => {
  const name = normalizeUnitName(unit.group_name);
  const matchesDistrict = name === normalizeUnitName(scope.district);
  const matchesBlock =
    scope.level === 'panchayat' &&
    scope.block !== undefined &&
    name === normalizeUnitName(scope.block);

  return (matchesDistrict || matchesBlock) && hasNoWorkers(unit);
};

/**
 * True when the unit scores below `(1 - shortfall)` times the mean of the
 * other units in the list. Peers are matched by name, so the unit itself
 * never counts towards its own mean.
 */
export const isLowScoreOutlier = (
  unit: ScoredUnit,
  units: readonly ScoredUnit[],
  shortfall: number = OUTLIER_SHORTFALL
): boolean => {
  if (units.length <= 1) {
    return false;
  }

  const peers = units.filter((other) => other.group_name !== unit.group_name);
  if (peers.length === 0) {
    return false;
  }

  const peerMean = peers.reduce((sum, peer) => sum + peer.overall_total_marks, 0) / peers.length;
  return unit.overall_total_marks < peerMean * (1 - shortfall);
};

/**
 * Splits a child-unit list into kept and excluded units, with reasons.
 * Kept units keep their input order.
 */
export function partitionOutliers(
  units: readonly ScoredUnit[],
  scope: OutlierScope
): OutlierPartition {
  const excluded: ExcludedUnit[] = [];

  const named = units.filter((unit) => {
    if (isParentEcho(unit, scope)) {
      excluded.push({ unit, reason: 'NAME_COLLISION' });
      return false;
    }
    return true;
  });

  if (named.length < OUTLIER_MIN_UNITS[scope.level]) {
    return { kept: named, excluded };
  }

  // Every unit is judged against the same list, before any removal
  const kept = named.filter((unit) => {
    if (isLowScoreOutlier(unit, named)) {
      excluded.push({ unit, reason: 'LOW_SCORE_OUTLIER' });
      return false;
    }
    return true;
  });

  return { kept, excluded };
}

/**
 * Removes parent echoes and low-score outliers from a block or panchayat list.
 */
export const filterOutliers = (units: readonly ScoredUnit[], scope: OutlierScope): ScoredUnit[] =>
  partitionOutliers(units, scope).kept;
