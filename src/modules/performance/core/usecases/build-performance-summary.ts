/**
 * Build Performance Summary Use Case
 *
 * Walks the hierarchy for one report date:
 * 1. State scope: all districts, ranked, with the state average
 * 2. Selected district: rank, marks breakdown, delta to the state average
 * 3. District scope: its blocks, outlier-filtered and ranked
 * 4. Block scope (per block): its panchayats, outlier-filtered, top/bottom slices
 *
 * Only the state scope is mandatory. Lower scopes that fetch nothing simply
 * contribute no entries.
 */

import { err, ok, type Result } from 'neverthrow';

import { toComponentMarks } from '../components.js';
import { MAX_MARKS } from '../endpoints.js';
import { createStateDataUnavailableError, type PerformanceError } from '../errors.js';
import {
  calculateAverageMarks,
  compareToStateAverage,
  findRankedUnit,
  panchayatSlices,
  rankedSlices,
  toUnitPerformance,
} from '../ranking.js';
import { listScopeUnits, type ListScopeUnitsDeps } from './list-scope-units.js';

import type {
  BlockDetail,
  HierarchySnapshot,
  PerformanceSummary,
  ScoredUnit,
  SelectedDistrict,
} from '../types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BuildPerformanceSummaryDeps extends ListScopeUnitsDeps {
  /** Clock for the metadata timestamp */
  now?: () => Date;
}

export interface BuildPerformanceSummaryInput {
  /** Report date in YYYY-MM-DD format */
  date: string;
  /** District to drill into; exact `group_name` as returned at state scope */
  district?: string;
}

export interface BuildPerformanceSummaryResult {
  summary: PerformanceSummary;
  /** Scored lists behind the summary */
  snapshot: HierarchySnapshot;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

const toBlockDetail = (block: ScoredUnit, rank: number, stateAverage: number): BlockDetail => {
  const performance = toUnitPerformance(block);
  return {
    ...performance,
    rank,
    comparedToStateAverage: compareToStateAverage(performance.marks, stateAverage),
    componentMarks: toComponentMarks(block),
  };
};

const sortBlockDetails = (blocks: readonly BlockDetail[]): BlockDetail[] =>
  [...blocks].sort((a, b) => b.marks - a.marks);

async function buildBlockDetails(
  deps: BuildPerformanceSummaryDeps,
  input: { date: string; district: string },
  blocks: readonly ScoredUnit[],
  stateAverage: number
): Promise<BlockDetail[]> {
  const details: BlockDetail[] = [];

  for (const [index, block] of blocks.entries()) {
    const detail = toBlockDetail(block, index + 1, stateAverage);

    const { units: panchayats } = await listScopeUnits(deps, {
      date: input.date,
      district: input.district,
      block: block.group_name,
    });

    if (panchayats.length > 0) {
      detail.panchayats = panchayatSlices(panchayats);
    }

    details.push(detail);
  }

  return sortBlockDetails(details);
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds the nested performance summary for a date and optional district.
 *
 * @returns STATE_DATA_UNAVAILABLE when no district could be scored at state scope
 */
export async function buildPerformanceSummary(
  deps: BuildPerformanceSummaryDeps,
  input: BuildPerformanceSummaryInput
): Promise<Result<BuildPerformanceSummaryResult, PerformanceError>> {
  const { now = () => new Date() } = deps;
  const { date, district } = input;
  const log = deps.logger.child({ usecase: 'buildPerformanceSummary', date });

  log.info({ district }, 'Building performance summary');

  const { units: districts } = await listScopeUnits(deps, { date });
  if (districts.length === 0) {
    log.error('State-level data is empty, aborting summary');
    return err(createStateDataUnavailableError(date));
  }

  const stateAverage = calculateAverageMarks(districts);
  const summary: PerformanceSummary = {
    metadata: {
      date,
      generatedAt: now().toISOString(),
      maxMarks: MAX_MARKS,
      stateAverage,
      totalDistricts: districts.length,
    },
    districts: rankedSlices(districts),
  };
  const snapshot: HierarchySnapshot = { districts, blocks: [] };

  if (district === undefined) {
    return ok({ summary, snapshot });
  }

  const found = findRankedUnit(districts, district);
  if (found === undefined) {
    log.warn({ district }, 'Selected district not found in state data');
    return ok({ summary, snapshot });
  }

  const performance = toUnitPerformance(found.unit);
  const { units: blocks } = await listScopeUnits(deps, { date, district });
  snapshot.blocks = blocks;

  const selectedDistrict: SelectedDistrict = {
    ...performance,
    name: district,
    rank: found.rank,
    totalDistricts: districts.length,
    comparedToStateAverage: compareToStateAverage(performance.marks, stateAverage),
    componentMarks: toComponentMarks(found.unit),
    blockDetails: await buildBlockDetails(deps, { date, district }, blocks, stateAverage),
  };
  summary.selectedDistrict = selectedDistrict;

  log.info(
    {
      district,
      rank: found.rank,
      marks: performance.marks,
      blocks: selectedDistrict.blockDetails.length,
    },
    'Performance summary built'
  );

  return ok({ summary, snapshot });
}
