/**
 * Component digests.
 *
 * Reduces the scored district and block lists of a summary run to the
 * per-component picture each analysis prompt needs. Everything comes from
 * lists already fetched, so no extra requests are made here.
 */

import {
  SCORE_COMPONENTS,
  componentTotal,
  readIndicator,
  round2,
  type HierarchySnapshot,
  type MergedUnit,
  type ScoreComponent,
  type ScoredUnit,
} from '@/modules/performance/index.js';

import { COMPONENT_TARGETS } from './targets.js';

import type { ComponentDigest, DigestEntry } from './types.js';

/** Number of top and bottom districts listed in a digest */
export const DIGEST_DISTRICT_COUNT = 3;

/**
 * Reads a component's raw indicators for one unit, rounded to 2 decimals.
 * Indicators the unit does not report are null.
 */
export const readIndicators = (
  unit: MergedUnit,
  component: ScoreComponent
): Record<string, number | null> =>
  Object.fromEntries(
    component.indicatorFields.map((field) => {
      const value = readIndicator(unit, field);
      return [field, value === null ? null : round2(value)];
    })
  );

/**
 * Ranks units by one component's marks, best first. Ties keep input order.
 */
export const rankByComponent = (
  units: readonly ScoredUnit[],
  component: ScoreComponent
): DigestEntry[] =>
  units
    .map((unit) => ({ unit, marks: round2(componentTotal(unit, component)) }))
    .sort((a, b) => b.marks - a.marks)
    .map(({ unit, marks }, index) => ({
      name: unit.group_name,
      marks,
      rank: index + 1,
      ...(component.indicatorFields.length > 0 && {
        indicators: readIndicators(unit, component),
      }),
    }));

/**
 * Builds the digest of one component for a district.
 */
export function buildComponentDigest(
  component: ScoreComponent,
  snapshot: HierarchySnapshot,
  district: string,
  listSize: number = DIGEST_DISTRICT_COUNT
): ComponentDigest {
  const districts = rankByComponent(snapshot.districts, component);
  const total = districts.reduce((sum, entry) => sum + entry.marks, 0);

  return {
    key: component.key,
    label: component.label,
    target: COMPONENT_TARGETS[component.key],
    stateAverage: districts.length === 0 ? 0 : round2(total / districts.length),
    topDistricts: districts.slice(0, listSize),
    bottomDistricts: districts.slice(Math.max(districts.length - listSize, 0)),
    district: districts.find((entry) => entry.name === district) ?? null,
    blocks: rankByComponent(snapshot.blocks, component),
  };
}

/**
 * Builds one digest per score component, in score component order.
 */
export const buildComponentDigests = (
  snapshot: HierarchySnapshot,
  district: string
): ComponentDigest[] =>
  SCORE_COMPONENTS.map((component) => buildComponentDigest(component, snapshot, district));
