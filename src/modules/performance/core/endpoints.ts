/**
 * NREGS dashboard metric endpoints and scoring constants.
 */

/**
 * The fifteen dashboard endpoints, in merge order.
 *
 * Merge order is part of the contract: when two endpoints return the same
 * field for a unit, the endpoint listed later wins.
 */
export const METRIC_ENDPOINTS = [
  '/api/employment_workers/labour-engagement',
  '/api/employment_workers/avg-persondays',
  '/api/employment_workers/category-employment',
  '/api/employment_workers/disabled',
  '/api/employment_workers/transaction',
  '/api/employment_workers/work-management',
  '/api/employment_workers/recovery',
  '/api/employment_workers/inspection',
  '/api/employment_workers/nmms-usage',
  '/api/employment_workers/geotag-pending-works',
  '/api/employment_workers/labour-material-ratio',
  '/api/employment_workers/women-mate-engagement',
  '/api/employment_workers/timely-payment',
  '/api/employment_workers/zero-muster',
  '/api/employment_workers/fra-beneficiaries',
] as const;

export type MetricEndpoint = (typeof METRIC_ENDPOINTS)[number];

/**
 * Fields renamed as an endpoint's rows are read, so that a generic name does
 * not collide with another endpoint's field of the same name on merge.
 */
export const ENDPOINT_FIELD_RENAMES: Partial<
  Record<MetricEndpoint, Readonly<Record<string, string>>>
> = {
  '/api/employment_workers/labour-engagement': { ratio: 'labour_engagement_ratio' },
};

/** Field carrying the administrative unit name in every endpoint row */
export const UNIT_NAME_FIELD = 'group_name';

/** Highest achievable composite score */
export const MAX_MARKS = 103;

/** Worker-count field aliases, checked in order */
export const WORKER_COUNT_FIELDS = [
  'registered_worker',
  'total_registered_workers',
  'Total Registered Workers',
] as const;

/** Lower bounds for each grade, checked top-down */
export const GRADE_THRESHOLDS = [
  { grade: 'A', min: 70 },
  { grade: 'B', min: 60 },
  { grade: 'C', min: 45 },
] as const;

/** A child unit scoring this fraction below its peers' mean is an outlier */
export const OUTLIER_SHORTFALL = 0.4;

/** Minimum list sizes before the low-score outlier pass runs */
export const OUTLIER_MIN_UNITS = {
  block: 5,
  panchayat: 10,
} as const;

/** Sizes of the ranked top and bottom slices */
export const TOP_N = 5;
export const BOTTOM_N = 5;
