/**
 * Composite score components and the per-unit breakdown.
 */

import { round2 } from './rounding.js';

import type { ComponentKey, ComponentMarks, MergedUnit, ScoreComponent } from './types.js';

/**
 * The sixteen terms of the composite score.
 * Work management and geotagging sum several fields into one term.
 */
export const SCORE_COMPONENTS: readonly ScoreComponent[] = [
  {
    key: 'laborEngagement',
    label: 'Labour Engagement',
    fields: ['marks'],
    indicatorFields: [
      'labour_engagement_ratio',
      '30_day_avg_labour_expected',
      'total_registered_workers',
    ],
  },
  {
    key: 'personDays',
    label: 'Average Person Days',
    fields: ['pd_marks'],
    indicatorFields: ['avg_persondays'],
  },
  {
    key: 'categoryEmployment',
    label: 'Category-wise Employment',
    fields: ['total_marks'],
    indicatorFields: [
      'sc_employment_percentage',
      'st_employment_percentage',
      'women_pd_percentage',
      'hundred_days_percentage',
    ],
  },
  {
    key: 'disabledWorkers',
    label: 'Disabled Workers',
    fields: ['disabled_marks'],
    indicatorFields: ['disabled_ratio', 'persondays_generated_disabled'],
  },
  {
    key: 'transactions',
    label: 'Transactions',
    fields: ['total_transaction_marks'],
    indicatorFields: [],
  },
  {
    key: 'workManagement',
    label: 'Work Management',
    fields: ['marks_prev', 'marks_curr'],
    indicatorFields: [],
  },
  {
    key: 'inspection',
    label: 'Area Officer Inspection',
    fields: ['total_visit_marks'],
    indicatorFields: [],
  },
  {
    key: 'pendingWorks',
    label: 'Pending Works',
    fields: ['pending_marks'],
    indicatorFields: [],
  },
  {
    key: 'recovery',
    label: 'Recovery',
    fields: ['recovery_marks'],
    indicatorFields: [],
  },
  {
    key: 'nmmsUsage',
    label: 'NMMS Usage',
    fields: ['total_nmms_marks'],
    indicatorFields: [],
  },
  {
    key: 'geotagPendingWorks',
    label: 'Geotag Pending Works',
    fields: [
      'phase_0_assets_geotag_marks',
      'phase_1_before_geotag_marks',
      'phase_2_during_geotag_marks',
      'phase_3_after_geotag_marks',
    ],
    indicatorFields: [
      'pending_percentage_geotag',
      'pending_percentage_phase_0_assets',
      'pending_percentage_phase_1_before',
      'pending_percentage_phase_2_during',
      'pending_percentage_phase_3_after',
    ],
  },
  {
    key: 'labourMaterialRatio',
    label: 'Labour Material Ratio',
    fields: ['ratio_marks'],
    indicatorFields: ['labour_percentage', 'material_percentage'],
  },
  {
    key: 'womenMateEngagement',
    label: 'Women Mate Engagement',
    fields: ['women_mate_marks'],
    indicatorFields: [
      'women_mate_reg_percentage',
      'women_mate_work_percentage',
      'women_mates',
      'total_registered_mates',
    ],
  },
  {
    key: 'timelyPayment',
    label: 'Timely Payment',
    fields: ['timely_payment_marks'],
    indicatorFields: ['timely_fto_generation_pct'],
  },
  {
    key: 'zeroMuster',
    label: 'Zero Muster',
    fields: ['zero_muster_marks'],
    indicatorFields: [],
  },
  {
    key: 'fraBeneficiaries',
    label: 'FRA Beneficiaries',
    fields: ['total_fra_marks'],
    indicatorFields: [
      'percentage_100_days_emp',
      'percentage_101_149_days_emp',
      'percentage_150_days_emp',
      'total_fra_beneficiaries_registered',
    ],
  },
];

/**
 * Reads a numeric field from a unit.
 *
 * Missing, null and non-numeric values read as 0. Numeric strings are parsed,
 * since some endpoints serialise decimals as strings.
 */
export const readMark = (unit: MergedUnit, field: string): number => {
  const value = unit[field];

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : 0;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : 0;
  }

  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }

  return 0;
};

/**
 * Reads a raw indicator value, or null when the unit carries no number for it.
 */
export const readIndicator = (unit: MergedUnit, field: string): number | null => {
  const value = unit[field];

  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }

  return null;
};

/**
 * Sums a component's fields in field order, unrounded.
 */
export const componentTotal = (unit: MergedUnit, component: ScoreComponent): number =>
  component.fields.reduce((sum, field) => sum + readMark(unit, field), 0);

/**
 * Builds the per-component breakdown for a unit, each term rounded to 2 decimals.
 */
export const toComponentMarks = (unit: MergedUnit): ComponentMarks => {
  const mark = (key: ComponentKey): number => {
    const component = findComponent(key);
    return component === undefined ? 0 : round2(componentTotal(unit, component));
  };

  return {
    laborEngagement: mark('laborEngagement'),
    personDays: mark('personDays'),
    categoryEmployment: mark('categoryEmployment'),
    disabledWorkers: mark('disabledWorkers'),
    transactions: mark('transactions'),
    workManagement: mark('workManagement'),
    inspection: mark('inspection'),
    pendingWorks: mark('pendingWorks'),
    recovery: mark('recovery'),
    nmmsUsage: mark('nmmsUsage'),
    geotagPendingWorks: mark('geotagPendingWorks'),
    labourMaterialRatio: mark('labourMaterialRatio'),
    womenMateEngagement: mark('womenMateEngagement'),
    timelyPayment: mark('timelyPayment'),
    zeroMuster: mark('zeroMuster'),
    fraBeneficiaries: mark('fraBeneficiaries'),
  };
};

/**
 * Looks up a component definition by key.
 */
export const findComponent = (key: ComponentKey): ScoreComponent | undefined =>
  SCORE_COMPONENTS.find((component) => component.key === key);
