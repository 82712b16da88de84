/**
 * What each score component aims for, as stated to the analyst.
 */

import type { ComponentKey } from '@/modules/performance/index.js';

export const COMPONENT_TARGETS: Readonly<Record<ComponentKey, string>> = {
  laborEngagement: 'Ideally above the state average.',
  personDays: 'Ideally above the state average.',
  categoryEmployment: 'SC, ST and women workers should be employed in the largest possible share.',
  disabledWorkers: 'Disabled workers should be above 2% of workers engaged.',
  transactions: 'Ideally above the state average.',
  workManagement: 'Older works above 90% completion; the rest above the state average.',
  inspection: 'At least 10 inspections each by the DPC and the ADPC.',
  pendingWorks: 'Ideally above the state average.',
  recovery: 'Ideally above the state average.',
  nmmsUsage: '100% of attendance captured through NMMS.',
  geotagPendingWorks: 'Ideally above the state average.',
  labourMaterialRatio:
    'Material share between 35% and 40%. Lower points to pending bill payments, higher to a skew towards material-intensive works.',
  womenMateEngagement: 'Women mates above 50%.',
  timelyPayment: '100% of payments generated on time.',
  zeroMuster: 'Fewer zero-attendance musters is better.',
  fraBeneficiaries: 'Ideally above the state average.',
};
