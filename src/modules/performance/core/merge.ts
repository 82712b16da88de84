/**
 * Record merging across metric endpoints.
 */

import { ENDPOINT_FIELD_RENAMES, UNIT_NAME_FIELD, type MetricEndpoint } from './endpoints.js';

import type { MergedUnit, MetricRecord } from './types.js';

/**
 * Reads the unit name of a record, or undefined when it has none.
 */
export const readUnitName = (record: MetricRecord): string | undefined => {
  const name = record[UNIT_NAME_FIELD];
  return typeof name === 'string' ? name : undefined;
};

/**
 * Applies the endpoint's field renames to its rows. Other fields pass through.
 */
export const renameEndpointFields = (
  endpoint: MetricEndpoint,
  records: readonly MetricRecord[]
): MetricRecord[] => {
  const renames = ENDPOINT_FIELD_RENAMES[endpoint];
  if (renames === undefined) {
    return [...records];
  }

  return records.map((record) =>
    Object.fromEntries(
      Object.entries(record).map(([field, value]) => [renames[field] ?? field, value])
    )
  );
};

/**
 * Merges per-endpoint record lists into one unit per `group_name`.
 *
 * Result sets must be passed in `METRIC_ENDPOINTS` order. Fields are merged
 * shallowly and a later endpoint overwrites an earlier one on a shared field
 * name. Records without a unit name are skipped. Units keep the order in
 * which their name was first seen.
 */
export function mergeMetricResults(resultSets: readonly (readonly MetricRecord[])[]): MergedUnit[] {
  const unitsByName = new Map<string, MergedUnit>();

  for (const records of resultSets) {
    for (const record of records) {
      const name = readUnitName(record);
      if (name === undefined) {
        continue;
      }

      const existing = unitsByName.get(name);
      unitsByName.set(name, { ...existing, ...record, group_name: name });
    }
  }

  return Array.from(unitsByName.values());
}
