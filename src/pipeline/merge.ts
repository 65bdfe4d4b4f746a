import { MergeError } from '../errors';
import type { CanonicalTable, CleanedDataset, DisasterRecord } from '../types';
import { compareText } from '../utils';

/**
 * Union cleaned per-year datasets into one canonical table. Records from
 * different years are never deduplicated against each other.
 */
export function merge(...datasets: CleanedDataset[]): CanonicalTable {
  const years = new Set<number>();
  const provinces = new Set<string>();
  const records: DisasterRecord[] = [];

  for (const dataset of datasets) {
    if (years.has(dataset.year)) {
      throw new MergeError(`year ${dataset.year} supplied more than once (${dataset.source})`);
    }
    years.add(dataset.year);

    for (const record of dataset.records) {
      if (record.year !== dataset.year) {
        throw new MergeError(`${dataset.source}: record for ${record.province} is tagged ${record.year}, expected ${dataset.year}`);
      }
      provinces.add(record.province);
      records.push(record);
    }
  }

  return Object.freeze({
    years: Object.freeze([...years].sort((a, b) => a - b)),
    provinces: Object.freeze([...provinces].sort(compareText)),
    records: Object.freeze(records),
  });
}
