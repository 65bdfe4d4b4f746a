import { METRICS } from '../types';
import type {
  CanonicalTable,
  DisasterRecord,
  FilterState,
  Kpis,
  Metric,
  RankEntry,
  ResolvedFilter,
  SummaryView,
  YearComparison,
  YearComparisonRow,
  YearPair,
} from '../types';
import { compareText, normalizeProvince } from '../utils';

export const DEFAULT_TOP_N = 10;
export const DEFAULT_METRIC: Metric = 'incident_count';

export interface SummarizeOptions {
  topN?: number;
  metric?: Metric;
}

/** Empty or missing lists mean "everything"; years the table lacks are dropped. */
export function resolveFilter(table: CanonicalTable, filter: FilterState = {}): ResolvedFilter {
  const years = filter.years && filter.years.length > 0
    ? table.years.filter((year) => filter.years?.includes(year))
    : [...table.years];

  const provinces = filter.provinces && filter.provinces.length > 0
    ? [...new Set(filter.provinces.map((name) => normalizeProvince(name)))].sort(compareText)
    : 'all';

  return { years, provinces };
}

function matches(record: DisasterRecord, filter: ResolvedFilter): boolean {
  if (!filter.years.includes(record.year)) return false;
  return filter.provinces === 'all' || filter.provinces.includes(record.province);
}

export function filterRecords(table: CanonicalTable, filter: FilterState = {}): DisasterRecord[] {
  const resolved = resolveFilter(table, filter);
  return table.records.filter((record) => matches(record, resolved));
}

export function metricValue(record: DisasterRecord, metric: Metric): number {
  if (metric !== 'total_impact') return record[metric];
  return (
    record.incident_count +
    record.victims +
    record.injured +
    record.affected +
    record.houses_heavily_damaged +
    record.houses_moderately_damaged +
    record.houses_lightly_damaged
  );
}

export function computeKpis(records: readonly DisasterRecord[]): Kpis {
  const provinces = new Set<string>();
  const kpis: Kpis = { provinceCount: 0, totalIncidents: 0, totalVictims: 0, totalAffected: 0 };
  for (const record of records) {
    provinces.add(record.province);
    kpis.totalIncidents += record.incident_count;
    kpis.totalVictims += record.victims;
    kpis.totalAffected += record.affected;
  }
  kpis.provinceCount = provinces.size;
  return kpis;
}

/**
 * Provinces ordered by the summed metric, highest first. Ties fall back to
 * province name so repeated reads of the same sheets rank identically.
 */
export function rankProvinces(records: readonly DisasterRecord[], metric: Metric, n = DEFAULT_TOP_N): RankEntry[] {
  const limit = Math.max(0, Math.floor(n));
  const totals = new Map<string, number>();
  for (const record of records) {
    totals.set(record.province, (totals.get(record.province) ?? 0) + metricValue(record, metric));
  }
  return [...totals]
    .map(([province, value]) => ({ province, value }))
    .sort((a, b) => b.value - a.value || compareText(a.province, b.province))
    .slice(0, limit);
}

function emptyPairs(): Record<Metric, YearPair> {
  const pair = (): YearPair => ({ base: 0, compare: 0 });
  return {
    incident_count: pair(),
    victims: pair(),
    injured: pair(),
    affected: pair(),
    houses_heavily_damaged: pair(),
    houses_moderately_damaged: pair(),
    houses_lightly_damaged: pair(),
    houses_flooded: pair(),
    education_facilities: pair(),
    worship_facilities: pair(),
    health_facilities: pair(),
    total_impact: pair(),
  };
}

/**
 * Per-province metric pairs for two years. A province with no records in
 * one of the years reports an explicit 0 for it.
 */
export function compareYears(records: readonly DisasterRecord[], baseYear: number, compareYear: number): YearComparison {
  const byProvince = new Map<string, YearComparisonRow>();

  for (const record of records) {
    if (record.year !== baseYear && record.year !== compareYear) continue;
    let row = byProvince.get(record.province);
    if (!row) {
      row = { province: record.province, metrics: emptyPairs() };
      byProvince.set(record.province, row);
    }
    for (const metric of METRICS) {
      const pair = row.metrics[metric];
      if (record.year === baseYear) pair.base += metricValue(record, metric);
      else pair.compare += metricValue(record, metric);
    }
  }

  const rows = [...byProvince.values()].sort((a, b) => compareText(a.province, b.province));
  return { baseYear, compareYear, rows };
}

/**
 * Summary view for one filter state. Recomputed from the table on every call;
 * an empty selection yields zero KPIs and empty rankings.
 */
export function summarize(table: CanonicalTable, filter: FilterState = {}, options: SummarizeOptions = {}): SummaryView {
  const resolved = resolveFilter(table, filter);
  const records = table.records.filter((record) => matches(record, resolved));
  const metric = options.metric ?? DEFAULT_METRIC;
  const n = options.topN ?? DEFAULT_TOP_N;

  const comparison = resolved.years.length >= 2
    ? compareYears(records, resolved.years[0], resolved.years[resolved.years.length - 1])
    : null;

  return {
    filter: resolved,
    recordCount: records.length,
    kpis: computeKpis(records),
    top: { metric, n, entries: rankProvinces(records, metric, n) },
    comparison,
  };
}

/** Filtered records ordered for the data preview table. */
export function previewRecords(table: CanonicalTable, filter: FilterState = {}): DisasterRecord[] {
  return filterRecords(table, filter).sort(
    (a, b) =>
      a.year - b.year ||
      compareText(a.province, b.province) ||
      compareText(a.disaster_type, b.disaster_type),
  );
}
