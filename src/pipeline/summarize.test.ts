import { describe, expect, it } from 'vitest';
import type { CanonicalTable, CountField, DisasterRecord } from '../types';
import { merge } from './merge';
import {
  compareYears,
  computeKpis,
  filterRecords,
  metricValue,
  previewRecords,
  rankProvinces,
  resolveFilter,
  summarize,
} from './summarize';

type Counts = Partial<Record<CountField, number>>;

function record(province: string, year: number, counts: Counts = {}, disaster_type = 'Semua Bencana'): DisasterRecord {
  return {
    province,
    province_code: null,
    year,
    disaster_type,
    incident_count: 0,
    victims: 0,
    injured: 0,
    affected: 0,
    houses_heavily_damaged: 0,
    houses_moderately_damaged: 0,
    houses_lightly_damaged: 0,
    houses_flooded: 0,
    education_facilities: 0,
    worship_facilities: 0,
    health_facilities: 0,
    ...counts,
  };
}

function tableOf(records2023: DisasterRecord[], records2024: DisasterRecord[]): CanonicalTable {
  const report = (year: number, n: number) => ({
    year,
    source: `${year}`,
    totalRows: n,
    keptRows: n,
    duplicateRows: 0,
    zeroFilledRows: 0,
    skipped: [],
    flagged: [],
  });
  return merge(
    { year: 2023, source: '2023', records: records2023, report: report(2023, records2023.length) },
    { year: 2024, source: '2024', records: records2024, report: report(2024, records2024.length) },
  );
}

// Aceh 3 incidents in 2023; Aceh 5 and Bali 2 in 2024.
const scenario = tableOf(
  [record('Aceh', 2023, { incident_count: 3 })],
  [record('Aceh', 2024, { incident_count: 5 }), record('Bali', 2024, { incident_count: 2 })],
);

const wide = tableOf(
  [
    record('Aceh', 2023, { incident_count: 10, victims: 1, affected: 100 }),
    record('Jawa Barat', 2023, { incident_count: 40, victims: 7, affected: 900 }),
    record('Bali', 2023, { incident_count: 10, victims: 0, affected: 50 }),
  ],
  [
    record('Jawa Barat', 2024, { incident_count: 35, victims: 4, affected: 700 }),
    record('Jawa Tengah', 2024, { incident_count: 30, victims: 2, affected: 400 }),
    record('Bali', 2024, { incident_count: 5, victims: 1, affected: 20 }),
  ],
);

describe('summarize', () => {
  it('sums both years into KPIs, ranking and comparison', () => {
    const view = summarize(scenario, { years: [2023, 2024] });
    expect(view.kpis).toEqual({ provinceCount: 2, totalIncidents: 10, totalVictims: 0, totalAffected: 0 });
    expect(view.top.entries).toEqual([
      { province: 'Aceh', value: 8 },
      { province: 'Bali', value: 2 },
    ]);
    expect(view.comparison?.baseYear).toBe(2023);
    expect(view.comparison?.compareYear).toBe(2024);
    expect(view.comparison?.rows.map((row) => [row.province, row.metrics.incident_count])).toEqual([
      ['Aceh', { base: 3, compare: 5 }],
      ['Bali', { base: 0, compare: 2 }],
    ]);
  });

  it('uses defaults when no filter or options are given', () => {
    const view = summarize(scenario);
    expect(view.filter).toEqual({ years: [2023, 2024], provinces: 'all' });
    expect(view.top.metric).toBe('incident_count');
    expect(view.top.n).toBe(10);
    expect(view.recordCount).toBe(3);
  });

  it('has no comparison with a single year in scope', () => {
    const view = summarize(scenario, { years: [2024] });
    expect(view.comparison).toBeNull();
    expect(view.kpis.totalIncidents).toBe(7);
  });

  it('returns zero KPIs for an empty selection', () => {
    const view = summarize(scenario, { provinces: ['Papua'] });
    expect(view.recordCount).toBe(0);
    expect(view.kpis).toEqual({ provinceCount: 0, totalIncidents: 0, totalVictims: 0, totalAffected: 0 });
    expect(view.top.entries).toEqual([]);
    expect(view.comparison?.rows).toEqual([]);
  });

  it('ranks by the requested metric and limit', () => {
    const view = summarize(wide, {}, { metric: 'affected', topN: 2 });
    expect(view.top).toEqual({
      metric: 'affected',
      n: 2,
      entries: [
        { province: 'Jawa Barat', value: 1600 },
        { province: 'Jawa Tengah', value: 400 },
      ],
    });
  });

  it('matches KPI totals recomputed from the filtered records', () => {
    const filter = { years: [2024], provinces: ['jawa barat', 'BALI'] };
    const records = filterRecords(wide, filter);
    const view = summarize(wide, filter);
    expect(view.kpis.totalIncidents).toBe(records.reduce((sum, r) => sum + r.incident_count, 0));
    expect(view.kpis.totalIncidents).toBe(40);
    expect(view.kpis.provinceCount).toBe(2);
  });
});

describe('resolveFilter', () => {
  it('normalizes province names and drops unknown years', () => {
    expect(resolveFilter(wide, { years: [2024, 2030], provinces: ['  BALI', 'jawa barat', 'Bali'] })).toEqual({
      years: [2024],
      provinces: ['Bali', 'Jawa Barat'],
    });
  });

  it('treats empty lists as everything', () => {
    expect(resolveFilter(wide, { years: [], provinces: [] })).toEqual({ years: [2023, 2024], provinces: 'all' });
  });
});

describe('filterRecords', () => {
  it('keeps only records inside the filter', () => {
    const filter = { years: [2023], provinces: ['Bali', 'Aceh'] };
    const records = filterRecords(wide, filter);
    expect(records.map((r) => r.province)).toEqual(['Aceh', 'Bali']);
    for (const r of records) {
      expect(r.year).toBe(2023);
      expect(['Aceh', 'Bali']).toContain(r.province);
    }
  });
});

describe('rankProvinces', () => {
  it('breaks ties by province name', () => {
    const entries = rankProvinces(wide.records.filter((r) => r.year === 2023), 'incident_count', 10);
    expect(entries).toEqual([
      { province: 'Jawa Barat', value: 40 },
      { province: 'Aceh', value: 10 },
      { province: 'Bali', value: 10 },
    ]);
  });

  it('returns every province when fewer than n qualify, none for n below 1', () => {
    expect(rankProvinces(wide.records, 'victims', 50)).toHaveLength(4);
    expect(rankProvinces(wide.records, 'victims', 0)).toEqual([]);
    expect(rankProvinces(wide.records, 'victims', 2.9)).toHaveLength(2);
  });

  it('is sorted non-increasing', () => {
    const values = rankProvinces(wide.records, 'incident_count', 10).map((e) => e.value);
    expect(values).toEqual([75, 30, 15, 10]);
  });
});

describe('compareYears', () => {
  it('lists every province once with explicit zeros', () => {
    const comparison = compareYears(wide.records, 2023, 2024);
    expect(comparison.rows.map((row) => [row.province, row.metrics.victims])).toEqual([
      ['Aceh', { base: 1, compare: 0 }],
      ['Bali', { base: 0, compare: 1 }],
      ['Jawa Barat', { base: 7, compare: 4 }],
      ['Jawa Tengah', { base: 0, compare: 2 }],
    ]);
  });
});

describe('metricValue', () => {
  it('derives total impact from people and house damage', () => {
    const r = record('Aceh', 2023, {
      incident_count: 1,
      victims: 2,
      injured: 3,
      affected: 4,
      houses_heavily_damaged: 5,
      houses_moderately_damaged: 6,
      houses_lightly_damaged: 7,
      houses_flooded: 100,
    });
    expect(metricValue(r, 'total_impact')).toBe(28);
    expect(metricValue(r, 'houses_flooded')).toBe(100);
  });
});

describe('computeKpis', () => {
  it('counts distinct provinces', () => {
    expect(computeKpis(wide.records).provinceCount).toBe(4);
  });
});

describe('previewRecords', () => {
  it('orders by year, province and disaster type', () => {
    const table = tableOf(
      [record('Bali', 2023, {}, 'Gempa Bumi'), record('Bali', 2023, {}, 'Banjir'), record('Aceh', 2023)],
      [record('Aceh', 2024)],
    );
    expect(previewRecords(table).map((r) => `${r.year} ${r.province} ${r.disaster_type}`)).toEqual([
      '2023 Aceh Semua Bencana',
      '2023 Bali Banjir',
      '2023 Bali Gempa Bumi',
      '2024 Aceh Semua Bencana',
    ]);
  });
});
