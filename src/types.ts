// Count columns carried by every canonical record, in recap-sheet order.
export const COUNT_FIELDS = [
  'incident_count',            // Jumlah Kejadian
  'victims',                   // Meninggal & Hilang
  'injured',                   // Luka-Luka
  'affected',                  // Mengungsi & Terdampak
  'houses_heavily_damaged',    // Rumah Rusak Berat
  'houses_moderately_damaged', // Rumah Rusak Sedang
  'houses_lightly_damaged',    // Rumah Rusak Ringan
  'houses_flooded',            // Rumah Terendam
  'education_facilities',      // Fasilitas Pendidikan
  'worship_facilities',        // Fasilitas Peribadatan
  'health_facilities',         // Fasilitas Kesehatan
] as const;

export type CountField = (typeof COUNT_FIELDS)[number];

export const TEXT_FIELDS = ['province', 'province_code', 'disaster_type'] as const;

export type TextField = (typeof TEXT_FIELDS)[number];

export type CanonicalField = TextField | CountField;

export const CANONICAL_FIELDS = [...TEXT_FIELDS, ...COUNT_FIELDS] as const;

export const METRICS = [...COUNT_FIELDS, 'total_impact'] as const;

export type Metric = (typeof METRICS)[number];

export type RawCell = string | number | boolean | Date | null;

export type RawRecord = RawCell[];

export type CountValues = Record<CountField, number>;

export interface DisasterRecord extends Readonly<CountValues> {
  readonly province: string;
  readonly province_code: string | null;
  readonly year: number;
  readonly disaster_type: string;
}

export interface ColumnMapping {
  fields: Partial<Record<CanonicalField, string[]>>;
  defaultDisasterType?: string;
  sectionMarker?: string;
  headerSearchRows?: number;
}

export type CoercionPolicy = 'clamp' | 'reject';

export type SkipReason = 'empty_province' | 'missing_code' | 'placeholder_code' | 'invalid_count';

export interface SkippedRow {
  rowNumber: number;
  reason: SkipReason;
  detail?: string;
}

export type CellIssue = 'unparseable' | 'negative';

export interface FlaggedCell {
  rowNumber: number;
  field: CountField;
  raw: string;
  issue: CellIssue;
}

export interface CleaningReport {
  year: number;
  source: string;
  totalRows: number;
  keptRows: number;
  duplicateRows: number;
  zeroFilledRows: number;
  skipped: SkippedRow[];
  flagged: FlaggedCell[];
}

export interface CleanedDataset {
  readonly year: number;
  readonly source: string;
  readonly records: readonly DisasterRecord[];
  readonly report: CleaningReport;
}

export interface CanonicalTable {
  readonly years: readonly number[];
  readonly provinces: readonly string[];
  readonly records: readonly DisasterRecord[];
}

export interface FilterState {
  years?: readonly number[];
  provinces?: readonly string[];
}

export interface ResolvedFilter {
  years: number[];
  provinces: string[] | 'all';
}

export interface Kpis {
  provinceCount: number;
  totalIncidents: number;
  totalVictims: number;
  totalAffected: number;
}

export interface RankEntry {
  province: string;
  value: number;
}

export interface TopRanking {
  metric: Metric;
  n: number;
  entries: RankEntry[];
}

export interface YearPair {
  base: number;
  compare: number;
}

export interface YearComparisonRow {
  province: string;
  metrics: Record<Metric, YearPair>;
}

export interface YearComparison {
  baseYear: number;
  compareYear: number;
  rows: YearComparisonRow[];
}

export interface SummaryView {
  filter: ResolvedFilter;
  recordCount: number;
  kpis: Kpis;
  top: TopRanking;
  comparison: YearComparison | null;
}

export function isMetric(value: string): value is Metric {
  return METRICS.some((metric) => metric === value);
}
