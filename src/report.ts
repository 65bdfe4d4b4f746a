import type { CleaningReport, DisasterRecord, Metric, SummaryView } from './types';
import { COUNT_FIELDS } from './types';

const METRIC_LABELS: Record<Metric, string> = {
  incident_count: 'Jumlah Kejadian',
  victims: 'Meninggal & Hilang',
  injured: 'Luka-Luka',
  affected: 'Mengungsi & Terdampak',
  houses_heavily_damaged: 'Rumah Rusak Berat',
  houses_moderately_damaged: 'Rumah Rusak Sedang',
  houses_lightly_damaged: 'Rumah Rusak Ringan',
  houses_flooded: 'Rumah Terendam',
  education_facilities: 'Fasilitas Pendidikan',
  worship_facilities: 'Fasilitas Peribadatan',
  health_facilities: 'Fasilitas Kesehatan',
  total_impact: 'Total Dampak',
};

export function metricLabel(metric: Metric): string {
  return METRIC_LABELS[metric];
}

/** Thousands separators, no decimals: 12345 -> "12,345". */
export function formatNumber(value: number): string {
  return Math.round(value).toLocaleString('en-US');
}

// The first `textColumns` columns are left-aligned, the rest are numbers.
function table(header: string[], rows: string[][], textColumns = 1): string[] {
  const widths = header.map((h, c) => Math.max(h.length, ...rows.map((row) => row[c].length)));
  const line = (cells: string[]) =>
    cells.map((cell, c) => (c < textColumns ? cell.padEnd(widths[c]) : cell.padStart(widths[c]))).join('  ');
  return [line(header), widths.map((w) => '-'.repeat(w)).join('  '), ...rows.map(line)];
}

export function formatSummary(view: SummaryView): string {
  const { filter, kpis, top, comparison } = view;
  const scope = filter.provinces === 'all' ? 'semua provinsi' : filter.provinces.join(', ');
  const lines: string[] = [
    `Tahun: ${filter.years.join(', ') || '-'} | Provinsi: ${scope}`,
    '',
    `Jumlah Provinsi        ${formatNumber(kpis.provinceCount)}`,
    `Total Kejadian         ${formatNumber(kpis.totalIncidents)}`,
    `Meninggal & Hilang     ${formatNumber(kpis.totalVictims)}`,
    `Mengungsi & Terdampak  ${formatNumber(kpis.totalAffected)}`,
    '',
    `Top ${top.n} Provinsi berdasarkan ${metricLabel(top.metric)}`,
  ];

  if (top.entries.length === 0) {
    lines.push('(tidak ada data)');
  } else {
    lines.push(
      ...table(
        ['#', 'Provinsi', metricLabel(top.metric)],
        top.entries.map((entry, i) => [String(i + 1), entry.province, formatNumber(entry.value)]),
        2,
      ),
    );
  }

  if (comparison) {
    const { baseYear, compareYear } = comparison;
    lines.push('', `Perbandingan ${metricLabel(top.metric)} (${baseYear} vs ${compareYear})`);
    lines.push(
      ...table(
        ['Provinsi', String(baseYear), String(compareYear)],
        comparison.rows.map((row) => {
          const pair = row.metrics[top.metric];
          return [row.province, formatNumber(pair.base), formatNumber(pair.compare)];
        }),
      ),
    );
  }
  return lines.join('\n');
}

export function formatCleaningReport(report: CleaningReport): string {
  const lines = [
    `${report.source} (${report.year}): ${report.keptRows}/${report.totalRows} rows kept`,
  ];
  if (report.duplicateRows > 0) lines.push(`  duplicates removed: ${report.duplicateRows}`);
  if (report.zeroFilledRows > 0) lines.push(`  rows zero-filled: ${report.zeroFilledRows}`);
  for (const skip of report.skipped) {
    lines.push(`  row ${skip.rowNumber} skipped: ${skip.reason}${skip.detail ? ` (${skip.detail})` : ''}`);
  }
  for (const flag of report.flagged) {
    lines.push(`  row ${flag.rowNumber} ${flag.field}: ${flag.issue} "${flag.raw}"`);
  }
  return lines.join('\n');
}

export function formatPreview(records: readonly DisasterRecord[]): string {
  const header = ['Provinsi', 'Tahun', 'Kode', 'Jenis', ...COUNT_FIELDS.map((field) => metricLabel(field))];
  const rows = records.map((r) => [
    r.province,
    String(r.year),
    r.province_code ?? '-',
    r.disaster_type,
    ...COUNT_FIELDS.map((field) => formatNumber(r[field])),
  ]);
  return table(header, rows, 4).join('\n');
}
