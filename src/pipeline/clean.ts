import { COUNT_FIELDS } from '../types';
import type {
  CellIssue,
  CleaningReport,
  CoercionPolicy,
  CountField,
  CountValues,
  DisasterRecord,
  FlaggedCell,
  RawCell,
} from '../types';
import { cellText, normalizeProvince, parseNumber, titleCase } from '../utils';
import type { NormalizedRow } from './normalize';

export const UNKNOWN_DISASTER_TYPE = 'Unknown';

export interface CleanOptions {
  year: number;
  source: string;
  policy?: CoercionPolicy;
  defaultDisasterType?: string;
}

export interface CleanResult {
  records: DisasterRecord[];
  report: CleaningReport;
}

const EMPTY_COUNTS: CountValues = {
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
};

export type CoercedCount = { value: number; issue?: CellIssue };

/**
 * Turn a raw cell into a non-negative integer. Blanks and dash placeholders
 * are a plain 0; anything else that is not a number, or is negative, comes
 * back as 0 with an issue attached.
 */
export function coerceCount(cell: RawCell | undefined): CoercedCount {
  const parsed = parseNumber(cell);
  if (parsed.kind === 'blank') return { value: 0 };
  if (parsed.kind === 'invalid') return { value: 0, issue: 'unparseable' };
  if (parsed.value < 0) return { value: 0, issue: 'negative' };
  return { value: Math.round(parsed.value) };
}

function dedupKey(record: DisasterRecord): string {
  return JSON.stringify([
    record.province,
    record.year,
    record.disaster_type,
    ...COUNT_FIELDS.map((field) => record[field]),
  ]);
}

/**
 * Validate one year's normalized rows. Row problems are recorded in the
 * report and never abort the run.
 */
export function cleanRows(rows: readonly NormalizedRow[], options: CleanOptions): CleanResult {
  const policy = options.policy ?? 'clamp';
  const report: CleaningReport = {
    year: options.year,
    source: options.source,
    totalRows: rows.length,
    keptRows: 0,
    duplicateRows: 0,
    zeroFilledRows: 0,
    skipped: [],
    flagged: [],
  };
  const records: DisasterRecord[] = [];
  const seen = new Set<string>();

  for (const { rowNumber, cells } of rows) {
    const province = normalizeProvince(cells.province);
    if (!province) {
      report.skipped.push({ rowNumber, reason: 'empty_province' });
      continue;
    }

    let provinceCode: string | null = null;
    if ('province_code' in cells) {
      const code = cellText(cells.province_code);
      // Total rows under the province block ("Jumlah", "Total") have no code.
      if (code === '') {
        report.skipped.push({ rowNumber, reason: 'missing_code' });
        continue;
      }
      // Subtotal rows carry negative placeholder codes (-1, -2, ...).
      if (code.startsWith('-')) {
        report.skipped.push({ rowNumber, reason: 'placeholder_code', detail: code });
        continue;
      }
      provinceCode = code;
    }

    const disasterType =
      titleCase(cellText(cells.disaster_type)) || options.defaultDisasterType || UNKNOWN_DISASTER_TYPE;

    const counts: CountValues = { ...EMPTY_COUNTS };
    const rowFlags: FlaggedCell[] = [];
    for (const field of COUNT_FIELDS) {
      const coerced = coerceCount(cells[field]);
      counts[field] = coerced.value;
      if (coerced.issue) {
        rowFlags.push({ rowNumber, field, raw: cellText(cells[field]), issue: coerced.issue });
      }
    }

    if (rowFlags.length > 0) {
      report.flagged.push(...rowFlags);
      if (policy === 'reject') {
        const fields: CountField[] = rowFlags.map((flag) => flag.field);
        report.skipped.push({ rowNumber, reason: 'invalid_count', detail: fields.join(', ') });
        continue;
      }
      report.zeroFilledRows++;
    }

    const record: DisasterRecord = Object.freeze({
      province,
      province_code: provinceCode,
      year: options.year,
      disaster_type: disasterType,
      ...counts,
    });

    const key = dedupKey(record);
    if (seen.has(key)) {
      report.duplicateRows++;
      continue;
    }
    seen.add(key);
    records.push(record);
  }

  report.keptRows = records.length;
  return { records, report };
}
