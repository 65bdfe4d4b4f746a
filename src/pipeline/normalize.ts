import { SchemaError } from '../errors';
import { CANONICAL_FIELDS } from '../types';
import type { CanonicalField, ColumnMapping, RawCell, RawRecord } from '../types';
import { cellText, headerKey, isBlankCell } from '../utils';

export const DEFAULT_HEADER_SEARCH_ROWS = 30;

export type ColumnIndex = Partial<Record<CanonicalField, number>>;

export interface SheetContext {
  year: number;
  source: string;
  /** Zero-based sheet row of matrix[0]; sheets do not always start at A1. */
  rowOffset?: number;
}

export interface NormalizedRow {
  rowNumber: number;
  cells: Partial<Record<CanonicalField, RawCell>>;
}

export interface NormalizedSheet {
  headerRow: number;
  dataStartRow: number;
  columns: ColumnIndex;
  rows: NormalizedRow[];
  blankRows: number;
}

interface FieldKeywords {
  field: CanonicalField;
  keys: string[];
}

export function requiredFields(mapping: ColumnMapping): CanonicalField[] {
  return mapping.defaultDisasterType
    ? ['province', 'incident_count', 'victims', 'affected']
    : ['province', 'disaster_type', 'incident_count', 'victims', 'affected'];
}

function keywordsOf(mapping: ColumnMapping): FieldKeywords[] {
  return CANONICAL_FIELDS.map((field) => ({
    field,
    keys: (mapping.fields[field] ?? []).map((kw) => headerKey(kw)).filter((key) => key !== ''),
  }));
}

/**
 * Assign each canonical field a column of the candidate header row.
 * Exact key matches win; leftover fields then take the first unclaimed column
 * whose key contains one of their longer keywords.
 */
export function resolveColumns(row: RawRecord, mapping: ColumnMapping): ColumnIndex {
  const cellKeys = row.map((cell) => headerKey(cell));
  const keywords = keywordsOf(mapping);
  const claimed = new Set<number>();
  const columns: ColumnIndex = {};

  const claim = (field: CanonicalField, matches: (key: string) => boolean) => {
    const idx = cellKeys.findIndex((key, c) => key !== '' && !claimed.has(c) && matches(key));
    if (idx === -1) return;
    columns[field] = idx;
    claimed.add(idx);
  };

  for (const { field, keys } of keywords) {
    claim(field, (key) => keys.includes(key));
  }
  for (const { field, keys } of keywords) {
    if (columns[field] !== undefined) continue;
    const longKeys = keys.filter((kw) => kw.length > 3);
    if (longKeys.length === 0) continue;
    claim(field, (key) => longKeys.some((kw) => key.includes(kw)));
  }
  return columns;
}

function findMarkerRow(matrix: RawRecord[], marker: string, from: number): number {
  const needle = marker.toLowerCase();
  const contains = (cell: RawCell | undefined) => cellText(cell).toLowerCase().includes(needle);

  for (let r = from; r < matrix.length; r++) {
    if (contains(matrix[r][0])) return r;
  }
  for (let r = from; r < matrix.length; r++) {
    if (matrix[r].some(contains)) return r;
  }
  return -1;
}

/**
 * Map a sheet's cells onto canonical field names. Throws SchemaError when a
 * required field cannot be located; never fills a missing column with zeros.
 */
export function normalizeSheet(matrix: RawRecord[], mapping: ColumnMapping, context: SheetContext): NormalizedSheet {
  const { year, source } = context;
  const rowOffset = context.rowOffset ?? 0;
  const required = requiredFields(mapping);
  const keywords = keywordsOf(mapping);

  const unmapped = required.filter((field) => !keywords.some((k) => k.field === field && k.keys.length > 0));
  if (unmapped.length > 0) {
    throw new SchemaError(source, year, `mapping has no header keywords for ${unmapped.join(', ')}`, unmapped);
  }

  // --- header ---
  const searchRows = Math.min(mapping.headerSearchRows ?? DEFAULT_HEADER_SEARCH_ROWS, matrix.length);
  let headerIdx = -1;
  let columns: ColumnIndex = {};
  let bestMissing: CanonicalField[] = required;

  for (let r = 0; r < searchRows; r++) {
    const candidate = resolveColumns(matrix[r], mapping);
    const missing = required.filter((field) => candidate[field] === undefined);
    if (missing.length === 0) {
      headerIdx = r;
      columns = candidate;
      break;
    }
    if (missing.length < bestMissing.length) bestMissing = missing;
  }

  if (headerIdx === -1) {
    throw new SchemaError(
      source,
      year,
      `required column(s) not found in the first ${searchRows} rows: ${bestMissing.join(', ')}`,
      bestMissing,
    );
  }

  // --- section ---
  // The marker may sit on the header row itself.
  let dataStartIdx = headerIdx + 1;
  if (mapping.sectionMarker) {
    const markerIdx = findMarkerRow(matrix, mapping.sectionMarker, headerIdx);
    if (markerIdx === -1) {
      throw new SchemaError(source, year, `section marker "${mapping.sectionMarker}" not found`);
    }
    dataStartIdx = markerIdx + 1;
  }

  // --- rows ---
  const rows: NormalizedRow[] = [];
  let blankRows = 0;
  for (let r = dataStartIdx; r < matrix.length; r++) {
    const row = matrix[r];
    if (row.every((cell) => isBlankCell(cell))) {
      blankRows++;
      continue;
    }
    const cells: Partial<Record<CanonicalField, RawCell>> = {};
    for (const field of CANONICAL_FIELDS) {
      const idx = columns[field];
      if (idx !== undefined) cells[field] = row[idx] ?? null;
    }
    rows.push({ rowNumber: rowOffset + r + 1, cells });
  }

  return {
    headerRow: rowOffset + headerIdx + 1,
    dataStartRow: rowOffset + dataStartIdx + 1,
    columns,
    rows,
    blankRows,
  };
}
