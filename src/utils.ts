import type { RawCell } from './types';

// Placeholders the recap sheets use for "no value".
const BLANK_TOKENS = ['', '-', '—', '–'];

export type ParsedNumber =
  | { kind: 'blank' }
  | { kind: 'number'; value: number }
  | { kind: 'invalid'; raw: string };

/** Cell as trimmed text. Integral numbers lose their decimals (11 -> "11"). */
export function cellText(value: RawCell | undefined): string {
  if (value === undefined || value === null) return '';
  if (value instanceof Date) return value.toISOString();
  return String(value).trim();
}

export function isBlankCell(value: RawCell | undefined): boolean {
  return cellText(value) === '';
}

// Numeric cells; thousands commas and stray spaces are tolerated.
export function parseNumber(value: RawCell | undefined): ParsedNumber {
  if (value === undefined || value === null) return { kind: 'blank' };
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'invalid', raw: String(value) };
  }
  if (typeof value === 'boolean' || value instanceof Date) {
    return { kind: 'invalid', raw: cellText(value) };
  }
  const str = value.trim();
  if (BLANK_TOKENS.includes(str)) return { kind: 'blank' };
  const compact = str.replace(/,/g, '').replace(/\s/g, '');
  const num = Number(compact);
  if (compact === '' || !Number.isFinite(num)) return { kind: 'invalid', raw: str };
  return { kind: 'number', value: num };
}

/** Collapse whitespace and title-case: "DKI  JAKARTA" -> "Dki Jakarta". */
export function titleCase(value: string): string {
  return value
    .trim()
    .replace(/\s+/g, ' ')
    .toLowerCase()
    .replace(/(^|[^\p{L}])(\p{L})/gu, (_match, before: string, letter: string) => before + letter.toUpperCase());
}

export function normalizeProvince(value: RawCell | undefined): string {
  return titleCase(cellText(value));
}

/** Comparison key for header cells and mapping keywords. */
export function headerKey(value: RawCell | undefined): string {
  return cellText(value).toLowerCase().replace(/[^\p{L}\p{N}]/gu, '');
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
