import * as XLSX from 'xlsx';
import * as fs from 'fs-extra';
import * as path from 'path';
import { ReadError } from '../errors';
import type { RawRecord } from '../types';

export type WorkbookInput = string | Buffer;

export interface SheetMatrix {
  sheetName: string;
  /** Zero-based sheet row of matrix[0]. */
  rowOffset: number;
  matrix: RawRecord[];
}

export function describeInput(file: WorkbookInput, label?: string): string {
  if (label) return label;
  return typeof file === 'string' ? path.basename(file) : '<buffer>';
}

export async function readWorkbook(file: WorkbookInput, source = describeInput(file)): Promise<XLSX.WorkBook> {
  let data: Buffer;
  if (typeof file === 'string') {
    if (!(await fs.pathExists(file))) throw new ReadError(source, `file not found (${file})`);
    try {
      data = await fs.readFile(file);
    } catch (err) {
      throw new ReadError(source, 'file could not be opened', err);
    }
  } else {
    data = file;
  }

  if (data.length === 0) throw new ReadError(source, 'file is empty');

  let workbook: XLSX.WorkBook;
  try {
    workbook = XLSX.read(data, { type: 'buffer' });
  } catch (err) {
    throw new ReadError(source, 'not a readable spreadsheet', err);
  }
  if (workbook.SheetNames.length === 0) throw new ReadError(source, 'workbook has no sheets');
  return workbook;
}

/** Raw cell matrix of one sheet (the first one unless named). */
export function sheetMatrix(workbook: XLSX.WorkBook, source: string, sheetName?: string): SheetMatrix {
  const name = sheetName ?? workbook.SheetNames[0];
  const sheet: XLSX.WorkSheet | undefined = workbook.Sheets[name];
  if (!sheet) throw new ReadError(source, `sheet "${name}" not found`);

  const ref = sheet['!ref'];
  const rowOffset = ref ? XLSX.utils.decode_range(ref).s.r : 0;
  const matrix = XLSX.utils.sheet_to_json<RawRecord>(sheet, {
    header: 1,
    defval: null,
    blankrows: true,
    raw: true,
  });
  return { sheetName: name, rowOffset, matrix };
}
