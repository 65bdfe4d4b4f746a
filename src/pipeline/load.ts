import * as path from 'path';
import type { DashboardConfig } from '../config';
import { mappingForYear } from '../data/lexicon';
import { SchemaError } from '../errors';
import { logger as defaultLogger } from '../logger';
import type { Logger } from '../logger';
import type { CanonicalTable, CleanedDataset, CoercionPolicy, ColumnMapping } from '../types';
import { cleanRows } from './clean';
import { merge } from './merge';
import { normalizeSheet } from './normalize';
import { describeInput, readWorkbook, sheetMatrix } from './workbook';
import type { WorkbookInput } from './workbook';

export interface LoadOptions {
  mapping?: ColumnMapping;
  sheet?: string;
  policy?: CoercionPolicy;
  label?: string;
  logger?: Logger;
}

/**
 * Read one year's workbook and return its cleaned records with the
 * cleaning report. Structural problems throw (ReadError / SchemaError);
 * a malformed sheet is never partially ingested.
 */
export async function loadAndClean(year: number, file: WorkbookInput, options: LoadOptions = {}): Promise<CleanedDataset> {
  const log = options.logger ?? defaultLogger;
  const source = describeInput(file, options.label);
  const mapping = options.mapping ?? mappingForYear(year);
  if (!mapping) throw new SchemaError(source, year, `no column mapping configured for ${year}`);

  log.debug('Reading workbook', { source, year });
  const workbook = await readWorkbook(file, source);
  const { sheetName, rowOffset, matrix } = sheetMatrix(workbook, source, options.sheet);

  const sheet = normalizeSheet(matrix, mapping, { year, source, rowOffset });
  log.debug('Header located', { source, sheet: sheetName, headerRow: sheet.headerRow, dataStartRow: sheet.dataStartRow });

  const { records, report } = cleanRows(sheet.rows, {
    year,
    source,
    policy: options.policy,
    defaultDisasterType: mapping.defaultDisasterType,
  });

  log.info('Cleaned sheet', {
    source,
    year,
    rows: report.totalRows,
    kept: report.keptRows,
    duplicates: report.duplicateRows,
  });
  if (report.skipped.length > 0 || report.zeroFilledRows > 0) {
    log.warn('Rows needed attention', {
      source,
      year,
      skipped: report.skipped.length,
      zeroFilled: report.zeroFilledRows,
    });
  }

  return { year, source, records, report };
}

export interface LoadTableOptions {
  cwd?: string;
  logger?: Logger;
}

export interface LoadedTable {
  table: CanonicalTable;
  datasets: CleanedDataset[];
}

/** Load every configured source in order, then merge. */
export async function loadTable(config: DashboardConfig, options: LoadTableOptions = {}): Promise<LoadedTable> {
  const inputDir = path.resolve(options.cwd ?? process.cwd(), config.inputDir);
  const datasets: CleanedDataset[] = [];

  for (const source of config.sources) {
    datasets.push(
      await loadAndClean(source.year, path.join(inputDir, source.file), {
        mapping: source.mapping,
        sheet: source.sheet,
        policy: config.policy,
        label: source.file,
        logger: options.logger,
      }),
    );
  }

  return { table: merge(...datasets), datasets };
}
