import { describe, expect, it } from 'vitest';
import { SchemaError } from '../errors';
import type { ColumnMapping, RawCell } from '../types';
import { normalizeSheet, requiredFields, resolveColumns } from './normalize';

const mapping: ColumnMapping = {
  fields: {
    province_code: ['Kode Provinsi'],
    province: ['Provinsi'],
    incident_count: ['Kejadian'],
    victims: ['Meninggal'],
    affected: ['Terdampak'],
  },
  defaultDisasterType: 'Semua Bencana',
};

const context = { year: 2023, source: 'rekap.xlsx' };

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

describe('resolveColumns', () => {
  it('prefers exact header matches and falls back to containment', () => {
    const header: RawCell[] = ['Kode Provinsi', 'Nama Provinsi', 'Total Kejadian', 'Meninggal', 'Terdampak'];
    expect(resolveColumns(header, mapping)).toEqual({
      province_code: 0,
      province: 1,
      incident_count: 2,
      victims: 3,
      affected: 4,
    });
  });

  it('never gives one column to two fields', () => {
    const columns = resolveColumns(['Provinsi', 'Kejadian'], {
      fields: { province: ['Provinsi'], province_code: ['Provinsi'], incident_count: ['Kejadian'] },
    });
    expect(columns.province).toBe(0);
    expect(columns.province_code).toBeUndefined();
  });

  it('uses short keywords for exact matches only', () => {
    const columns = resolveColumns(['Kabupaten', 'Kab'], { fields: { province: ['Kab'] } });
    expect(columns.province).toBe(1);
    expect(resolveColumns(['Kabupaten'], { fields: { province: ['Kab'] } }).province).toBeUndefined();
  });
});

describe('requiredFields', () => {
  it('requires a disaster type column only without a default', () => {
    expect(requiredFields(mapping)).toEqual(['province', 'incident_count', 'victims', 'affected']);
    expect(requiredFields({ fields: {} })).toEqual([
      'province',
      'disaster_type',
      'incident_count',
      'victims',
      'affected',
    ]);
  });
});

describe('normalizeSheet', () => {
  const matrix: RawCell[][] = [
    ['Rekap Bencana per Provinsi', null, null, null, null],
    [null, null, null, null, null],
    ['Kode Provinsi', 'Provinsi', 'Kejadian', 'Meninggal', 'Terdampak'],
    [11, 'Aceh', 3, 0, 120],
    [null, null, null, null, null],
    [51, 'Bali', '2', '-', 40],
  ];

  it('finds the header below title rows and maps data rows', () => {
    const sheet = normalizeSheet(matrix, mapping, context);
    expect(sheet.headerRow).toBe(3);
    expect(sheet.dataStartRow).toBe(4);
    expect(sheet.blankRows).toBe(1);
    expect(sheet.rows).toEqual([
      { rowNumber: 4, cells: { province_code: 11, province: 'Aceh', incident_count: 3, victims: 0, affected: 120 } },
      { rowNumber: 6, cells: { province_code: 51, province: 'Bali', incident_count: '2', victims: '-', affected: 40 } },
    ]);
  });

  it('offsets row numbers when the sheet does not start at row 1', () => {
    const sheet = normalizeSheet(matrix, mapping, { ...context, rowOffset: 5 });
    expect(sheet.headerRow).toBe(8);
    expect(sheet.rows[0].rowNumber).toBe(9);
  });

  it('names the missing required column', () => {
    const err = thrown(() =>
      normalizeSheet([['Kode Provinsi', 'Provinsi', 'Kejadian', 'Terdampak'], [11, 'Aceh', 3, 120]], mapping, context),
    );
    expect(err).toBeInstanceOf(SchemaError);
    expect(err).toMatchObject({ code: 'SCHEMA_ERROR', year: 2023, source: 'rekap.xlsx', missingFields: ['victims'] });
  });

  it('rejects a mapping without keywords for a required field', () => {
    const err = thrown(() => normalizeSheet(matrix, { fields: { province: ['Provinsi'] } }, context));
    expect(err).toBeInstanceOf(SchemaError);
    expect(err).toMatchObject({ missingFields: ['disaster_type', 'incident_count', 'victims', 'affected'] });
  });

  it('only searches the configured number of header rows', () => {
    const err = thrown(() => normalizeSheet(matrix, { ...mapping, headerSearchRows: 2 }, context));
    expect(err).toBeInstanceOf(SchemaError);
    // The title row already resolves "province" by containment.
    expect(err).toMatchObject({ missingFields: ['incident_count', 'victims', 'affected'] });
  });

  it('starts data after the section marker', () => {
    const sectioned: RawCell[][] = [
      ['Kode Provinsi', 'Provinsi', 'Kejadian', 'Meninggal', 'Terdampak'],
      ['1101', 'Kab. Simeulue', 1, 0, 5],
      ['kode wilayah provinsi'],
      [11, 'Aceh', 3, 0, 120],
    ];
    const sheet = normalizeSheet(sectioned, { ...mapping, sectionMarker: 'Kode Wilayah Provinsi' }, context);
    expect(sheet.dataStartRow).toBe(4);
    expect(sheet.rows.map((row) => row.cells.province)).toEqual(['Aceh']);
  });

  it('starts data right after a header row that carries the marker', () => {
    const sectioned: RawCell[][] = [
      ['Rekap Bencana 2023'],
      ['Kode Wilayah Provinsi', 'Provinsi', 'Kejadian', 'Meninggal', 'Terdampak'],
      [11, 'Aceh', 3, 0, 120],
    ];
    const sheet = normalizeSheet(sectioned, { ...mapping, sectionMarker: 'Kode Wilayah Provinsi' }, context);
    expect(sheet.headerRow).toBe(2);
    expect(sheet.dataStartRow).toBe(3);
    expect(sheet.rows).toEqual([
      { rowNumber: 3, cells: { province: 'Aceh', incident_count: 3, victims: 0, affected: 120 } },
    ]);
  });

  it('finds a marker outside the first column', () => {
    const sectioned: RawCell[][] = [
      ['Kode Provinsi', 'Provinsi', 'Kejadian', 'Meninggal', 'Terdampak'],
      [null, 'Kode Wilayah Provinsi'],
      [11, 'Aceh', 3, 0, 120],
    ];
    const sheet = normalizeSheet(sectioned, { ...mapping, sectionMarker: 'Kode Wilayah Provinsi' }, context);
    expect(sheet.dataStartRow).toBe(3);
  });

  it('fails when the section marker is absent', () => {
    const err = thrown(() => normalizeSheet(matrix, { ...mapping, sectionMarker: 'Kode Wilayah Provinsi' }, context));
    expect(err).toBeInstanceOf(SchemaError);
    expect(err instanceof Error ? err.message : '').toBe(
      'rekap.xlsx (2023): section marker "Kode Wilayah Provinsi" not found',
    );
  });
});
