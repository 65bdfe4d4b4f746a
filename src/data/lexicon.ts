import type { CanonicalField, ColumnMapping } from '../types';

// Header keywords per canonical field. Matching ignores case, spaces and
// punctuation, so "Meninggal_Hilang" and "Meninggal & Hilang" are the same key.
const BASE_FIELDS: Partial<Record<CanonicalField, string[]>> = {
  province_code: ['Kode Provinsi', 'Kode Wilayah', 'Kode'],
  province: ['Provinsi', 'Nama Provinsi', 'Wilayah'],
  disaster_type: ['Jenis Bencana', 'Jenis Kejadian', 'Bencana'],
  incident_count: ['Jumlah Kejadian', 'Kejadian', 'Jumlah Bencana'],
  victims: ['Meninggal Hilang', 'Meninggal dan Hilang', 'Korban Meninggal'],
  injured: ['Luka Luka', 'Luka'],
  affected: ['Mengungsi Terdampak', 'Menderita Mengungsi', 'Terdampak'],
  houses_heavily_damaged: ['Rumah Rusak Berat', 'Rusak Berat'],
  houses_moderately_damaged: ['Rumah Rusak Sedang', 'Rusak Sedang'],
  houses_lightly_damaged: ['Rumah Rusak Ringan', 'Rusak Ringan'],
  houses_flooded: ['Rumah Terendam', 'Terendam'],
  education_facilities: ['Fasilitas Pendidikan', 'Pendidikan'],
  worship_facilities: ['Fasilitas Peribadatan', 'Peribadatan'],
  health_facilities: ['Fasilitas Kesehatan', 'Kesehatan'],
};

// Recaps are per-province totals across every disaster type.
export const ALL_DISASTERS = 'Semua Bencana';

// The province block of a BNPB recap sits under this marker row.
export const PROVINCE_SECTION_MARKER = 'Kode Wilayah Provinsi';

export const YEAR_MAPPINGS: Readonly<Record<number, ColumnMapping>> = {
  2023: {
    fields: BASE_FIELDS,
    defaultDisasterType: ALL_DISASTERS,
    sectionMarker: PROVINCE_SECTION_MARKER,
  },
  // The 2024 export spells several headers differently.
  2024: {
    fields: {
      ...BASE_FIELDS,
      victims: ['Meninggal Hilang', 'Korban Meninggal Hilang', 'Meninggal'],
      affected: ['Mengungsi Terdampak', 'Terdampak Mengungsi', 'Terdampak'],
      injured: ['Luka Luka', 'Korban Luka'],
    },
    defaultDisasterType: ALL_DISASTERS,
    sectionMarker: PROVINCE_SECTION_MARKER,
  },
};

export function mappingForYear(year: number): ColumnMapping | undefined {
  return YEAR_MAPPINGS[year];
}
