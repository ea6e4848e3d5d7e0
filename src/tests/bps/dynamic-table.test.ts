import { describe, it, expect } from 'vitest';
import {
  assembleDynamicTable,
  buildDataContentKey,
  cleanLabel,
  isMetadataComplete,
} from '@/lib/bps/dynamic-table';
import { DynamicDataSchema } from '@/lib/bps/types';
import { MalformedDataError } from '@/lib/errors';

/** 州 × 性別の人口（1年分） */
function populationPayload(overrides: Record<string, unknown> = {}) {
  return DynamicDataSchema.parse({
    'data-availability': 'available',
    var: [{ val: 1975, label: 'Jumlah Penduduk', unit: 'Jiwa' }],
    turvar: [
      { val: 1, label: 'Laki-laki' },
      { val: 2, label: 'Perempuan' },
    ],
    labelvervar: 'Provinsi',
    vervar: [
      { val: 1100, label: 'ACEH' },
      { val: 5100, label: 'BALI' },
    ],
    tahun: [{ val: 123, label: '2023' }],
    turtahun: [{ val: 0, label: 'Tahun' }],
    datacontent: {
      '1100197511230': 100,
      '1100197521230': 110,
      '5100197511230': 50,
      '5100197521230': null,
    },
    ...overrides,
  });
}

describe('bps/dynamic-table.ts', () => {
  describe('buildDataContentKey', () => {
    it('vervar + var + turvar + tahun + turtahun を連結する', () => {
      expect(
        buildDataContentKey({ vertical: '1100', variable: '1975', horizontal: '1', year: '123', derived: '0' })
      ).toBe('1100197511230');
    });
  });

  describe('cleanLabel', () => {
    it('エンティティを戻して前後の空白を除く', () => {
      expect(cleanLabel(' Kepulauan Bangka &amp; Belitung ')).toBe('Kepulauan Bangka & Belitung');
    });
  });

  describe('assembleDynamicTable', () => {
    it('縦軸 × 年 × 期間を行、横軸を列にする', () => {
      const result = assembleDynamicTable(populationPayload());

      expect(result.columns).toEqual([
        { name: 'Provinsi', type: 'text' },
        { name: 'Year', type: 'numeric' },
        { name: 'Period', type: 'text' },
        { name: 'Laki-laki', type: 'numeric' },
        { name: 'Perempuan', type: 'numeric' },
      ]);
      expect(result.rows).toEqual([
        { Provinsi: 'ACEH', Year: 2023, Period: 'Tahun', 'Laki-laki': 100, Perempuan: 110 },
        { Provinsi: 'BALI', Year: 2023, Period: 'Tahun', 'Laki-laki': 50, Perempuan: null },
      ]);
    });

    it('値が全て欠けている組み合わせも null の行として出力する', () => {
      const result = assembleDynamicTable(
        populationPayload({
          datacontent: { '1100197511230': 100, '1100197521230': 110 },
        })
      );

      expect(result.rows).toEqual([
        { Provinsi: 'ACEH', Year: 2023, Period: 'Tahun', 'Laki-laki': 100, Perempuan: 110 },
        { Provinsi: 'BALI', Year: 2023, Period: 'Tahun', 'Laki-laki': null, Perempuan: null },
      ]);
    });

    it('横軸が「Tidak ada」なら変数名を列名にする', () => {
      const result = assembleDynamicTable(
        populationPayload({
          turvar: [{ val: 0, label: 'Tidak ada' }],
          datacontent: { '1100197501230': '5.2', '5100197501230': '4.8' },
        })
      );

      expect(result.columns.map((column) => column.name)).toEqual([
        'Provinsi',
        'Year',
        'Period',
        'Jumlah Penduduk',
      ]);
      expect(result.rows[1]).toMatchObject({ 'Jumlah Penduduk': 4.8 });
    });

    it('turvar / turtahun がなければ 0 として扱い、縦軸ラベルがなければ Item', () => {
      const result = assembleDynamicTable(
        populationPayload({
          turvar: undefined,
          turtahun: undefined,
          labelvervar: null,
          vervar: [{ val: 1100, label: 'ACEH' }],
          datacontent: { '1100197501230': 42 },
        })
      );

      expect(result.columns.map((column) => column.name)).toEqual([
        'Item',
        'Year',
        'Period',
        'Jumlah Penduduk',
      ]);
      expect(result.rows).toEqual([{ Item: 'ACEH', Year: 2023, Period: null, 'Jumlah Penduduk': 42 }]);
    });

    it('値が1つもなければ MalformedDataError', () => {
      expect(() => assembleDynamicTable(populationPayload({ datacontent: {} }))).toThrow(
        new MalformedDataError('Dynamic table has no values for the requested parameters')
      );
    });
  });

  describe('isMetadataComplete', () => {
    const item = { id: '1', label: 'x' };

    it('縦軸・横軸・年が揃っていれば true', () => {
      expect(isMetadataComplete({ verticalVars: [item], horizontalVars: [item], years: [item] })).toBe(true);
    });

    it('いずれかが空なら false', () => {
      expect(isMetadataComplete({ verticalVars: [item], horizontalVars: [], years: [item] })).toBe(false);
      expect(isMetadataComplete({ verticalVars: [], horizontalVars: [item], years: [item] })).toBe(false);
      expect(isMetadataComplete({ verticalVars: [item], horizontalVars: [item], years: [] })).toBe(false);
    });
  });
});
