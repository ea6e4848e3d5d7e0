import { describe, it, expect } from 'vitest';
import { htmlTableToTabular, parseHtmlTable } from '@/lib/bps/html-table';

describe('bps/html-table.ts', () => {
  describe('parseHtmlTable', () => {
    it('<thead> をヘッダー、<tbody> をデータ行として読む', () => {
      const html = `
        <table class="table">
          <thead><tr><th>Provinsi</th><th>2022</th><th>2023</th></tr></thead>
          <tbody>
            <tr><td>ACEH</td><td>1,234</td><td>1,300</td></tr>
            <tr><td>BALI</td><td>-</td><td>980</td></tr>
          </tbody>
        </table>`;

      expect(parseHtmlTable(html)).toEqual({
        columns: ['Provinsi', '2022', '2023'],
        rows: [
          ['ACEH', '1,234', '1,300'],
          ['BALI', '-', '980'],
        ],
      });
    });

    it('colspan / rowspan の複数行ヘッダーを列ごとに連結する', () => {
      const html = `<table>
        <tr><th rowspan="2">Wilayah</th><th colspan="2">Penduduk</th></tr>
        <tr><th>Laki-laki</th><th>Perempuan</th></tr>
        <tr><td>Kota A</td><td>10</td><td>12</td></tr>
      </table>`;

      expect(parseHtmlTable(html)).toEqual({
        columns: ['Wilayah', 'Penduduk Laki-laki', 'Penduduk Perempuan'],
        rows: [['Kota A', '10', '12']],
      });
    });

    it('データ行の rowspan を下の行に展開する', () => {
      const html = `<table>
        <tr><th>Provinsi</th><th>Kabupaten</th><th>Nilai</th></tr>
        <tr><td rowspan="2">JAWA TIMUR</td><td>Pacitan</td><td>5</td></tr>
        <tr><td>Ponorogo</td><td>7</td></tr>
      </table>`;

      expect(parseHtmlTable(html).rows).toEqual([
        ['JAWA TIMUR', 'Pacitan', '5'],
        ['JAWA TIMUR', 'Ponorogo', '7'],
      ]);
    });

    it('<th> がなければ先頭行をヘッダーにする', () => {
      const html = '<table><tr><td>Tahun</td><td>Nilai</td></tr><tr><td>2020</td><td>3</td></tr></table>';

      expect(parseHtmlTable(html)).toEqual({ columns: ['Tahun', 'Nilai'], rows: [['2020', '3']] });
    });

    it('全セルが空の行は除き、短い行は空文字で埋める', () => {
      const html = `<table>
        <tr><th>A</th><th>B</th><th>C</th></tr>
        <tr><td>&nbsp;</td><td></td><td> </td></tr>
        <tr><td>x</td><td>1</td></tr>
      </table>`;

      expect(parseHtmlTable(html).rows).toEqual([['x', '1', '']]);
    });

    it('ヘッダーのみの表はデータ行なし', () => {
      expect(parseHtmlTable('<table><tr><th>A</th><th>B</th></tr></table>')).toEqual({
        columns: ['A', 'B'],
        rows: [],
      });
    });

    it('セル内のタグ・<br>・エンティティを整形する', () => {
      const html = '<table><tr><th>Luas<br>(km&sup2;)</th></tr><tr><td><b>1&nbsp;200</b></td></tr></table>';

      expect(parseHtmlTable(html)).toEqual({ columns: ['Luas (km²)'], rows: [['1 200']] });
    });

    it('最初の <table> だけを読む', () => {
      const html = `<p>Catatan</p>
        <table><tr><th>A</th></tr><tr><td>1</td></tr></table>
        <table><tr><th>B</th></tr><tr><td>2</td></tr></table>`;

      expect(parseHtmlTable(html)).toEqual({ columns: ['A'], rows: [['1']] });
    });

    it('空の HTML は列も行もない', () => {
      expect(parseHtmlTable('')).toEqual({ columns: [], rows: [] });
    });
  });

  describe('htmlTableToTabular', () => {
    it('列型を推定し、数値列を数値に変換する', () => {
      const result = htmlTableToTabular(`<table>
        <thead><tr><th>Provinsi</th><th>2023</th></tr></thead>
        <tbody><tr><td>ACEH</td><td>1,300</td></tr><tr><td>BALI</td><td>-</td></tr></tbody>
      </table>`);

      expect(result.columns).toEqual([
        { name: 'Provinsi', type: 'text' },
        { name: '2023', type: 'numeric' },
      ]);
      expect(result.rows).toEqual([
        { Provinsi: 'ACEH', '2023': 1300 },
        { Provinsi: 'BALI', '2023': null },
      ]);
    });

    it('空の列名を補う', () => {
      const result = htmlTableToTabular('<table><tr><th></th><th>Nilai</th></tr><tr><td>a</td><td>1</td></tr></table>');
      expect(result.columns.map((column) => column.name)).toEqual(['Unnamed_0', 'Nilai']);
    });
  });
});
