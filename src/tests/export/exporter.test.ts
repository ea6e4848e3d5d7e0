/**
 * export/exporter.ts のユニットテスト（実ファイルシステムの一時ディレクトリを使用）
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fsp } from 'fs';
import os from 'os';
import path from 'path';
import ExcelJS from 'exceljs';

const { mockBuildWorkbook } = vi.hoisted(() => ({
  mockBuildWorkbook: vi.fn(),
}));

vi.mock('@/lib/export/xlsx', () => ({
  buildWorkbook: mockBuildWorkbook,
}));

vi.mock('@/lib/utils/logger', () => ({
  createLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    startTimer: vi.fn(() => ({ end: vi.fn(), endWithError: vi.fn() })),
  })),
}));

import {
  DataExporter,
  ensureExtension,
  exportTable,
  isExportFormat,
  parseExportFormat,
  resolveExportPath,
} from '@/lib/export/exporter';
import { parseCsv, UTF8_BOM } from '@/lib/export/csv';
import { ExportFileExistsError, ExportWriteError, UnsupportedFormatError } from '@/lib/errors';
import { createTabularResult } from '@/lib/tabular/result';
import { nodeFileSystem, type FileSystem } from '@/lib/utils/fs';

const population = createTabularResult(
  ['Provinsi', 'Jumlah'],
  [
    ['ACEH', '5 371 532'],
    ['Kep. Bangka, Belitung', '1 455 678'],
    ['BALI', '-'],
  ]
);

describe('export/exporter.ts', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'stadata-export-'));
    const actual = await vi.importActual<typeof import('@/lib/export/xlsx')>('@/lib/export/xlsx');
    mockBuildWorkbook.mockImplementation(actual.buildWorkbook);
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  describe('parseExportFormat', () => {
    it('大文字・先頭のドットを許容する', () => {
      expect(parseExportFormat('CSV')).toBe('csv');
      expect(parseExportFormat('.xlsx')).toBe('xlsx');
      expect(parseExportFormat(' json ')).toBe('json');
    });

    it('未対応の形式は UnsupportedFormatError', () => {
      expect(() => parseExportFormat('pdf')).toThrow(new UnsupportedFormatError('pdf'));
    });

    it('isExportFormat は正規化しない', () => {
      expect(isExportFormat('csv')).toBe(true);
      expect(isExportFormat('CSV')).toBe(false);
    });
  });

  describe('ensureExtension', () => {
    it('拡張子がなければ形式の拡張子を付ける', () => {
      expect(ensureExtension('penduduk', 'xlsx')).toBe('penduduk.xlsx');
    });

    it('拡張子があればそのまま', () => {
      expect(ensureExtension('penduduk.txt', 'csv')).toBe('penduduk.txt');
    });
  });

  describe('resolveExportPath', () => {
    it('downloadPath が既存ディレクトリならその下', async () => {
      await expect(resolveExportPath('out.csv', dir)).resolves.toBe(path.join(dir, 'out.csv'));
    });

    it('downloadPath が未設定ならカレントディレクトリ', async () => {
      await expect(resolveExportPath('out.csv', null)).resolves.toBe(path.resolve(process.cwd(), 'out.csv'));
    });

    it('downloadPath が存在しなければカレントディレクトリ', async () => {
      await expect(resolveExportPath('out.csv', path.join(dir, 'missing'))).resolves.toBe(
        path.resolve(process.cwd(), 'out.csv')
      );
    });

    it('絶対パスはそのまま', async () => {
      const absolute = path.join(dir, 'x.json');
      await expect(resolveExportPath(absolute, '/elsewhere')).resolves.toBe(absolute);
    });
  });

  describe('DataExporter', () => {
    it('CSV: BOM 付きで書き込み、読み戻すと列名と行数が一致する', async () => {
      const target = path.join(dir, 'penduduk.csv');

      const summary = await new DataExporter().exportTable(population, target, 'csv');

      const text = await fsp.readFile(target, 'utf-8');
      expect(text.startsWith(UTF8_BOM)).toBe(true);

      const [header, ...rows] = parseCsv(text);
      expect(header).toEqual(['Provinsi', 'Jumlah']);
      expect(rows).toEqual([
        ['ACEH', '5371532'],
        ['Kep. Bangka, Belitung', '1455678'],
        ['BALI', ''],
      ]);

      const stat = await fsp.stat(target);
      expect(summary).toEqual({ path: target, format: 'csv', rowCount: 3, bytes: stat.size });
    });

    it('xlsx: Data シートに数値セルとして書き込む', async () => {
      const target = path.join(dir, 'penduduk.xlsx');

      const summary = await new DataExporter().exportTable(population, target, 'xlsx');

      const workbook = new ExcelJS.Workbook();
      await workbook.xlsx.readFile(target);
      const sheet = workbook.getWorksheet('Data');

      expect(sheet?.rowCount).toBe(4);
      expect(sheet?.getCell('A1').value).toBe('Provinsi');
      expect(sheet?.getCell('B1').value).toBe('Jumlah');
      expect(sheet?.getCell('A3').value).toBe('Kep. Bangka, Belitung');
      expect(sheet?.getCell('B2').value).toBe(5371532);
      expect(summary.rowCount).toBe(3);
      expect(summary.bytes).toBe((await fsp.stat(target)).size);
    });

    it('JSON: 行オブジェクトの配列を4スペースインデントで書き込む', async () => {
      const target = path.join(dir, 'penduduk.json');

      await new DataExporter().exportTable(population, target, 'json');

      const text = await fsp.readFile(target, 'utf-8');
      expect(text).toBe(`${JSON.stringify(population.rows, null, 4)}\n`);
      expect(JSON.parse(text)).toEqual([
        { Provinsi: 'ACEH', Jumlah: 5371532 },
        { Provinsi: 'Kep. Bangka, Belitung', Jumlah: 1455678 },
        { Provinsi: 'BALI', Jumlah: null },
      ]);
    });

    it('未対応の形式はファイルに触れる前に UnsupportedFormatError', async () => {
      const fakeFs: FileSystem = {
        ...nodeFileSystem,
        exists: vi.fn().mockResolvedValue(false),
        writeFile: vi.fn().mockResolvedValue(undefined),
      };
      const exporter = new DataExporter({ fs: fakeFs });

      await expect(exporter.exportTable(population, path.join(dir, 'x.pdf'), 'pdf')).rejects.toBeInstanceOf(
        UnsupportedFormatError
      );
      expect(fakeFs.exists).not.toHaveBeenCalled();
      expect(fakeFs.writeFile).not.toHaveBeenCalled();
    });

    it('既存ファイルは上書きせず ExportFileExistsError', async () => {
      const target = path.join(dir, 'penduduk.csv');
      await fsp.writeFile(target, 'existing');

      const error = await new DataExporter().exportTable(population, target, 'csv').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExportFileExistsError);
      expect(error).toBeInstanceOf(ExportWriteError);
      expect(await fsp.readFile(target, 'utf-8')).toBe('existing');
    });

    it('overwrite を指定すれば置き換える', async () => {
      const target = path.join(dir, 'penduduk.json');
      await fsp.writeFile(target, 'existing');

      await new DataExporter().exportTable(population, target, 'json', { overwrite: true });

      expect(JSON.parse(await fsp.readFile(target, 'utf-8'))).toHaveLength(3);
    });

    it('書き込み失敗は ExportWriteError で、一時ファイルを残さない', async () => {
      // 空でないディレクトリへの rename は失敗する
      const target = path.join(dir, 'occupied');
      await fsp.mkdir(target);
      await fsp.writeFile(path.join(target, 'keep.txt'), 'x');

      const error = await new DataExporter()
        .exportTable(population, target, 'csv', { overwrite: true })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExportWriteError);
      expect(error).not.toBeInstanceOf(ExportFileExistsError);
      expect(error).toMatchObject({ path: target, message: `Failed to write export file: ${target}` });
      expect(await fsp.readdir(dir)).toEqual(['occupied']);
    });

    it('xlsx の生成に失敗すれば ExportWriteError で、ファイルを作らない', async () => {
      const target = path.join(dir, 'penduduk.xlsx');
      const failure = new Error('zip failed');
      mockBuildWorkbook.mockRejectedValueOnce(failure);

      const error = await new DataExporter().exportTable(population, target, 'xlsx').catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ExportWriteError);
      expect(error).toMatchObject({ path: target, cause: failure });
      expect(await fsp.readdir(dir)).toEqual([]);
    });

    it('親ディレクトリがなければ ExportWriteError', async () => {
      const target = path.join(dir, 'missing', 'out.csv');

      await expect(new DataExporter().exportTable(population, target, 'csv')).rejects.toBeInstanceOf(
        ExportWriteError
      );
      expect(await fsp.readdir(dir)).toEqual([]);
    });
  });

  describe('exportTable', () => {
    it('デフォルトのエクスポーターで書き込む', async () => {
      const target = path.join(dir, 'out.csv');

      await expect(exportTable(population, target, 'csv')).resolves.toMatchObject({ rowCount: 3 });
    });
  });
});
