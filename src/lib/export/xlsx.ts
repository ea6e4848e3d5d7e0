/**
 * Excel (xlsx) ワークブック生成
 */

import ExcelJS from 'exceljs';
import type { TabularResult } from '../tabular/result';

const SHEET_NAME = 'Data';

/** 列幅の下限・上限（文字数） */
const MIN_COLUMN_WIDTH = 10;
const MAX_COLUMN_WIDTH = 60;

/**
 * 列幅をヘッダーと値の長さから決める
 */
function columnWidth(result: TabularResult, name: string): number {
  let longest = name.length;
  for (const row of result.rows) {
    const value = row[name];
    if (value !== null && value !== undefined) {
      longest = Math.max(longest, String(value).length);
    }
  }
  return Math.min(MAX_COLUMN_WIDTH, Math.max(MIN_COLUMN_WIDTH, longest + 2));
}

/**
 * TabularResult から xlsx のバイト列を生成
 *
 * ヘッダー行は太字で固定、numeric 列は数値セルとして書き込む
 */
export async function buildWorkbook(result: TabularResult): Promise<Uint8Array> {
  const wb = new ExcelJS.Workbook();
  wb.creator = 'stadata-x';
  wb.created = new Date();

  const sheet = wb.addWorksheet(SHEET_NAME, {
    views: [{ state: 'frozen', ySplit: 1 }],
  });

  sheet.columns = result.columns.map((column) => ({
    header: column.name,
    key: column.name,
    width: columnWidth(result, column.name),
  }));
  sheet.getRow(1).font = { bold: true };

  for (const row of result.rows) {
    sheet.addRow(result.columns.map((column) => row[column.name] ?? null));
  }

  const out = await wb.xlsx.writeBuffer();
  return new Uint8Array(out);
}
