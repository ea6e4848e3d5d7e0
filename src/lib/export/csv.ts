/**
 * CSV エンコード / パース
 *
 * @description RFC 4180 準拠（カンマ区切り・CRLF・ダブルクォートのエスケープ）。
 * パーサーはクォート内の改行にも対応し、BOM と空行は読み飛ばす
 */

import type { CellValue, TabularResult } from '../tabular/result';

export const UTF8_BOM = '\uFEFF';

/**
 * 1セルを CSV 表現に変換
 */
export function escapeCsvField(value: CellValue): string {
  if (value === null) return '';
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/**
 * TabularResult を CSV テキストに変換（ヘッダー行付き、BOM なし）
 */
export function toCsv(result: TabularResult): string {
  const lines = [result.columns.map((column) => escapeCsvField(column.name)).join(',')];
  for (const row of result.rows) {
    const line = result.columns.map((column) => escapeCsvField(row[column.name] ?? null)).join(',');
    // 1列の空セルは空行と区別できないため "" で書く
    lines.push(line === '' ? '""' : line);
  }
  return `${lines.join('\r\n')}\r\n`;
}

/**
 * CSV テキストをパース
 *
 * @example
 * ```typescript
 * parseCsv('a,b\r\n"x, y",2\r\n'); // → [['a', 'b'], ['x, y', '2']]
 * ```
 */
export function parseCsv(text: string): string[][] {
  const input = text.startsWith(UTF8_BOM) ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;
  // 現在の行で何か読んだか（空行の判定用）
  let touched = false;

  const endField = () => {
    row.push(field);
    field = '';
  };
  const endRow = () => {
    endField();
    if (touched) {
      rows.push(row);
    }
    row = [];
    touched = false;
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input[i];

    if (inQuotes) {
      if (ch === '"') {
        if (input[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
      touched = true;
    } else if (ch === ',') {
      endField();
      touched = true;
    } else if (ch === '\r') {
      if (input[i + 1] === '\n') i++;
      endRow();
    } else if (ch === '\n') {
      endRow();
    } else {
      field += ch;
      touched = true;
    }
  }

  if (touched) {
    endRow();
  }

  return rows;
}
