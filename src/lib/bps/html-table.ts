/**
 * BPS 静的テーブル HTML パーサー
 *
 * @description view?model=statictable の `table` フィールド（HTML の <table>）を行×列に展開する。
 * colspan / rowspan は展開し、複数行ヘッダーは列ごとに空白で連結する
 */

import { createTabularResult, normalizeCell, type TabularResult } from '../tabular/result';
import { htmlToText } from '../utils/html';

export interface ParsedHtmlTable {
  /** 列名（未加工。空・重複の解消は createTabularResult で行う） */
  columns: string[];
  /** データ行（全セル空の行は除外済み） */
  rows: string[][];
}

interface RawRow {
  cells: string[];
  /** 全セルが <th> */
  allHeaderCells: boolean;
}

interface PendingSpan {
  remaining: number;
  text: string;
}

function spanAttr(attrs: string, name: 'colspan' | 'rowspan'): number {
  const match = attrs.match(new RegExp(`${name}\\s*=\\s*["']?(\\d+)`, 'i'));
  if (!match) return 1;
  const n = parseInt(match[1], 10);
  return Number.isInteger(n) && n > 0 ? Math.min(n, 1000) : 1;
}

/**
 * <tr> 群をセル配列に展開（rowspan の持ち越し状態は spans で共有）
 */
function expandRows(html: string, spans: Array<PendingSpan | undefined>): RawRow[] {
  const rows: RawRow[] = [];
  const rowPattern = /<tr\b[^>]*>([\s\S]*?)<\/tr>/gi;
  let rowMatch: RegExpExecArray | null;

  while ((rowMatch = rowPattern.exec(html)) !== null) {
    const out: string[] = [];
    let col = 0;
    let cellCount = 0;
    let headerCount = 0;

    // 上の行から rowspan で降りてきているセルを埋める
    const fillPending = () => {
      let pending = spans[col];
      while (pending && pending.remaining > 0) {
        out.push(pending.text);
        pending.remaining--;
        col++;
        pending = spans[col];
      }
    };

    const cellPattern = /<(td|th)\b([^>]*)>([\s\S]*?)<\/\1\s*>/gi;
    let cellMatch: RegExpExecArray | null;
    while ((cellMatch = cellPattern.exec(rowMatch[1])) !== null) {
      const [, tag, attrs, content] = cellMatch;
      const text = htmlToText(content);
      const colspan = spanAttr(attrs, 'colspan');
      const rowspan = spanAttr(attrs, 'rowspan');

      cellCount++;
      if (tag.toLowerCase() === 'th') headerCount++;

      fillPending();
      for (let k = 0; k < colspan; k++) {
        out.push(text);
        spans[col] = rowspan > 1 ? { remaining: rowspan - 1, text } : undefined;
        col++;
      }
    }
    fillPending();

    if (out.length > 0) {
      rows.push({ cells: out, allHeaderCells: cellCount > 0 && cellCount === headerCount });
    }
  }

  return rows;
}

/**
 * 列ごとにヘッダー行のテキストを連結（空と直前と同じ値は除く）
 */
function buildColumnNames(headerRows: string[][], width: number): string[] {
  const names: string[] = [];
  for (let col = 0; col < width; col++) {
    const parts: string[] = [];
    for (const row of headerRows) {
      const text = row[col]?.trim() ?? '';
      if (text !== '' && parts[parts.length - 1] !== text) {
        parts.push(text);
      }
    }
    names.push(parts.join(' '));
  }
  return names;
}

/**
 * HTML の表をパース
 *
 * ヘッダー行の判定順:
 * 1. <thead> 内の行
 * 2. 先頭から続く「全セルが <th>」の行
 * 3. どちらもなければ先頭行
 */
export function parseHtmlTable(html: string): ParsedHtmlTable {
  const tableMatch = html.match(/<table\b[^>]*>([\s\S]*?)<\/table>/i);
  const tableHtml = tableMatch ? tableMatch[1] : html;

  const spans: Array<PendingSpan | undefined> = [];
  const theadMatch = tableHtml.match(/<thead\b[^>]*>([\s\S]*?)<\/thead>/i);

  let headerRows: string[][];
  let bodyRows: string[][];

  if (theadMatch) {
    headerRows = expandRows(theadMatch[1], spans).map((row) => row.cells);
    bodyRows = expandRows(tableHtml.replace(theadMatch[0], ''), spans).map((row) => row.cells);
  } else {
    const rows = expandRows(tableHtml, spans);
    let headerCount = 0;
    while (headerCount < rows.length - 1 && rows[headerCount].allHeaderCells) {
      headerCount++;
    }
    if (headerCount === 0 && rows.length > 0) {
      headerCount = 1;
    }
    headerRows = rows.slice(0, headerCount).map((row) => row.cells);
    bodyRows = rows.slice(headerCount).map((row) => row.cells);
  }

  const width = Math.max(0, ...headerRows.map((row) => row.length), ...bodyRows.map((row) => row.length));
  const columns = buildColumnNames(headerRows, width);
  const rows = bodyRows
    .filter((row) => row.some((cell) => normalizeCell(cell) !== null))
    .map((row) => Array.from({ length: width }, (_, i) => row[i] ?? ''));

  return { columns, rows };
}

/**
 * HTML の表を TabularResult に変換
 */
export function htmlTableToTabular(html: string): TabularResult {
  const { columns, rows } = parseHtmlTable(html);
  return createTabularResult(columns, rows);
}
