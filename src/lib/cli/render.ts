/**
 * CLI 出力の整形
 *
 * @description すべて文字列（行）を返すだけで、端末への出力は呼び出し側が行う
 */

import type { AppConfig } from '../config/schema';
import type { ListPage, Region } from '../bps/types';
import type { CellValue, Column, TabularResult } from '../tabular/result';

/** 表示する欠損値 */
const NULL_DISPLAY = '-';

/** 列幅の上限（文字数） */
const DEFAULT_MAX_COLUMN_WIDTH = 30;

/**
 * トークンをマスク（先頭・末尾4文字のみ表示）
 *
 * @example
 * ```typescript
 * maskToken('abcdef1234567890'); // → 'abcd****7890'
 * maskToken('short');            // → '****'
 * ```
 */
export function maskToken(token: string | null): string {
  if (!token) return '(not set)';
  if (token.length <= 8) return '****';
  return `${token.slice(0, 4)}****${token.slice(-4)}`;
}

/**
 * 幅を超える文字列を省略記号付きで切り詰める
 */
export function truncate(text: string, maxWidth: number): string {
  if (text.length <= maxWidth) return text;
  return `${text.slice(0, Math.max(0, maxWidth - 1))}…`;
}

export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return NULL_DISPLAY;
  return String(value);
}

function pad(text: string, width: number, column: Column): string {
  return column.type === 'numeric' ? text.padStart(width) : text.padEnd(width);
}

export interface RenderTableOptions {
  /** 表示する最大行数（省略時は全行） */
  maxRows?: number;
  /** 列幅の上限 */
  maxColumnWidth?: number;
}

/**
 * TabularResult をテキスト表に変換
 *
 * numeric 列は右寄せ、text 列は左寄せ。列間は空白2つ
 */
export function renderTable(result: TabularResult, options?: RenderTableOptions): string[] {
  if (result.columns.length === 0 || result.rows.length === 0) {
    return ['(no rows)'];
  }

  const maxWidth = options?.maxColumnWidth ?? DEFAULT_MAX_COLUMN_WIDTH;
  const shown = result.rows.slice(0, options?.maxRows ?? result.rows.length);

  const header = result.columns.map((column) => truncate(column.name, maxWidth));
  const body = shown.map((row) =>
    result.columns.map((column) => truncate(formatCell(row[column.name]), maxWidth))
  );

  const widths = result.columns.map((_, index) =>
    Math.max(header[index].length, ...body.map((cells) => cells[index].length))
  );

  const line = (cells: string[]) =>
    cells
      .map((cell, index) => pad(cell, widths[index], result.columns[index]))
      .join('  ')
      .trimEnd();

  const lines = [line(header), widths.map((width) => '-'.repeat(width)).join('  ')];
  for (const cells of body) {
    lines.push(line(cells));
  }

  const hidden = result.rows.length - shown.length;
  if (hidden > 0) {
    lines.push(`... ${hidden} more row${hidden === 1 ? '' : 's'} (${result.rows.length} total)`);
  }
  return lines;
}

/**
 * ID と名前の一覧（ID 列を揃える）
 */
export function renderIdList(items: readonly { id: string; label: string }[]): string[] {
  const width = Math.max(0, ...items.map((item) => item.id.length));
  return items.map((item) => `${item.id.padEnd(width)}  ${item.label}`);
}

export function renderRegions(regions: readonly Region[]): string[] {
  if (regions.length === 0) {
    return ['No regions found.'];
  }
  return [
    ...renderIdList(regions.map((region) => ({ id: region.id, label: region.name }))),
    `${regions.length} region${regions.length === 1 ? '' : 's'}`,
  ];
}

/**
 * ページ付き一覧
 */
export function renderListPage<T>(
  page: ListPage<T>,
  toItem: (item: T) => { id: string; label: string },
  emptyMessage: string
): string[] {
  if (page.items.length === 0) {
    return [emptyMessage];
  }
  return [
    ...renderIdList(page.items.map(toItem)),
    `Page ${page.page}/${page.pages} (${page.total} total)`,
  ];
}

/**
 * 設定の表示（トークンはマスク）
 */
export function renderConfig(config: AppConfig, filePath: string): string[] {
  return [
    `token:            ${maskToken(config.token)}`,
    `defaultDomain:    ${config.defaultDomain}`,
    `downloadPath:     ${config.downloadPath ?? '(current directory)'}`,
    `exportFormat:     ${config.preferences.exportFormat}`,
    `pageSize:         ${config.preferences.pageSize}`,
    `overwriteExports: ${config.preferences.overwriteExports}`,
    `file:             ${filePath}`,
  ];
}
