/**
 * 表形式データ（TabularResult）
 *
 * @description API から取得した表を行×列で保持する。列型は生成時に推定し、以後は変更しない
 */

export type ColumnType = 'numeric' | 'text';

export type CellValue = string | number | null;

export interface Column {
  readonly name: string;
  readonly type: ColumnType;
}

export type Row = Readonly<Record<string, CellValue>>;

export interface TabularResult {
  readonly columns: readonly Column[];
  readonly rows: readonly Row[];
}

/** 欠損値マーカー（BPS の表で使われる表記） */
const MISSING_VALUES = new Set(['', '-', '–', '—', '...', '…', 'NA', 'N/A', 'n/a']);

/**
 * 欠損値なら null、それ以外は前後空白を除いた文字列
 */
export function normalizeCell(value: string | number | null | undefined): string | number | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const trimmed = value.trim();
  return MISSING_VALUES.has(trimmed) ? null : trimmed;
}

/**
 * 文字列を数値として解釈（不可なら null）
 *
 * 受け付ける形式:
 * - "1234", "-12.5", "1e3"
 * - 桁区切りカンマ "1,234,567.8"
 * - 桁区切り空白 "1 234 567"
 * - 小数点カンマ "12,5"（カンマが1つで、その後が3桁ちょうどではない場合）
 */
export function parseNumeric(value: string): number | null {
  const compact = value.replace(/\s/g, '');
  if (compact === '') return null;

  let normalized = compact;
  if (/^[-+]?\d{1,3}(,\d{3})+(\.\d+)?$/.test(compact)) {
    normalized = compact.replace(/,/g, '');
  } else if (/^[-+]?\d+,\d+$/.test(compact)) {
    normalized = compact.replace(',', '.');
  }

  if (!/^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i.test(normalized)) {
    return null;
  }
  const num = Number(normalized);
  return Number.isFinite(num) ? num : null;
}

/**
 * 列の値から型を推定
 *
 * 非 null 値が1つ以上あり、すべて数値として解釈できれば numeric（全て null の列は text）
 */
export function inferColumnType(values: readonly CellValue[]): ColumnType {
  let seen = 0;
  for (const value of values) {
    if (value === null) continue;
    seen++;
    if (typeof value === 'number') continue;
    if (parseNumeric(value) === null) return 'text';
  }
  return seen > 0 ? 'numeric' : 'text';
}

/**
 * 列名の重複・空を解消（空 → Unnamed_<index>, 重複 → name_2, name_3 ...）
 */
export function dedupeColumnNames(names: readonly string[]): string[] {
  const used = new Set<string>();
  return names.map((raw, index) => {
    const base = raw.trim() === '' ? `Unnamed_${index}` : raw.trim();
    let name = base;
    let n = 2;
    while (used.has(name)) {
      name = `${base}_${n}`;
      n++;
    }
    used.add(name);
    return name;
  });
}

/**
 * 行配列から TabularResult を生成
 *
 * @param columnNames 列名（重複・空は dedupeColumnNames で解消）
 * @param rows 各行のセル値。列数に満たない行は null で埋め、超過分は捨てる
 *
 * @example
 * ```typescript
 * const result = createTabularResult(['Provinsi', 'Produksi'], [['ACEH', '75 000']]);
 * // result.columns → [{ name: 'Provinsi', type: 'text' }, { name: 'Produksi', type: 'numeric' }]
 * // result.rows → [{ Provinsi: 'ACEH', Produksi: 75000 }]
 * ```
 */
export function createTabularResult(
  columnNames: readonly string[],
  rows: ReadonlyArray<ReadonlyArray<string | number | null | undefined>>
): TabularResult {
  const names = dedupeColumnNames(columnNames);
  const cells = rows.map((row) => names.map((_, i) => normalizeCell(row[i])));

  const columns: Column[] = names.map((name, i) => ({
    name,
    type: inferColumnType(cells.map((row) => row[i])),
  }));

  const typedRows: Row[] = cells.map((row) => {
    const record: Record<string, CellValue> = {};
    columns.forEach((column, i) => {
      const value = row[i];
      // 列名が __proto__ でも自身のプロパティとして持つ
      Object.defineProperty(record, column.name, {
        value: column.type === 'numeric' && typeof value === 'string' ? parseNumeric(value) : value,
        enumerable: true,
        writable: true,
        configurable: true,
      });
    });
    return Object.freeze(record);
  });

  return Object.freeze({
    columns: Object.freeze(columns.map((column) => Object.freeze(column))),
    rows: Object.freeze(typedRows),
  });
}
