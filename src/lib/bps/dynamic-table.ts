/**
 * 動的テーブル（model=data）の組み立て
 *
 * @description datacontent のキーは vervar + var + turvar + tahun + turtahun の連結。
 * 縦軸項目 × 年 × 派生期間 を1行、横軸変数を列として TabularResult を作る
 */

import { MalformedDataError } from '../errors';
import { createTabularResult, type TabularResult } from '../tabular/result';
import { decodeHtmlEntities } from '../utils/html';
import type { DynamicDataPayload, MetadataItem } from './types';

/** 横軸なしを表す BPS のラベル */
const NO_HORIZONTAL_LABEL = 'Tidak ada';

/**
 * datacontent のキーを組み立て
 */
export function buildDataContentKey(parts: {
  vertical: string;
  variable: string;
  horizontal: string;
  year: string;
  derived: string;
}): string {
  return `${parts.vertical}${parts.variable}${parts.horizontal}${parts.year}${parts.derived}`;
}

/**
 * ラベルのエンティティを戻して前後空白を除去
 */
export function cleanLabel(label: string): string {
  return decodeHtmlEntities(label).trim();
}

/**
 * model=data のレスポンスを TabularResult に変換
 *
 * 縦軸 × 年 × 期間の組ごとに1行。datacontent にないキーは null
 *
 * @throws {MalformedDataError} datacontent が空の場合
 */
export function assembleDynamicTable(payload: DynamicDataPayload): TabularResult {
  if (Object.keys(payload.datacontent).length === 0) {
    throw new MalformedDataError('Dynamic table has no values for the requested parameters');
  }

  const variable = payload.var[0];
  const variableLabel = cleanLabel(variable.label);

  const horizontals =
    payload.turvar.length > 0 ? payload.turvar : [{ val: '0', label: NO_HORIZONTAL_LABEL }];
  const derived = payload.turtahun.length > 0 ? payload.turtahun : [{ val: '0', label: '' }];

  const columnNames = [
    payload.labelvervar ? cleanLabel(payload.labelvervar) : 'Item',
    'Year',
    'Period',
    ...horizontals.map((h) => {
      const label = cleanLabel(h.label);
      return label === '' || label === NO_HORIZONTAL_LABEL ? variableLabel : label;
    }),
  ];

  const rows: Array<Array<string | number | null>> = [];
  for (const vertical of payload.vervar) {
    for (const year of payload.tahun) {
      for (const period of derived) {
        const values = horizontals.map((h) => {
          const key = buildDataContentKey({
            vertical: vertical.val,
            variable: variable.val,
            horizontal: h.val,
            year: year.val,
            derived: period.val,
          });
          return payload.datacontent[key] ?? null;
        });
        rows.push([cleanLabel(vertical.label), cleanLabel(year.label), cleanLabel(period.label), ...values]);
      }
    }
  }

  return createTabularResult(columnNames, rows);
}

/**
 * メタデータが揃っているか（縦軸・横軸・年が全て1件以上）
 */
export function isMetadataComplete(metadata: {
  verticalVars: MetadataItem[];
  horizontalVars: MetadataItem[];
  years: MetadataItem[];
}): boolean {
  return (
    metadata.verticalVars.length > 0 &&
    metadata.horizontalVars.length > 0 &&
    metadata.years.length > 0
  );
}
