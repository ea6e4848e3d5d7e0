/**
 * BPS WebAPI レスポンス型定義
 *
 * @description webapi.bps.go.id v1 のレスポンスを zod で検証する。
 * 一覧系は `data: [pagination, records[]]` の2要素配列で返る
 * @see https://webapi.bps.go.id/documentation/
 */

import { z } from 'zod';
import type { TabularResult } from '../tabular/result';

/** ID は文字列・数値どちらでも来るため文字列に正規化 */
const idField = z.union([z.string(), z.number()]).transform((value) => String(value));

const optionalText = z.string().nullish().transform((value) => value ?? null);

// ============================================
// 共通エンベロープ
// ============================================

export const EnvelopeSchema = z
  .object({
    status: z.string().optional(),
    message: z.string().optional(),
    'data-availability': z.string().optional(),
    data: z.unknown().optional(),
  })
  .passthrough();

export type Envelope = z.infer<typeof EnvelopeSchema>;

export const PaginationSchema = z.object({
  page: z.coerce.number().int(),
  pages: z.coerce.number().int(),
  total: z.coerce.number().int(),
});

export type Pagination = z.infer<typeof PaginationSchema>;

// ============================================
// domain（地域）
// ============================================

export const DomainRecordSchema = z.object({
  domain_id: idField,
  domain_name: z.string(),
  domain_url: optionalText,
});

export type RegionLevel = 'national' | 'province' | 'regency';

export interface Region {
  id: string;
  name: string;
  level: RegionLevel;
  url: string | null;
}

export type RegionType = 'all' | 'prov' | 'kab';

// ============================================
// statictable（静的テーブル）
// ============================================

export const StaticTableRecordSchema = z.object({
  table_id: idField,
  title: z.string(),
  subj_id: idField.nullish().transform((value) => value ?? null),
  subj: optionalText,
  updt_date: optionalText,
  size: optionalText,
  excel: optionalText,
});

export interface TableSummary {
  id: string;
  title: string;
  subjectId: string | null;
  subject: string | null;
  updatedAt: string | null;
  size: string | null;
  excelUrl: string | null;
}

export interface TableListFilters {
  domain: string;
  keyword?: string;
  page?: number;
  subjectId?: string;
  year?: string;
}

export interface ListPage<T> {
  items: T[];
  page: number;
  pages: number;
  total: number;
}

export const StaticTableViewSchema = z.object({
  table_id: idField,
  title: z.string(),
  subj: optionalText,
  updt_date: optionalText,
  table: z.string(),
});

export interface StaticTable {
  id: string;
  title: string;
  subject: string | null;
  updatedAt: string | null;
  result: TabularResult;
}

// ============================================
// var（動的テーブル）
// ============================================

export const DynamicVarRecordSchema = z.object({
  var_id: idField,
  title: z.string(),
  sub_id: idField.nullish().transform((value) => value ?? null),
  sub_name: optionalText,
  unit: optionalText,
  def: optionalText,
});

export interface DynamicTableSummary {
  id: string;
  title: string;
  subjectId: string | null;
  subject: string | null;
  unit: string | null;
  definition: string | null;
}

export const VerticalVarRecordSchema = z.object({
  item_ver_id: idField,
  vervar: z.string(),
  kode_ver_id: idField.optional(),
  group_ver_id: idField.optional(),
  name_group_ver_id: z.string().optional(),
});

export const HorizontalVarRecordSchema = z.object({
  turvar_id: idField,
  turvar: z.string(),
  group_turvar_id: idField.optional(),
  name_group_turvar: z.string().optional(),
});

export const YearRecordSchema = z.object({
  th_id: idField,
  th: z.union([z.string(), z.number()]).transform((value) => String(value)),
});

export const DerivedYearRecordSchema = z.object({
  turth_id: idField,
  turth: z.string(),
  group_turth_id: idField.optional(),
  name_group_turth: z.string().optional(),
});

export interface MetadataItem {
  id: string;
  label: string;
  code?: string;
  group?: string;
  groupName?: string;
}

export interface DynamicTableMetadata {
  verticalVars: MetadataItem[];
  horizontalVars: MetadataItem[];
  years: MetadataItem[];
  derivedYears: MetadataItem[];
  /** メタデータを取得できたドメイン（地域で欠ける場合は全国 0000 にフォールバック） */
  sourceDomain: string;
}

export interface DynamicDataRequest {
  domain: string;
  varId: string;
  /** th_id の一覧 */
  years: string[];
  /** 縦軸項目（vervar） */
  verticalItemIds?: string[];
  /** 横軸変数（turvar） */
  horizontalIds?: string[];
  /** 派生期間（turth） */
  derivedIds?: string[];
}

const ValueLabelSchema = z.object({
  val: idField,
  label: z.string(),
});

export const DynamicDataSchema = z.object({
  'data-availability': z.string().optional(),
  var: z.array(ValueLabelSchema.extend({ unit: optionalText })).min(1),
  turvar: z.array(ValueLabelSchema).default([]),
  labelvervar: z.string().nullish().transform((value) => value ?? null),
  vervar: z.array(ValueLabelSchema),
  tahun: z.array(ValueLabelSchema),
  turtahun: z.array(ValueLabelSchema).default([]),
  datacontent: z.record(z.union([z.number(), z.string(), z.null()])),
});

export type DynamicDataPayload = z.infer<typeof DynamicDataSchema>;
