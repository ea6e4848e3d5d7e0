/**
 * BPS WebAPI クライアント
 *
 * @description 地域一覧・静的テーブル・動的テーブルの取得。
 * 失敗は例外ではなく ApiResult の error として返す（自動リトライなし）
 * @see https://webapi.bps.go.id/documentation/
 */

import { z } from 'zod';
import {
  ApiError,
  MalformedDataError,
  MissingTokenError,
  type ApiResult,
} from '../errors';
import { DEFAULT_TIMEOUT_MS, fetchJson, type FetchFn } from '../utils/http';
import { createLogger, type LogContext } from '../utils/logger';
import { NATIONAL_DOMAIN } from '../config/schema';
import { htmlTableToTabular } from './html-table';
import { assembleDynamicTable, cleanLabel, isMetadataComplete } from './dynamic-table';
import {
  DerivedYearRecordSchema,
  DomainRecordSchema,
  DynamicDataSchema,
  DynamicVarRecordSchema,
  EnvelopeSchema,
  HorizontalVarRecordSchema,
  PaginationSchema,
  StaticTableRecordSchema,
  StaticTableViewSchema,
  VerticalVarRecordSchema,
  YearRecordSchema,
  type DynamicDataRequest,
  type DynamicTableMetadata,
  type DynamicTableSummary,
  type ListPage,
  type MetadataItem,
  type Pagination,
  type Region,
  type RegionLevel,
  type RegionType,
  type StaticTable,
  type TableListFilters,
  type TableSummary,
} from './types';
import type { TabularResult } from '../tabular/result';

export const DEFAULT_BASE_URL = 'https://webapi.bps.go.id/v1/api';

export interface BpsClientOptions {
  /** API キー（省略時は環境変数 BPS_API_KEY を使用） */
  apiKey?: string | null;
  /** ベースURL（省略時は BPS_BASE_URL → 公式エンドポイント） */
  baseUrl?: string;
  /** リクエストタイムアウト（ミリ秒、省略時は BPS_TIMEOUT_MS → 30000） */
  timeoutMs?: number;
  /** HTTP 実装（テスト用） */
  fetchFn?: FetchFn;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

type QueryParams = Record<string, string | number | undefined>;

interface ExtractedList {
  records: unknown[];
  pagination: Pagination | null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * スキーマで検証（失敗時は MalformedDataError）
 */
function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new MalformedDataError(`Unexpected ${what}: ${formatZodIssues(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * エンベロープを検証し、status が OK 以外ならエラー
 */
function parseEnvelope(payload: unknown) {
  const envelope = parseWith(EnvelopeSchema, payload, 'response');
  if (envelope.status !== undefined && envelope.status !== 'OK') {
    throw new MalformedDataError(
      `BPS API returned status "${envelope.status}"${envelope.message ? `: ${envelope.message}` : ''}`
    );
  }
  return envelope;
}

/**
 * 一覧系レスポンスからレコード配列を取り出す
 *
 * - data-availability が available 以外 → 空
 * - data: [] → 空
 * - data: [pagination, records[]] → records
 * - data: records[] → そのまま
 */
export function extractList(payload: unknown): ExtractedList {
  const envelope = parseEnvelope(payload);
  const availability = envelope['data-availability'];
  if (availability !== undefined && availability !== 'available') {
    return { records: [], pagination: null };
  }

  const data = envelope.data;
  if (!Array.isArray(data)) {
    throw new MalformedDataError('Response has no "data" array');
  }
  if (data.length === 0) {
    return { records: [], pagination: null };
  }
  if (data.length === 2 && isPlainObject(data[0]) && Array.isArray(data[1])) {
    return {
      records: data[1],
      pagination: parseWith(PaginationSchema, data[0], 'pagination'),
    };
  }
  return { records: data, pagination: null };
}

/**
 * ドメインIDから地域レベルを判定（0000: 全国, NN00: 州, それ以外: 県・市）
 */
export function regionLevelOf(domainId: string): RegionLevel {
  if (domainId === NATIONAL_DOMAIN) return 'national';
  if (/^\d{2}00$/.test(domainId)) return 'province';
  return 'regency';
}

function toListPage<T>(items: T[], pagination: Pagination | null, requestedPage = 1): ListPage<T> {
  return {
    items,
    page: pagination?.page ?? requestedPage,
    pages: pagination?.pages ?? (items.length > 0 ? 1 : 0),
    total: pagination?.total ?? items.length,
  };
}

/**
 * BPS WebAPI クライアント
 */
export class BpsClient {
  private readonly apiKey: string | null;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: FetchFn | undefined;
  private readonly logger: ReturnType<typeof createLogger>;
  /** セッション内の地域一覧キャッシュ */
  private readonly regionCache = new Map<string, readonly Region[]>();

  constructor(options?: BpsClientOptions) {
    const apiKey = options?.apiKey ?? process.env.BPS_API_KEY;
    this.apiKey = apiKey ? apiKey : null;
    this.baseUrl = (options?.baseUrl ?? process.env.BPS_BASE_URL ?? DEFAULT_BASE_URL).replace(/\/+$/, '');

    const envTimeout = Number(process.env.BPS_TIMEOUT_MS);
    this.timeoutMs =
      options?.timeoutMs ??
      (Number.isInteger(envTimeout) && envTimeout > 0 ? envTimeout : DEFAULT_TIMEOUT_MS);
    this.fetchFn = options?.fetchFn;
    this.logger = createLogger({ module: 'bps-client', ...options?.logContext });
  }

  /** トークンが設定されているか */
  get isReady(): boolean {
    return this.apiKey !== null;
  }

  /**
   * URLを構築（空の値は送らない。key は最後に付与）
   */
  buildUrl(endpoint: string, params: QueryParams, apiKey: string): string {
    const url = new URL(`${this.baseUrl}${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== '') {
        url.searchParams.append(key, String(value));
      }
    }
    url.searchParams.append('key', apiKey);
    return url.toString();
  }

  /**
   * APIリクエストを実行し、parse の結果を ApiResult で返す
   *
   * ApiError 以外の例外（実装の不具合）はそのまま投げる
   */
  private async request<T>(
    endpoint: string,
    params: QueryParams,
    parse: (payload: unknown) => T
  ): Promise<ApiResult<T>> {
    if (!this.apiKey) {
      this.logger.warn('BPS API request skipped: no token', { endpoint });
      return { ok: false, error: new MissingTokenError() };
    }

    const url = this.buildUrl(endpoint, params, this.apiKey);
    this.logger.debug('BPS API request', { endpoint, params });

    const timer = this.logger.startTimer(`BPS API ${endpoint}`);
    try {
      const payload = await fetchJson(url, { timeoutMs: this.timeoutMs }, this.fetchFn);
      const data = parse(payload);
      timer.end({ endpoint });
      return { ok: true, data };
    } catch (error) {
      if (error instanceof ApiError) {
        this.logger.warn('BPS API request failed', {
          endpoint,
          kind: error.kind,
          error,
        });
        return { ok: false, error };
      }
      throw error;
    }
  }

  /**
   * 地域（ドメイン）一覧を取得
   *
   * @param options.type all: 全て / prov: 州 / kab: 県・市（provinceId 指定時はその州の配下）
   */
  async getRegions(options?: { type?: RegionType; provinceId?: string }): Promise<ApiResult<readonly Region[]>> {
    const type = options?.type ?? 'all';
    const provinceId = options?.provinceId;
    const cacheKey = `${type}:${provinceId ?? ''}`;

    const cached = this.regionCache.get(cacheKey);
    if (cached) {
      return { ok: true, data: cached };
    }

    const apiType = type === 'kab' && provinceId ? 'kabbyprov' : type;
    const result = await this.request('/domain', { type: apiType, prov: provinceId }, (payload) => {
      const { records } = extractList(payload);
      const regions = parseWith(z.array(DomainRecordSchema), records, 'domain records').map(
        (record): Region =>
          Object.freeze({
            id: record.domain_id,
            name: cleanLabel(record.domain_name),
            level: regionLevelOf(record.domain_id),
            url: record.domain_url,
          })
      );
      // セッション中キャッシュを共有するため凍結
      return Object.freeze(regions);
    });

    if (result.ok) {
      this.regionCache.set(cacheKey, result.data);
      this.logger.info('Regions fetched', { type, count: result.data.length });
    }
    return result;
  }

  /**
   * 静的テーブル一覧を取得（結果 0 件は空配列で成功）
   */
  async getTableList(filters: TableListFilters): Promise<ApiResult<ListPage<TableSummary>>> {
    return this.request(
      '/list',
      {
        model: 'statictable',
        domain: filters.domain,
        keyword: filters.keyword?.trim(),
        page: filters.page,
        subject: filters.subjectId,
        year: filters.year,
      },
      (payload) => {
        const { records, pagination } = extractList(payload);
        const items = parseWith(z.array(StaticTableRecordSchema), records, 'static table records').map(
          (record): TableSummary => ({
            id: record.table_id,
            title: cleanLabel(record.title),
            subjectId: record.subj_id,
            subject: record.subj,
            updatedAt: record.updt_date,
            size: record.size,
            excelUrl: record.excel,
          })
        );
        return toListPage(items, pagination, filters.page);
      }
    );
  }

  /**
   * 静的テーブルを取得して TabularResult に変換
   */
  async getStaticTable(domain: string, tableId: string): Promise<ApiResult<StaticTable>> {
    const result = await this.request(
      '/view',
      { model: 'statictable', domain, id: tableId },
      (payload) => {
        const envelope = parseEnvelope(payload);
        if (
          envelope['data-availability'] !== undefined &&
          envelope['data-availability'] !== 'available'
        ) {
          throw new MalformedDataError(`Static table ${tableId} is not available`);
        }
        const view = parseWith(StaticTableViewSchema, envelope.data, 'static table');
        const tabular = htmlTableToTabular(view.table);
        if (tabular.rows.length === 0) {
          throw new MalformedDataError(`Static table ${tableId} is empty`);
        }
        return {
          id: view.table_id,
          title: cleanLabel(view.title),
          subject: view.subj,
          updatedAt: view.updt_date,
          result: tabular,
        };
      }
    );

    if (result.ok) {
      this.logger.info('Static table fetched', {
        domain,
        tableId,
        rowCount: result.data.result.rows.length,
      });
    }
    return result;
  }

  /**
   * 動的テーブル（変数）一覧を取得
   */
  async getDynamicTableList(
    domain: string,
    page?: number
  ): Promise<ApiResult<ListPage<DynamicTableSummary>>> {
    return this.request('/list', { model: 'var', domain, page }, (payload) => {
      const { records, pagination } = extractList(payload);
      const items = parseWith(z.array(DynamicVarRecordSchema), records, 'variable records').map(
        (record): DynamicTableSummary => ({
          id: record.var_id,
          title: cleanLabel(record.title),
          subjectId: record.sub_id,
          subject: record.sub_name,
          unit: record.unit,
          definition: record.def,
        })
      );
      return toListPage(items, pagination, page);
    });
  }

  /**
   * 1ドメイン分のメタデータ（vervar / turvar / th / turth）を並行取得
   */
  private async fetchMetadataFor(
    domain: string,
    varId: string
  ): Promise<ApiResult<DynamicTableMetadata>> {
    const listOf = <S extends z.ZodTypeAny>(model: string, schema: S) =>
      this.request('/list', { model, domain, var: varId }, (payload) =>
        parseWith(z.array(schema), extractList(payload).records, `${model} records`)
      );

    const [vertical, horizontal, years, derived] = await Promise.all([
      listOf('vervar', VerticalVarRecordSchema),
      listOf('turvar', HorizontalVarRecordSchema),
      listOf('th', YearRecordSchema),
      listOf('turth', DerivedYearRecordSchema),
    ]);

    if (!vertical.ok) return vertical;
    if (!horizontal.ok) return horizontal;
    if (!years.ok) return years;
    if (!derived.ok) return derived;

    return {
      ok: true,
      data: {
        verticalVars: vertical.data.map(
          (item): MetadataItem => ({
            id: item.item_ver_id,
            label: cleanLabel(item.vervar),
            code: item.kode_ver_id,
            group: item.group_ver_id,
            groupName: item.name_group_ver_id,
          })
        ),
        horizontalVars: horizontal.data.map(
          (item): MetadataItem => ({
            id: item.turvar_id,
            label: cleanLabel(item.turvar),
            group: item.group_turvar_id,
            groupName: item.name_group_turvar,
          })
        ),
        years: years.data.map(
          (item): MetadataItem => ({
            id: item.th_id,
            label: cleanLabel(item.th),
          })
        ),
        derivedYears: derived.data.map(
          (item): MetadataItem => ({
            id: item.turth_id,
            label: cleanLabel(item.turth),
            group: item.group_turth_id,
            groupName: item.name_group_turth,
          })
        ),
        sourceDomain: domain,
      },
    };
  }

  /**
   * 動的テーブルのメタデータを取得
   *
   * 地域ドメインで縦軸・横軸・年のいずれかが欠ける場合は全国（0000）で1度だけ再取得する
   */
  async getDynamicTableMetadata(
    domain: string,
    varId: string
  ): Promise<ApiResult<DynamicTableMetadata>> {
    const result = await this.fetchMetadataFor(domain, varId);
    if (!result.ok) return result;
    if (isMetadataComplete(result.data)) return result;

    if (domain !== NATIONAL_DOMAIN) {
      this.logger.info('Dynamic table metadata incomplete, falling back to national domain', {
        domain,
        tableId: varId,
      });
      const fallback = await this.fetchMetadataFor(NATIONAL_DOMAIN, varId);
      if (!fallback.ok) return fallback;
      if (isMetadataComplete(fallback.data)) return fallback;
    }

    return {
      ok: false,
      error: new MalformedDataError(`Dynamic table metadata is not available for variable ${varId}`),
    };
  }

  /**
   * 動的テーブルのデータを取得
   */
  async getDynamicTableData(request: DynamicDataRequest): Promise<ApiResult<TabularResult>> {
    const join = (ids?: string[]) => (ids && ids.length > 0 ? ids.join(';') : undefined);

    return this.request(
      '/list',
      {
        model: 'data',
        domain: request.domain,
        var: request.varId,
        th: join(request.years),
        vervar: join(request.verticalItemIds),
        turvar: join(request.horizontalIds),
        turth: join(request.derivedIds),
      },
      (payload) => {
        const envelope = parseEnvelope(payload);
        if (envelope['data-availability'] !== 'available') {
          throw new MalformedDataError('Dynamic table data is not available for the requested parameters');
        }
        return assembleDynamicTable(parseWith(DynamicDataSchema, envelope, 'dynamic table data'));
      }
    );
  }
}

/**
 * デフォルトクライアントインスタンスを作成
 */
export function createBpsClient(options?: BpsClientOptions): BpsClient {
  return new BpsClient(options);
}
