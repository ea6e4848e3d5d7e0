/**
 * 対話 CLI のコマンド
 *
 * @description 1行の入力を解釈して出力行を返す。端末 I/O は scripts/stadata.ts が担当する
 */

import { BpsClient, type BpsClientOptions } from '../bps/client';
import type { MetadataItem, RegionType } from '../bps/types';
import type { ConfigPatch, ExportFormat } from '../config/schema';
import type { ConfigStore } from '../config/store';
import { describeError, isRetryableError, type ApiError } from '../errors';
import {
  ensureExtension,
  parseExportFormat,
  resolveExportPath,
  type DataExporter,
} from '../export/exporter';
import { createLogger } from '../utils/logger';
import { renderConfig, renderListPage, renderRegions, renderTable } from './render';

const logger = createLogger({ module: 'cli' });

export interface CommandResult {
  /** 表示する行 */
  lines: string[];
  /** 再試行を提案できる失敗か */
  retryable: boolean;
  /** ループを終了するか */
  exit: boolean;
}

export interface CommandContext {
  store: ConfigStore;
  exporter: DataExporter;
  /** 設定中のトークンでクライアントを得る */
  getClient: (token: string | null) => BpsClient;
}

const SETTING_KEYS = [
  'defaultDomain',
  'downloadPath',
  'exportFormat',
  'pageSize',
  'overwriteExports',
] as const;
type SettingKey = (typeof SETTING_KEYS)[number];

const HELP_LINES = [
  'Commands:',
  '  help                                      Show this help',
  '  token <value>                             Save the BPS API token',
  '  config                                    Show the current settings',
  `  set <key> <value>                         Change a setting (${SETTING_KEYS.join(', ')})`,
  '  regions [prov|kab] [provinceId]           List BPS regions (domains)',
  '  tables [domain] [keyword...]              Search static tables',
  '  view <domain> <tableId>                   Show a static table',
  '  export <domain> <tableId> <file> [format] Save a static table as csv, xlsx or json',
  '  dynamic <domain> [varId] [year...]        List dynamic tables, or show one',
  '  quit | exit                               Leave',
];

function done(lines: string[]): CommandResult {
  return { lines, retryable: false, exit: false };
}

function failed(error: ApiError): CommandResult {
  return {
    lines: [`Error: ${describeError(error)}`],
    retryable: isRetryableError(error),
    exit: false,
  };
}

/**
 * 入力行を単語に分割（ダブルクォートで空白を含む引数を指定できる）
 *
 * @example
 * ```typescript
 * tokenize('tables 3500 "jumlah penduduk"'); // → ['tables', '3500', 'jumlah penduduk']
 * ```
 */
export function tokenize(line: string): string[] {
  const words: string[] = [];
  for (const match of line.matchAll(/"([^"]*)"|(\S+)/g)) {
    words.push(match[1] ?? match[2]);
  }
  return words;
}

function isDomainId(value: string): boolean {
  return /^\d{4}$/.test(value);
}

function isSettingKey(value: string): value is SettingKey {
  return (SETTING_KEYS as readonly string[]).includes(value);
}

/**
 * トークンごとにクライアントを使い回す（地域キャッシュをセッション中保持するため）
 */
export function createClientProvider(
  options?: Omit<BpsClientOptions, 'apiKey'>
): (token: string | null) => BpsClient {
  let cached: { token: string | null; client: BpsClient } | null = null;
  return (token) => {
    if (!cached || cached.token !== token) {
      cached = { token, client: new BpsClient({ ...options, apiKey: token }) };
    }
    return cached.client;
  };
}

/**
 * set コマンドの値をパッチに変換
 *
 * @throws {UnsupportedFormatError} exportFormat が未対応
 */
export function parseSetting(key: SettingKey, value: string): ConfigPatch | string {
  switch (key) {
    case 'defaultDomain':
      return { defaultDomain: value };
    case 'downloadPath':
      return { downloadPath: value === 'none' ? null : value };
    case 'exportFormat':
      return { preferences: { exportFormat: parseExportFormat(value) } };
    case 'pageSize': {
      const size = Number(value);
      if (!Number.isInteger(size)) {
        return 'pageSize must be an integer';
      }
      return { preferences: { pageSize: size } };
    }
    case 'overwriteExports': {
      const normalized = value.toLowerCase();
      if (['true', 'yes', 'on'].includes(normalized)) {
        return { preferences: { overwriteExports: true } };
      }
      if (['false', 'no', 'off'].includes(normalized)) {
        return { preferences: { overwriteExports: false } };
      }
      return 'overwriteExports must be true or false';
    }
  }
}

/**
 * 年の指定（ラベル "2023" または th_id）を解決。未指定なら最新年
 */
export function selectYears(years: readonly MetadataItem[], requested: readonly string[]): MetadataItem[] | string {
  if (years.length === 0) {
    return 'No years are available for this table';
  }
  if (requested.length === 0) {
    return [years[years.length - 1]];
  }
  const selected: MetadataItem[] = [];
  for (const value of requested) {
    const year = years.find((item) => item.label === value || item.id === value);
    if (!year) {
      return `Unknown year "${value}". Available: ${years.map((item) => item.label).join(', ')}`;
    }
    selected.push(year);
  }
  return selected;
}

async function handleCommand(
  name: string,
  args: string[],
  context: CommandContext
): Promise<CommandResult> {
  switch (name) {
    case 'help':
      return done(HELP_LINES);

    case 'quit':
    case 'exit':
      return { lines: [], retryable: false, exit: true };

    case 'token': {
      if (args.length !== 1) return done(['Usage: token <value>']);
      await context.store.update({ token: args[0] });
      return done(['Token saved.']);
    }

    case 'config': {
      const config = await context.store.get();
      return done(renderConfig(config, context.store.filePath));
    }

    case 'set': {
      const [key, ...rest] = args;
      if (!key || rest.length === 0) return done(['Usage: set <key> <value>']);
      if (!isSettingKey(key)) {
        return done([`Unknown setting "${key}". Keys: ${SETTING_KEYS.join(', ')}`]);
      }
      const patch = parseSetting(key, rest.join(' '));
      if (typeof patch === 'string') return done([`Error: ${patch}`]);
      await context.store.update(patch);
      return done([`${key} = ${rest.join(' ')}`]);
    }

    case 'regions': {
      let type: RegionType = 'all';
      let provinceId: string | undefined;
      for (const arg of args) {
        if (arg === 'all' || arg === 'prov' || arg === 'kab') type = arg;
        else if (isDomainId(arg)) provinceId = arg;
        else return done(['Usage: regions [prov|kab] [provinceId]']);
      }
      const config = await context.store.get();
      const result = await context.getClient(config.token).getRegions({ type, provinceId });
      if (!result.ok) return failed(result.error);
      return done(renderRegions(result.data));
    }

    case 'tables': {
      const config = await context.store.get();
      const [first, ...rest] = args;
      const domain = first && isDomainId(first) ? first : config.defaultDomain;
      const keywordParts = first && isDomainId(first) ? rest : args;
      const keyword = keywordParts.join(' ');

      const result = await context.getClient(config.token).getTableList({
        domain,
        keyword: keyword === '' ? undefined : keyword,
      });
      if (!result.ok) return failed(result.error);
      return done(
        renderListPage(result.data, (table) => ({ id: table.id, label: table.title }), 'No tables found.')
      );
    }

    case 'view': {
      if (args.length !== 2 || !isDomainId(args[0])) return done(['Usage: view <domain> <tableId>']);
      const config = await context.store.get();
      const result = await context.getClient(config.token).getStaticTable(args[0], args[1]);
      if (!result.ok) return failed(result.error);
      return done([
        result.data.title,
        '',
        ...renderTable(result.data.result, { maxRows: config.preferences.pageSize }),
      ]);
    }

    case 'export': {
      if (args.length < 3 || args.length > 4 || !isDomainId(args[0])) {
        return done(['Usage: export <domain> <tableId> <file> [csv|xlsx|json]']);
      }
      const [domain, tableId, filename, formatArg] = args;
      const config = await context.store.get();
      // 形式の検証は取得より先に行う
      const format: ExportFormat = parseExportFormat(formatArg ?? config.preferences.exportFormat);

      const result = await context.getClient(config.token).getStaticTable(domain, tableId);
      if (!result.ok) return failed(result.error);

      const target = await resolveExportPath(ensureExtension(filename, format), config.downloadPath);
      const summary = await context.exporter.exportTable(result.data.result, target, format, {
        overwrite: config.preferences.overwriteExports,
      });
      return done([
        `Exported ${summary.rowCount} rows to ${summary.path} (${summary.format}, ${summary.bytes} bytes)`,
      ]);
    }

    case 'dynamic': {
      const [domain, varId, ...yearArgs] = args;
      if (!domain || !isDomainId(domain)) return done(['Usage: dynamic <domain> [varId] [year...]']);
      const config = await context.store.get();
      const client = context.getClient(config.token);

      if (!varId) {
        const result = await client.getDynamicTableList(domain);
        if (!result.ok) return failed(result.error);
        return done(
          renderListPage(
            result.data,
            (table) => ({ id: table.id, label: table.unit ? `${table.title} (${table.unit})` : table.title }),
            'No dynamic tables found.'
          )
        );
      }

      const metadata = await client.getDynamicTableMetadata(domain, varId);
      if (!metadata.ok) return failed(metadata.error);
      const years = selectYears(metadata.data.years, yearArgs);
      if (typeof years === 'string') return done([`Error: ${years}`]);

      // 全国にフォールバックした場合はメタデータの取得元ドメインでデータを取る
      const data = await client.getDynamicTableData({
        domain: metadata.data.sourceDomain,
        varId,
        years: years.map((year) => year.id),
      });
      if (!data.ok) return failed(data.error);
      return done([
        `Variable ${varId}, ${years.map((year) => year.label).join(', ')}`,
        '',
        ...renderTable(data.data, { maxRows: config.preferences.pageSize }),
      ]);
    }

    default:
      return done([`Unknown command "${name}". Type "help" for the list of commands.`]);
  }
}

/**
 * 1行のコマンドを実行
 *
 * API の失敗は ApiResult のまま、それ以外の失敗（設定保存・エクスポート）は例外として受け取り、
 * どちらもメッセージ行に変換する
 */
export async function runCommand(line: string, context: CommandContext): Promise<CommandResult> {
  const [name, ...args] = tokenize(line.trim());
  if (!name) {
    return done([]);
  }

  try {
    return await handleCommand(name.toLowerCase(), args, context);
  } catch (error) {
    logger.warn('Command failed', { command: name, error });
    return {
      lines: [`Error: ${describeError(error)}`],
      retryable: isRetryableError(error),
      exit: false,
    };
  }
}
