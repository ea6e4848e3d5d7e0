/**
 * データエクスポート
 *
 * @description TabularResult を CSV / xlsx / JSON でファイルに書き出す。
 * 書き込みは一時ファイル + rename で行い、失敗時に途中のファイルを残さない
 */

import path from 'path';
import { EXPORT_FORMATS, type ExportFormat } from '../config/schema';
import { ExportFileExistsError, ExportWriteError, UnsupportedFormatError } from '../errors';
import type { TabularResult } from '../tabular/result';
import { nodeFileSystem, writeFileAtomic, type FileSystem } from '../utils/fs';
import { createLogger, type LogContext, type Logger } from '../utils/logger';
import { toCsv, UTF8_BOM } from './csv';
import { buildWorkbook } from './xlsx';

export interface ExportOptions {
  /** 既存ファイルを上書きするか（デフォルト: false） */
  overwrite?: boolean;
}

export interface ExportSummary {
  path: string;
  format: ExportFormat;
  rowCount: number;
  bytes: number;
}

export interface DataExporterOptions {
  /** ファイルシステム実装（テスト用） */
  fs?: FileSystem;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

export function isExportFormat(value: string): value is ExportFormat {
  return (EXPORT_FORMATS as readonly string[]).includes(value);
}

/**
 * 形式名を正規化（大文字・先頭ドットを許容）
 *
 * @throws {UnsupportedFormatError}
 */
export function parseExportFormat(value: string): ExportFormat {
  const normalized = value.trim().toLowerCase().replace(/^\./, '');
  if (!isExportFormat(normalized)) {
    throw new UnsupportedFormatError(value);
  }
  return normalized;
}

/**
 * ファイル名に拡張子がなければ形式の拡張子を付ける
 */
export function ensureExtension(filename: string, format: ExportFormat): string {
  return path.extname(filename) === '' ? `${filename}.${format}` : filename;
}

/**
 * 出力先パスを決定
 *
 * downloadPath が既存ディレクトリならその下、そうでなければカレントディレクトリ
 */
export async function resolveExportPath(
  filename: string,
  downloadPath: string | null,
  fs: FileSystem = nodeFileSystem
): Promise<string> {
  if (path.isAbsolute(filename)) {
    return filename;
  }
  if (downloadPath && (await fs.isDirectory(downloadPath))) {
    return path.join(downloadPath, filename);
  }
  return path.resolve(process.cwd(), filename);
}

/**
 * 形式ごとにシリアライズ
 */
export async function serializeTable(
  result: TabularResult,
  format: ExportFormat
): Promise<string | Uint8Array> {
  switch (format) {
    case 'csv':
      return UTF8_BOM + toCsv(result);
    case 'xlsx':
      return buildWorkbook(result);
    case 'json':
      return `${JSON.stringify(result.rows, null, 4)}\n`;
  }
}

export class DataExporter {
  private readonly fs: FileSystem;
  private readonly logger: Logger;

  constructor(options?: DataExporterOptions) {
    this.fs = options?.fs ?? nodeFileSystem;
    this.logger = createLogger({ module: 'exporter', ...options?.logContext });
  }

  /**
   * TabularResult をファイルに書き出す
   *
   * @throws {UnsupportedFormatError} 未対応の形式（I/O の前に検出）
   * @throws {ExportFileExistsError} 出力先が存在し overwrite が false
   * @throws {ExportWriteError} 書き込み失敗（ファイルは作成されない）
   */
  async exportTable(
    result: TabularResult,
    filePath: string,
    format: string,
    options?: ExportOptions
  ): Promise<ExportSummary> {
    const exportFormat = parseExportFormat(format);

    let data: string | Uint8Array;
    try {
      data = await serializeTable(result, exportFormat);
      if (!options?.overwrite && (await this.fs.exists(filePath))) {
        throw new ExportFileExistsError(filePath);
      }
      await writeFileAtomic(this.fs, filePath, data);
    } catch (error) {
      if (error instanceof ExportWriteError) {
        throw error;
      }
      this.logger.warn('Export failed', { path: filePath, format: exportFormat, error });
      throw new ExportWriteError(filePath, undefined, { cause: error });
    }

    const bytes = typeof data === 'string' ? Buffer.byteLength(data, 'utf-8') : data.byteLength;
    this.logger.info('Table exported', {
      path: filePath,
      format: exportFormat,
      rowCount: result.rows.length,
      bytes,
    });

    return { path: filePath, format: exportFormat, rowCount: result.rows.length, bytes };
  }
}

/**
 * デフォルトインスタンスでエクスポート
 */
export async function exportTable(
  result: TabularResult,
  filePath: string,
  format: string,
  options?: ExportOptions
): Promise<ExportSummary> {
  return new DataExporter().exportTable(result, filePath, format, options);
}
