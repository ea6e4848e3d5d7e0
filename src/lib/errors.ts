/**
 * エラー定義
 *
 * @description API・設定・エクスポートの失敗を種類ごとに識別できるエラー群。
 * `kind` で判別し、UI 側は describeError() でメッセージを得る
 */

// ============================================
// API エラー
// ============================================

export type ApiErrorKind =
  | 'network'
  | 'timeout'
  | 'http_status'
  | 'malformed_data'
  | 'missing_token';

/**
 * BPS WebAPI 呼び出しの失敗
 */
export abstract class ApiError extends Error {
  abstract readonly kind: ApiErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/**
 * 接続できなかった（DNS・接続拒否・切断など）
 */
export class NetworkError extends ApiError {
  readonly kind = 'network';

  constructor(message = 'Unable to reach the BPS server', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/**
 * タイムアウト
 */
export class TimeoutError extends ApiError {
  readonly kind = 'timeout';

  constructor(
    public readonly timeoutMs: number,
    options?: { cause?: unknown }
  ) {
    super(`Request timed out after ${timeoutMs}ms`, options);
    this.name = 'TimeoutError';
  }
}

/**
 * 2xx 以外のレスポンス
 */
export class HttpStatusError extends ApiError {
  readonly kind = 'http_status';

  constructor(
    public readonly statusCode: number,
    statusText = ''
  ) {
    super(`HTTP ${statusCode}${statusText ? `: ${statusText}` : ''}`);
    this.name = 'HttpStatusError';
  }
}

/**
 * JSON デコード失敗・必須フィールド欠落・想定外の形
 */
export class MalformedDataError extends ApiError {
  readonly kind = 'malformed_data';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MalformedDataError';
  }
}

/**
 * API トークン未設定（リクエストは送信しない）
 */
export class MissingTokenError extends ApiError {
  readonly kind = 'missing_token';

  constructor() {
    super('BPS API token is not set');
    this.name = 'MissingTokenError';
  }
}

export type ApiResult<T> = { ok: true; data: T } | { ok: false; error: ApiError };

// ============================================
// 設定エラー
// ============================================

/**
 * 設定ファイルの読み込み・検証失敗
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    options?: { cause?: unknown }
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
    this.name = 'ConfigValidationError';
  }
}

/**
 * 設定ファイルの書き込み失敗
 */
export class ConfigWriteError extends Error {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to write config file: ${path}`, options);
    this.name = 'ConfigWriteError';
  }
}

// ============================================
// エクスポートエラー
// ============================================

export class UnsupportedFormatError extends Error {
  constructor(public readonly format: string) {
    super(`Unsupported export format: ${format}`);
    this.name = 'UnsupportedFormatError';
  }
}

export class ExportWriteError extends Error {
  constructor(
    public readonly path: string,
    message = `Failed to write export file: ${path}`,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExportWriteError';
  }
}

/**
 * 出力先が既に存在し、上書きが許可されていない
 */
export class ExportFileExistsError extends ExportWriteError {
  constructor(path: string) {
    super(path, `File already exists: ${path}`);
    this.name = 'ExportFileExistsError';
  }
}

// ============================================
// 判定・表示
// ============================================

export function isApiError(error: unknown): error is ApiError {
  return error instanceof ApiError;
}

/**
 * 呼び出し側が再試行を提案してよいエラーか
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof NetworkError || error instanceof TimeoutError) {
    return true;
  }
  if (error instanceof HttpStatusError) {
    return error.statusCode === 429 || error.statusCode >= 500;
  }
  return false;
}

/**
 * ユーザー向けメッセージ
 */
export function describeError(error: unknown): string {
  if (error instanceof MissingTokenError) {
    return 'API token is not set. Run `token <your-key>` first.';
  }
  if (error instanceof NetworkError) {
    return 'No connection to the BPS server. Check your internet connection.';
  }
  if (error instanceof TimeoutError) {
    return `The BPS server did not respond within ${error.timeoutMs / 1000}s.`;
  }
  if (error instanceof HttpStatusError) {
    if (error.statusCode === 401 || error.statusCode === 403) {
      return 'The API token was rejected by the BPS server.';
    }
    if (error.statusCode === 404) {
      return 'The requested data was not found (HTTP 404).';
    }
    if (error.statusCode === 429) {
      return 'Too many requests. Wait a moment and try again.';
    }
    if (error.statusCode >= 500) {
      return `The BPS server is having problems (HTTP ${error.statusCode}).`;
    }
    return `Request rejected by the BPS server (HTTP ${error.statusCode}).`;
  }
  if (error instanceof MalformedDataError) {
    return `Unexpected data from the BPS server: ${error.message}`;
  }
  if (error instanceof UnsupportedFormatError) {
    return `Unsupported format "${error.format}". Use csv, xlsx or json.`;
  }
  if (error instanceof ExportFileExistsError) {
    return `${error.message}. Use another name or enable overwriteExports.`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
