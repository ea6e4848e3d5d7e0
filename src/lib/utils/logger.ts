/**
 * 構造化ロギングユーティリティ
 *
 * @description 1行1JSONでコンソールに出力する。対話画面を汚さないよう既定レベルは error
 * （調査時は LOG_LEVEL=debug）
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** モジュール名 (bps-client, config-store, exporter ...) */
  module?: string;
  /** APIエンドポイント */
  endpoint?: string;
  /** BPS ドメインID（地域コード） */
  domain?: string;
  /** テーブルID / 変数ID */
  tableId?: string;
  /** ファイルパス */
  path?: string;
  /** 出力形式 */
  format?: string;
  /** 処理行数 */
  rowCount?: number;
  /** 処理時間（ミリ秒） */
  durationMs?: number;
  /** HTTPステータスコード */
  statusCode?: number;
  /** その他のコンテキスト */
  [key: string]: unknown;
}

interface LogPayload extends LogContext {
  timestamp: string;
  level: LogLevel;
  message: string;
}

/**
 * ログレベルの優先度
 */
const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_PRIORITY;
}

/**
 * 最小ログレベル
 *
 * .env は CLI 起動後に読み込まれるため、モジュールロード時ではなく出力のたびに評価する
 */
export function getMinLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    return level;
  }
  return 'error';
}

/**
 * ログを出力すべきかどうかを判定
 */
function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getMinLogLevel()];
}

/**
 * エラーオブジェクトをシリアライズ可能な形式に変換
 */
export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'), // スタックトレースを5行に制限
      ...(error.cause ? { cause: serializeError(error.cause) } : {}),
    };
  }
  return { value: String(error) };
}

/**
 * ロガーを作成
 *
 * @param defaultContext 全ログに付与するデフォルトコンテキスト
 *
 * @example
 * ```typescript
 * const logger = createLogger({ module: 'bps-client' });
 * logger.info('Static table fetched', { domain: '3500', tableId: '1234' });
 * logger.error('Request failed', { error: err, statusCode: 500 });
 * ```
 */
export function createLogger(defaultContext: LogContext = {}) {
  const log = (level: LogLevel, message: string, context: LogContext = {}) => {
    if (!shouldLog(level)) {
      return;
    }

    // エラーオブジェクトがあればシリアライズ
    const processedContext = { ...context };
    if (processedContext.error) {
      processedContext.error = serializeError(processedContext.error);
    }

    const payload: LogPayload = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...defaultContext,
      ...processedContext,
    };

    const jsonStr = JSON.stringify(payload);

    switch (level) {
      case 'error':
        console.error(jsonStr);
        break;
      case 'warn':
        console.warn(jsonStr);
        break;
      default:
        console.log(jsonStr);
    }
  };

  return {
    debug: (message: string, context?: LogContext) => log('debug', message, context),
    info: (message: string, context?: LogContext) => log('info', message, context),
    warn: (message: string, context?: LogContext) => log('warn', message, context),
    error: (message: string, context?: LogContext) => log('error', message, context),

    /**
     * 子ロガーを作成（コンテキストを追加）
     */
    child: (additionalContext: LogContext) =>
      createLogger({ ...defaultContext, ...additionalContext }),

    /**
     * 処理時間を計測するタイマーを開始
     */
    startTimer: (label: string) => {
      const startTime = Date.now();
      return {
        end: (context?: LogContext) => {
          const durationMs = Date.now() - startTime;
          log('info', `${label} completed`, { ...context, durationMs });
          return durationMs;
        },
        endWithError: (error: Error, context?: LogContext) => {
          const durationMs = Date.now() - startTime;
          log('error', `${label} failed`, { ...context, durationMs, error });
          return durationMs;
        },
      };
    },
  };
}

export type Logger = ReturnType<typeof createLogger>;
