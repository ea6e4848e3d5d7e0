/**
 * HTTP GET ユーティリティ
 *
 * @description タイムアウト付き fetch と失敗の分類。自動リトライはしない
 * （再試行するかどうかは呼び出し側が isRetryableError() で判断する）
 */

import {
  HttpStatusError,
  MalformedDataError,
  NetworkError,
  TimeoutError,
} from '../errors';

export interface FetchJsonOptions {
  /** リクエストタイムアウト（ミリ秒、デフォルト: 30000） */
  timeoutMs?: number;
  /** 追加ヘッダー */
  headers?: Record<string, string>;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * AbortSignal.timeout() による中断かどうか
 */
function isTimeoutAbort(error: unknown): boolean {
  return (
    error instanceof Error &&
    (error.name === 'TimeoutError' || error.name === 'AbortError')
  );
}

/**
 * fetch の例外を API エラーに分類
 */
export function classifyFetchError(error: unknown, timeoutMs: number): NetworkError | TimeoutError {
  if (isTimeoutAbort(error)) {
    return new TimeoutError(timeoutMs, { cause: error });
  }
  // undici は接続失敗を TypeError('fetch failed') で投げ、原因を cause に持つ
  if (error instanceof Error && isTimeoutAbort(error.cause)) {
    return new TimeoutError(timeoutMs, { cause: error });
  }
  return new NetworkError(undefined, { cause: error });
}

/**
 * GET して JSON を返す
 *
 * @throws {NetworkError} 接続失敗
 * @throws {TimeoutError} timeoutMs 経過
 * @throws {HttpStatusError} 2xx 以外
 * @throws {MalformedDataError} JSON として解釈できない本文
 *
 * @example
 * ```typescript
 * const payload = await fetchJson('https://webapi.bps.go.id/v1/api/domain?type=all&key=xxx', {
 *   timeoutMs: 10000,
 * });
 * ```
 */
export async function fetchJson(
  url: string,
  options?: FetchJsonOptions,
  fetchFn: FetchFn = fetch
): Promise<unknown> {
  const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: Response;
  try {
    response = await fetchFn(url, {
      method: 'GET',
      headers: {
        Accept: 'application/json',
        ...options?.headers,
      },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw classifyFetchError(error, timeoutMs);
  }

  if (!response.ok) {
    throw new HttpStatusError(response.status, response.statusText);
  }

  let text: string;
  try {
    text = await response.text();
  } catch (error) {
    throw classifyFetchError(error, timeoutMs);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedDataError(`Response is not valid JSON: ${text.slice(0, 200)}`, {
      cause: error,
    });
  }
}
