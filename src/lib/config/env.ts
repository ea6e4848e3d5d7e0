/**
 * 環境変数の読み込みと検証
 *
 * @description カレントディレクトリの .env を dotenv で読み込み、zod で検証する
 */

import { config } from 'dotenv';
import { resolve } from 'path';
import { z } from 'zod';

/**
 * 環境変数ロード済みフラグ（重複ロード防止）
 */
let envLoaded = false;

export const EnvSchema = z.object({
  BPS_API_KEY: z.string().min(1).optional(),
  BPS_BASE_URL: z.string().url().optional(),
  BPS_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  STADATA_CONFIG_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

export type AppEnv = z.infer<typeof EnvSchema>;

/**
 * 環境変数エラー
 */
export class EnvironmentError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid environment variables: ${issues.join('; ')}`);
    this.name = 'EnvironmentError';
  }
}

/**
 * 空文字の変数は未設定として扱う
 */
function pickDefined(source: NodeJS.ProcessEnv): Record<string, string> {
  const picked: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = source[key];
    if (value !== undefined && value.trim() !== '') {
      picked[key] = value.trim();
    }
  }
  return picked;
}

/**
 * 環境変数を検証
 *
 * @throws {EnvironmentError} 値の形式が不正な場合
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  const result = EnvSchema.safeParse(pickDefined(source));
  if (!result.success) {
    throw new EnvironmentError(
      result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  return result.data;
}

/**
 * .env を読み込んでから検証する
 *
 * @param envPath .env のパス（デフォルト: カレントディレクトリの .env）
 * @throws {EnvironmentError} 値の形式が不正な場合
 */
export function loadEnv(envPath: string = resolve(process.cwd(), '.env')): AppEnv {
  if (!envLoaded) {
    // 既存の環境変数は上書きしない
    config({ path: envPath });
    envLoaded = true;
  }
  return parseEnv(process.env);
}
