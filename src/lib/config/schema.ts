/**
 * 設定ファイルのスキーマとマイグレーション
 *
 * @description version 1（api_token / download_path のスネークケース）から現行 version 2 への移行は
 * 欠けているキーをデフォルトで補うだけ。型が違う値は補正せず不正として扱う
 */

import { z } from 'zod';

export const CURRENT_CONFIG_VERSION = 2;

export const EXPORT_FORMATS = ['csv', 'xlsx', 'json'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

/** 全国（Indonesia）のドメインID */
export const NATIONAL_DOMAIN = '0000';

export const PreferencesSchema = z.object({
  exportFormat: z.enum(EXPORT_FORMATS),
  pageSize: z.number().int().min(1).max(500),
  overwriteExports: z.boolean(),
});

export const AppConfigSchema = z.object({
  version: z.literal(CURRENT_CONFIG_VERSION),
  token: z.string().min(1).nullable(),
  defaultDomain: z.string().regex(/^\d{4}$/, 'defaultDomain must be a 4-digit BPS domain id'),
  downloadPath: z.string().min(1).nullable(),
  preferences: PreferencesSchema,
});

export type Preferences = z.infer<typeof PreferencesSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

export type ConfigPatch = Partial<Omit<AppConfig, 'version' | 'preferences'>> & {
  preferences?: Partial<Preferences>;
};

export const DEFAULT_CONFIG: AppConfig = {
  version: CURRENT_CONFIG_VERSION,
  token: null,
  defaultDomain: NATIONAL_DOMAIN,
  downloadPath: null,
  preferences: {
    exportFormat: 'csv',
    pageSize: 20,
    overwriteExports: false,
  },
};

/**
 * デフォルト設定のコピーを返す（呼び出し側での変更が DEFAULT_CONFIG に波及しないように）
 */
export function createDefaultConfig(): AppConfig {
  return { ...DEFAULT_CONFIG, preferences: { ...DEFAULT_CONFIG.preferences } };
}

/** version 1 のキー → version 2 のキー */
const LEGACY_KEYS: Record<string, keyof AppConfig> = {
  api_token: 'token',
  download_path: 'downloadPath',
  default_domain: 'defaultDomain',
};

export type MigrationResult =
  | { ok: true; config: AppConfig; migratedFrom: number | null }
  | { ok: false; issues: string[] };

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * 設定値を検証
 */
export function validateConfig(value: unknown): MigrationResult {
  const result = AppConfigSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, issues: formatIssues(result.error) };
  }
  return { ok: true, config: result.data, migratedFrom: null };
}

/**
 * 読み込んだ JSON を現行スキーマへ移行して検証
 *
 * - version なし → version 1 とみなす
 * - 旧 version: レガシーキーを改名し、欠けているキーをデフォルトで補う
 * - 現行より新しい version は拒否
 */
export function migrateConfig(raw: unknown): MigrationResult {
  if (!isPlainObject(raw)) {
    return { ok: false, issues: ['config must be a JSON object'] };
  }

  const version = raw.version ?? 1;
  if (typeof version !== 'number' || !Number.isInteger(version) || version < 1) {
    return { ok: false, issues: [`version: expected a positive integer, got ${JSON.stringify(version)}`] };
  }
  if (version > CURRENT_CONFIG_VERSION) {
    return {
      ok: false,
      issues: [`version: ${version} is newer than supported version ${CURRENT_CONFIG_VERSION}`],
    };
  }
  if (version === CURRENT_CONFIG_VERSION) {
    return validateConfig(raw);
  }

  const candidate: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    const renamed = LEGACY_KEYS[key];
    if (renamed) {
      // 新旧両方のキーがあれば新しいキーを優先
      if (!(renamed in raw)) {
        candidate[renamed] = value;
      }
    } else {
      candidate[key] = value;
    }
  }

  const defaults = createDefaultConfig();
  const preferences = candidate.preferences;
  const migrated = {
    ...defaults,
    ...candidate,
    version: CURRENT_CONFIG_VERSION,
    preferences:
      preferences === undefined
        ? defaults.preferences
        : isPlainObject(preferences)
          ? { ...defaults.preferences, ...preferences }
          : preferences,
  };

  const result = validateConfig(migrated);
  if (!result.ok) {
    return result;
  }
  return { ok: true, config: result.config, migratedFrom: version };
}

/**
 * パッチを適用（preferences は1階層マージ）
 */
export function applyConfigPatch(config: AppConfig, patch: ConfigPatch): AppConfig {
  return {
    ...config,
    ...patch,
    version: CURRENT_CONFIG_VERSION,
    preferences: { ...config.preferences, ...patch.preferences },
  };
}
