/**
 * 設定ストア
 *
 * @description ユーザーごとの設定ファイル（~/.stadata-x/config.json）の読み書き。
 * load / save / update はプロセス内で共有する1つのミューテックスで直列化する
 */

import os from 'os';
import path from 'path';
import { ConfigValidationError, ConfigWriteError } from '../errors';
import { isErrnoException, nodeFileSystem, writeFileAtomic, type FileSystem } from '../utils/fs';
import { createLogger, type LogContext } from '../utils/logger';
import { Mutex } from '../utils/mutex';
import {
  applyConfigPatch,
  createDefaultConfig,
  migrateConfig,
  validateConfig,
  type AppConfig,
  type ConfigPatch,
} from './schema';

export const CONFIG_FILE_NAME = 'config.json';

export interface ConfigLoadResult {
  config: AppConfig;
  /** ファイルから読めたか、デフォルトか */
  source: 'file' | 'defaults';
  /** 読み込み・検証に失敗した場合のエラー（config はデフォルト） */
  error: ConfigValidationError | null;
}

export interface ConfigStoreOptions {
  /** 設定ディレクトリ（省略時は STADATA_CONFIG_DIR → ~/.stadata-x） */
  configDir?: string;
  /** ファイルシステム実装（テスト用） */
  fs?: FileSystem;
  /** 排他ロック（省略時はプロセス共有のロック） */
  mutex?: Mutex;
  /** ロガーコンテキスト */
  logContext?: LogContext;
}

/** プロセス共有ロック */
const sharedMutex = new Mutex();

/**
 * 設定ディレクトリを解決
 */
export function resolveConfigDir(configDir?: string): string {
  return configDir ?? process.env.STADATA_CONFIG_DIR ?? path.join(os.homedir(), '.stadata-x');
}

export class ConfigStore {
  readonly configDir: string;
  readonly filePath: string;
  private readonly fs: FileSystem;
  private readonly mutex: Mutex;
  private readonly logger: ReturnType<typeof createLogger>;
  private current: AppConfig | null = null;

  constructor(options?: ConfigStoreOptions) {
    this.configDir = resolveConfigDir(options?.configDir);
    this.filePath = path.join(this.configDir, CONFIG_FILE_NAME);
    this.fs = options?.fs ?? nodeFileSystem;
    this.mutex = options?.mutex ?? sharedMutex;
    this.logger = createLogger({ module: 'config-store', ...options?.logContext });
  }

  /**
   * 設定を読み込む。失敗してもデフォルトを返し、例外は投げない
   */
  async load(): Promise<ConfigLoadResult> {
    return this.mutex.runExclusive(() => this.loadUnlocked());
  }

  /**
   * 設定をアトミックに保存
   *
   * @throws {ConfigValidationError} スキーマ違反（書き込み前に検出）
   * @throws {ConfigWriteError} ディレクトリ作成・書き込み・rename の失敗
   */
  async save(config: AppConfig): Promise<void> {
    await this.mutex.runExclusive(() => this.saveUnlocked(config));
  }

  /**
   * 現在の設定（初回のみファイルから読み込む）
   */
  async get(): Promise<AppConfig> {
    if (this.current) {
      return this.current;
    }
    const { config } = await this.load();
    return config;
  }

  /**
   * 読み込み → マージ → 保存を1つの排他区間で行う
   */
  async update(patch: ConfigPatch): Promise<AppConfig> {
    return this.mutex.runExclusive(async () => {
      const { config } = await this.loadUnlocked();
      const next = applyConfigPatch(config, patch);
      await this.saveUnlocked(next);
      return next;
    });
  }

  private async loadUnlocked(): Promise<ConfigLoadResult> {
    let text: string;
    try {
      text = await this.fs.readFile(this.filePath);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        this.logger.debug('Config file not found, using defaults', { path: this.filePath });
        return this.fallback(null);
      }
      return this.fallback(
        new ConfigValidationError(`Failed to read config file ${this.filePath}`, [], { cause: error })
      );
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return this.fallback(
        new ConfigValidationError(`Config file ${this.filePath} is not valid JSON`, [], {
          cause: error,
        })
      );
    }

    const result = migrateConfig(raw);
    if (!result.ok) {
      return this.fallback(
        new ConfigValidationError(`Config file ${this.filePath} is invalid`, result.issues)
      );
    }

    if (result.migratedFrom !== null) {
      this.logger.info('Config migrated', {
        path: this.filePath,
        from: result.migratedFrom,
        to: result.config.version,
      });
    }

    this.current = result.config;
    return { config: result.config, source: 'file', error: null };
  }

  private fallback(error: ConfigValidationError | null): ConfigLoadResult {
    if (error) {
      this.logger.warn('Config file rejected, using defaults', { path: this.filePath, error });
    }
    const config = createDefaultConfig();
    this.current = config;
    return { config, source: 'defaults', error };
  }

  private async saveUnlocked(config: AppConfig): Promise<void> {
    const result = validateConfig(config);
    if (!result.ok) {
      throw new ConfigValidationError('Refusing to save invalid config', result.issues);
    }

    const json = `${JSON.stringify(result.config, null, 2)}\n`;
    try {
      await this.fs.mkdir(this.configDir);
      await writeFileAtomic(this.fs, this.filePath, json);
    } catch (error) {
      this.logger.warn('Failed to save config', { path: this.filePath, error });
      throw new ConfigWriteError(this.filePath, { cause: error });
    }

    this.current = result.config;
    this.logger.debug('Config saved', { path: this.filePath });
  }
}
