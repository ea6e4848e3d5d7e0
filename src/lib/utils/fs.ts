/**
 * ファイルシステム抽象とアトミック書き込み
 *
 * @description 設定保存・エクスポートで共用。テストでは FileSystem を差し替えて I/O 失敗を再現する
 */

import { promises as fsp } from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';

export interface FileSystem {
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, data: string | Uint8Array): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  unlink(filePath: string): Promise<void>;
  mkdir(dirPath: string): Promise<void>;
  exists(filePath: string): Promise<boolean>;
  isDirectory(filePath: string): Promise<boolean>;
}

/**
 * Node.js fs/promises による実装
 */
export const nodeFileSystem: FileSystem = {
  readFile: (filePath) => fsp.readFile(filePath, 'utf-8'),
  writeFile: (filePath, data) => fsp.writeFile(filePath, data),
  rename: (from, to) => fsp.rename(from, to),
  unlink: (filePath) => fsp.unlink(filePath),
  mkdir: async (dirPath) => {
    await fsp.mkdir(dirPath, { recursive: true });
  },
  exists: async (filePath) => {
    try {
      await fsp.access(filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  },
  isDirectory: async (filePath) => {
    try {
      const stat = await fsp.stat(filePath);
      return stat.isDirectory();
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  },
};

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * 同一ディレクトリの一時ファイルを返す（rename が同一デバイス上で完結するように）
 */
export function tempPathFor(filePath: string): string {
  const dir = path.dirname(filePath);
  const base = path.basename(filePath);
  return path.join(dir, `.${base}.${randomUUID().slice(0, 8)}.tmp`);
}

/**
 * 一時ファイルに書いてから rename する。失敗時は一時ファイルを削除して元のエラーを投げる
 *
 * @example
 * ```typescript
 * await writeFileAtomic(nodeFileSystem, '/home/me/.stadata-x/config.json', json);
 * ```
 */
export async function writeFileAtomic(
  fs: FileSystem,
  filePath: string,
  data: string | Uint8Array
): Promise<void> {
  const tmpPath = tempPathFor(filePath);

  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (error) {
    try {
      await fs.unlink(tmpPath);
    } catch (cleanupError) {
      // 一時ファイルが作られる前に失敗した場合は ENOENT になる
      if (!isErrnoException(cleanupError) || cleanupError.code !== 'ENOENT') {
        throw new Error(`Failed to write ${filePath} and remove temp file ${tmpPath}`, {
          cause: error,
        });
      }
    }
    throw error;
  }
}
