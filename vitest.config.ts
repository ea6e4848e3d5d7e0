import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    // 環境: Node.js（ブラウザAPIは不使用）
    environment: 'node',

    // グローバルAPI有効（describe, it, expect をimport不要に）
    globals: true,

    // テストファイルパターン
    include: ['src/tests/**/*.test.ts'],

    // セットアップファイル
    setupFiles: ['./src/tests/setup.ts'],

    // タイムアウト（ms）
    testTimeout: 10000,

    // モック設定
    mockReset: true,
    restoreMocks: true,

    // カバレッジ
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: [
        // utils
        'src/lib/utils/fs.ts',
        'src/lib/utils/html.ts',
        'src/lib/utils/http.ts',
        'src/lib/utils/logger.ts',
        'src/lib/utils/mutex.ts',
        'src/lib/errors.ts',
        // config
        'src/lib/config/env.ts',
        'src/lib/config/schema.ts',
        'src/lib/config/store.ts',
        // BPS WebAPI
        'src/lib/bps/client.ts',
        'src/lib/bps/html-table.ts',
        'src/lib/bps/dynamic-table.ts',
        'src/lib/tabular/result.ts',
        // export
        'src/lib/export/csv.ts',
        'src/lib/export/xlsx.ts',
        'src/lib/export/exporter.ts',
        // cli
        'src/lib/cli/commands.ts',
        'src/lib/cli/render.ts',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
    },
  },

  // パスエイリアス
  resolve: {
    alias: {
      '@': path.resolve(__dirname, './src'),
    },
  },
});
