#!/usr/bin/env node
/**
 * BPS 統計データ CLI
 *
 * @description 地域・静的テーブル・動的テーブルを対話的に検索し、CSV / xlsx / JSON に保存する
 *
 * @example
 * ```
 * npm start
 * stadata-x> token <your-key>
 * stadata-x> tables 3500 penduduk
 * stadata-x> export 3500 1234 penduduk.xlsx
 * ```
 */

import { createInterface } from 'readline/promises';
import { stdin as input, stdout as output } from 'process';
import { createClientProvider, runCommand, type CommandContext } from '../src/lib/cli/commands';
import { loadEnv } from '../src/lib/config/env';
import { ConfigStore } from '../src/lib/config/store';
import { describeError } from '../src/lib/errors';
import { DataExporter } from '../src/lib/export/exporter';

const PROMPT = 'stadata-x> ';

async function main(): Promise<void> {
  const env = loadEnv();

  const store = new ConfigStore({ configDir: env.STADATA_CONFIG_DIR });
  const { error } = await store.load();
  if (error) {
    console.warn(`Warning: ${describeError(error)}`);
    console.warn('Using default settings. Saving any setting will replace the file.');
  }

  const context: CommandContext = {
    store,
    exporter: new DataExporter(),
    getClient: createClientProvider({ baseUrl: env.BPS_BASE_URL, timeoutMs: env.BPS_TIMEOUT_MS }),
  };

  const rl = createInterface({ input, output });
  let closed = false;
  const whenClosed = new Promise<null>((resolve) =>
    rl.once('close', () => {
      closed = true;
      resolve(null);
    })
  );
  rl.on('SIGINT', () => rl.close());

  // 入力が閉じられたら（Ctrl+D / Ctrl+C）null
  const ask = async (query: string): Promise<string | null> => {
    try {
      return await Promise.race([rl.question(query), whenClosed]);
    } catch (error) {
      if (closed) return null;
      throw error;
    }
  };

  console.log('BPS statistics browser. Type "help" for commands.');

  try {
    for (;;) {
      const line = await ask(PROMPT);
      if (line === null) break;

      let result = await runCommand(line, context);
      for (;;) {
        for (const text of result.lines) console.log(text);
        if (!result.retryable) break;
        const answer = await ask('Retry? [y/N] ');
        if (answer === null || answer.trim().toLowerCase() !== 'y') break;
        result = await runCommand(line, context);
      }

      if (result.exit) break;
    }
  } finally {
    if (!closed) rl.close();
  }
}

main().catch((error) => {
  console.error('Fatal error:', describeError(error));
  process.exit(1);
});
