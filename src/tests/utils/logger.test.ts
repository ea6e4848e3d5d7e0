import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { createLogger, getMinLogLevel, serializeError } from '@/lib/utils/logger';

describe('utils/logger.ts', () => {
  const originalEnv = process.env;
  let logSpy: MockInstance<typeof console.log>;
  let warnSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    process.env = { ...originalEnv };
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  function lastPayload(spy: MockInstance<typeof console.log>): Record<string, unknown> {
    const call = spy.mock.calls.at(-1);
    return JSON.parse(String(call?.[0]));
  }

  describe('getMinLogLevel', () => {
    it('未設定なら error', () => {
      delete process.env.LOG_LEVEL;
      expect(getMinLogLevel()).toBe('error');
    });

    it('大文字小文字を区別せず読み取る', () => {
      process.env.LOG_LEVEL = 'DEBUG';
      expect(getMinLogLevel()).toBe('debug');
    });

    it('不正な値は error', () => {
      process.env.LOG_LEVEL = 'verbose';
      expect(getMinLogLevel()).toBe('error');
    });
  });

  describe('createLogger', () => {
    it('既定では warn 以下を出力しない', () => {
      delete process.env.LOG_LEVEL;
      const logger = createLogger({ module: 'test' });

      logger.info('hidden');
      logger.warn('hidden');
      logger.error('shown');

      expect(logSpy).not.toHaveBeenCalled();
      expect(warnSpy).not.toHaveBeenCalled();
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('1行の JSON にデフォルトコンテキストとメッセージを含める', () => {
      process.env.LOG_LEVEL = 'info';
      const logger = createLogger({ module: 'bps-client' });

      logger.info('Regions fetched', { domain: '3500' });

      const payload = lastPayload(logSpy);
      expect(payload).toMatchObject({
        level: 'info',
        message: 'Regions fetched',
        module: 'bps-client',
        domain: '3500',
      });
      expect(typeof payload.timestamp).toBe('string');
    });

    it('レベルに応じて console のメソッドを使い分ける', () => {
      process.env.LOG_LEVEL = 'debug';
      const logger = createLogger();

      logger.debug('d');
      logger.warn('w');
      logger.error('e');

      expect(logSpy).toHaveBeenCalledTimes(1);
      expect(warnSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('error コンテキストをシリアライズする', () => {
      const logger = createLogger();
      logger.error('failed', { error: new Error('boom') });

      expect(lastPayload(errorSpy).error).toMatchObject({ name: 'Error', message: 'boom' });
    });

    it('child はコンテキストを引き継いで追加する', () => {
      process.env.LOG_LEVEL = 'info';
      const child = createLogger({ module: 'exporter' }).child({ format: 'csv' });

      child.info('written');

      expect(lastPayload(logSpy)).toMatchObject({ module: 'exporter', format: 'csv' });
    });

    it('startTimer は処理時間を記録する', () => {
      process.env.LOG_LEVEL = 'info';
      const timer = createLogger().startTimer('BPS API /domain');

      const durationMs = timer.end();

      expect(durationMs).toBeGreaterThanOrEqual(0);
      expect(lastPayload(logSpy)).toMatchObject({
        message: 'BPS API /domain completed',
        durationMs,
      });
    });
  });

  describe('serializeError', () => {
    it('cause を再帰的にシリアライズする', () => {
      const error = new Error('outer', { cause: new Error('inner') });
      expect(serializeError(error)).toMatchObject({
        message: 'outer',
        cause: { message: 'inner' },
      });
    });

    it('スタックは5行までに制限する', () => {
      const serialized = serializeError(new Error('deep'));
      expect(String(serialized.stack).split('\n').length).toBeLessThanOrEqual(5);
    });

    it('Error 以外は文字列化する', () => {
      expect(serializeError(42)).toEqual({ value: '42' });
    });
  });
});
