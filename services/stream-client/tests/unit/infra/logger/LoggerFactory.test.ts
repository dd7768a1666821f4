import { afterEach, describe, expect, it, vi } from 'vitest';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { PinoLogger } from '@/infra/logger/PinoLogger';

vi.mock('@/infra/logger/PinoLogger', () => ({
  PinoLogger: vi.fn(),
}));

/**
 * 単体テスト: LoggerFactory
 *
 * PinoLogger はモックに差し替え、pino-pretty のトランスポートを起動しない。
 */
describe('LoggerFactory', () => {
  afterEach(() => {
    LoggerFactory.reset();
    vi.unstubAllEnvs();
  });

  it('同じインスタンスを返す', () => {
    const first = LoggerFactory.create();
    const second = LoggerFactory.create();

    expect(first).toBe(second);
    expect(PinoLogger).toHaveBeenCalledTimes(1);
  });

  it('LOG_LEVEL と NODE_ENV から設定を決める', () => {
    vi.stubEnv('LOG_LEVEL', 'debug');
    vi.stubEnv('NODE_ENV', 'production');

    LoggerFactory.create();

    expect(PinoLogger).toHaveBeenCalledWith({ level: 'debug', pretty: false });
  });

  it('reset() 後は新しいインスタンスを作る', () => {
    LoggerFactory.create();
    LoggerFactory.reset();
    LoggerFactory.create();

    expect(PinoLogger).toHaveBeenCalledTimes(2);
  });
});
