import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { PushConnection } from '@/application/interfaces/PushConnection';
import { NoActiveSubscriptionsError, StreamingError } from '@/domain/errors';
import type { ConnectionClass } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { BackoffStrategy } from '@/infra/reconnect/BackoffStrategy';
import { sleep } from '@/infra/reconnect/sleep';

export type ConnectionState = 'idle' | 'connecting' | 'connected' | 'disconnected' | 'failed';

/**
 * インフラ層: 1 本のプッシュ接続の接続ループ（試行回数に上限あり）
 *
 * 責務:
 * - 接続失敗時に BackoffStrategy の遅延を挟んで再試行する（最大 MAX_ATTEMPTS 回）
 * - 「購読なし」による切断は正常終了として扱う
 * - 停止シグナルは試行の合間に確認する（実行中の試行は中断しない）
 *
 * 状態遷移: idle → connecting → connected → (disconnected | failed)
 */
export class ConnectionManager {
  static readonly MAX_ATTEMPTS = 3;

  private state: ConnectionState = 'idle';
  private readonly logger: Logger;

  /**
   * @param name 接続クラス（ログとメトリクスのラベル）
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    private readonly name: ConnectionClass,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({
      component: 'ConnectionManager',
      connection: name,
    });
  }

  getState(): ConnectionState {
    return this.state;
  }

  /**
   * 接続が終わるか、停止シグナルが発火するまで待つ。
   * @param connection 接続ハンドル（この呼び出しの間は専有する）
   * @param signal 協調的な停止シグナル
   * @throws {StreamingError} MAX_ATTEMPTS 回すべて失敗した場合
   */
  async run(connection: PushConnection, signal: AbortSignal): Promise<void> {
    const backoff = new BackoffStrategy();
    let lastError: unknown;

    for (let attempt = 1; attempt <= ConnectionManager.MAX_ATTEMPTS; attempt += 1) {
      if (signal.aborted) {
        this.state = 'disconnected';
        this.logger.info('Connection cancelled', { attempt });
        return;
      }

      connection.setForcedTransport('WS-STREAMING');
      this.state = 'connecting';

      try {
        await connection.connect(signal, () => {
          this.state = 'connected';
          this.logger.info('Connection established', { attempt });
        });
        this.state = 'disconnected';
        this.logger.info('Connection closed gracefully');
        return;
      } catch (error) {
        if (error instanceof NoActiveSubscriptionsError) {
          this.state = 'disconnected';
          this.logger.info('Connection closed: no active subscriptions');
          return;
        }
        lastError = error;
        this.logger.error('Connection attempt failed', { attempt, err: error });

        // メトリクス収集: 接続失敗回数
        if (this.metricsCollector) {
          this.metricsCollector.incrementConnectionFailure(this.name);
        }
      }

      if (attempt < ConnectionManager.MAX_ATTEMPTS) {
        const delay = backoff.getNextDelay();
        this.logger.warn('Retrying connection', { nextAttempt: attempt + 1, delayMs: delay });
        await sleep(delay, signal);
      }
    }

    this.state = 'failed';
    throw new StreamingError(
      `${this.name} connection failed after ${ConnectionManager.MAX_ATTEMPTS} attempts`,
      [{ connection: this.name, error: lastError }],
      { cause: lastError }
    );
  }
}
