import type {
  PushConnection,
  PushConnectionFactory,
  PushConnectionOptions,
  PushTransport,
  UpdateListener,
} from '@/application/interfaces/PushConnection';
import { NoActiveSubscriptionsError } from '@/domain/errors';
import type { RawUpdate, SubscriptionDescriptor } from '@/domain/types';

/**
 * connect() 1 回分の振る舞い
 * - hold: 接続成功後、signal が発火するまで待つ
 * - complete: 接続成功後、すぐにセッションが終わる
 * - fail: 接続失敗
 * - no-subscriptions: 購読なしでサーバーが閉じる
 */
export type ConnectOutcome = 'hold' | 'complete' | 'fail' | 'no-subscriptions';

/**
 * テスト用プッシュ接続（プロセス内で完結する）
 */
export class PushConnectionMock implements PushConnection {
  readonly subscriptions: Array<{ descriptor: SubscriptionDescriptor; listener: UpdateListener }> =
    [];
  readonly transports: PushTransport[] = [];
  /** connect() ごとに先頭から消費する。空なら hold */
  readonly outcomes: ConnectOutcome[] = [];
  connectCalls = 0;
  /** connect() が呼ばれた時刻（偽タイマーの Date.now()） */
  readonly connectedAt: number[] = [];
  disconnectCalls = 0;
  failure: Error = new Error('connection refused');

  constructor(readonly options: PushConnectionOptions) {}

  subscribe(descriptor: SubscriptionDescriptor, listener: UpdateListener): void {
    this.subscriptions.push({ descriptor, listener });
  }

  setForcedTransport(transport: PushTransport): void {
    this.transports.push(transport);
  }

  connect(signal: AbortSignal, onConnected?: () => void): Promise<void> {
    this.connectCalls += 1;
    this.connectedAt.push(Date.now());
    const outcome = this.outcomes.shift() ?? 'hold';
    switch (outcome) {
      case 'fail':
        return Promise.reject(this.failure);
      case 'no-subscriptions':
        return Promise.reject(new NoActiveSubscriptionsError());
      case 'complete':
        onConnected?.();
        return Promise.resolve();
      case 'hold':
        onConnected?.();
        return new Promise((resolve) => {
          if (signal.aborted) {
            resolve();
            return;
          }
          signal.addEventListener('abort', () => resolve(), { once: true });
        });
    }
  }

  async disconnect(): Promise<void> {
    this.disconnectCalls += 1;
  }

  /**
   * index 番目の購読のリスナーへ更新を届ける
   */
  emit(update: RawUpdate, index = 0): void {
    const subscription = this.subscriptions[index];
    if (!subscription) {
      throw new Error(`No subscription at index ${index}`);
    }
    subscription.listener.onItemUpdate(update);
  }
}

/**
 * 生成した接続を記録するファクトリー
 */
export class PushConnectionFactoryMock {
  readonly connections: PushConnectionMock[] = [];
  /** 新しく作る接続すべてに与える振る舞い */
  readonly outcomes: ConnectOutcome[] = [];

  readonly create: PushConnectionFactory = (options) => {
    const connection = new PushConnectionMock(options);
    connection.outcomes.push(...this.outcomes);
    this.connections.push(connection);
    return connection;
  };

  /** n 番目に作られた primary 接続（データアダプターセットなし） */
  primary(index = 0): PushConnectionMock {
    return this.pick((connection) => connection.options.adapterSet === null, index);
  }

  /** n 番目に作られた secondary 接続 */
  secondary(index = 0): PushConnectionMock {
    return this.pick((connection) => connection.options.adapterSet !== null, index);
  }

  private pick(predicate: (connection: PushConnectionMock) => boolean, index: number) {
    const connection = this.connections.filter(predicate)[index];
    if (!connection) {
      throw new Error(`No connection at index ${index}`);
    }
    return connection;
  }
}
