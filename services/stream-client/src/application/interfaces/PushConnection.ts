import type { RawUpdate, SubscriptionDescriptor } from '@/domain/types';

/**
 * 強制するトランスポート（ポーリングへのフォールバックを許さない）
 */
export type PushTransport = 'WS-STREAMING';

/**
 * 購読ごとのリスナー
 */
export interface UpdateListener {
  onItemUpdate(update: RawUpdate): void;
  /** サーバーが購読を受理した */
  onSubscription?(): void;
  onSubscriptionError?(code: number, message: string): void;
}

/**
 * プッシュ接続の生成パラメータ
 */
export interface PushConnectionOptions {
  endpoint: string;
  /** null の場合はサーバーのデフォルトアダプターセット */
  adapterSet: string | null;
  user: string;
  password: string;
}

/**
 * プッシュ接続のインターフェイス（インフラ層で実装される）。
 *
 * 責務: 1 本の接続を表す。ワイヤー形式やハートビートは実装側が持つ。
 */
export interface PushConnection {
  /**
   * 購読を登録する（接続前でも可）。
   */
  subscribe(descriptor: SubscriptionDescriptor, listener: UpdateListener): void;

  /**
   * 次回以降の接続で使うトランスポートを固定する。
   */
  setForcedTransport(transport: PushTransport): void;

  /**
   * 接続し、セッションが終わるまで待つ。
   * signal が発火した場合は切断して resolve する。
   * @param signal 協調的な停止シグナル
   * @param onConnected セッション確立時に呼ばれる
   * @throws {NoActiveSubscriptionsError} 提供すべき購読がない場合
   */
  connect(signal: AbortSignal, onConnected?: () => void): Promise<void>;

  /**
   * 切断する。未接続でもエラーにしない。
   */
  disconnect(): Promise<void>;
}

export type PushConnectionFactory = (options: PushConnectionOptions) => PushConnection;
