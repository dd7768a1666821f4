import type { StreamDomain } from '@/domain/types';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: ストリーミング層のメトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * プロトコルクライアントから受け取った更新数をカウント
   * @param domain ドメイン種別（market, price, trade, account, chart）
   */
  incrementReceived(domain: StreamDomain): void;

  /**
   * デコードして受信側へ渡した更新数をカウント
   */
  incrementDelivered(domain: StreamDomain): void;

  /**
   * デコード失敗数をカウント
   * @param kind エラー種別（InvalidNumber, UnknownEnumValue）
   */
  incrementDecodeError(domain: StreamDomain, kind: string): void;

  /**
   * 失敗した接続試行数をカウント
   * @param connection 接続クラス（primary, secondary）
   */
  incrementConnectionFailure(connection: string): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
