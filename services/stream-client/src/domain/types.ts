/**
 * ドメイン層: ストリーミング購読の型定義（DTO 的な型のみ）
 *
 * 注意: プロトコル実装や接続状態は持たない。
 * 購読の「何を」「どう配信するか」と、受信した更新の形だけを表す。
 */

/**
 * 購読対象のドメイン種別。
 */
export type StreamDomain = 'market' | 'price' | 'trade' | 'account' | 'chart';

/**
 * 配信モード。
 * - MERGE: 最新値で上書き（合体）
 * - DISTINCT: すべての値を個別に配信
 * - RAW: サーバー側の加工なし
 */
export type DeliveryMode = 'MERGE' | 'DISTINCT' | 'RAW';

/**
 * 接続クラス。
 * primary は market/trade/account/chart、secondary は価格ラダー（専用データアダプター）を扱う。
 */
export type ConnectionClass = 'primary' | 'secondary';

/**
 * 購読記述子。送信後は変更しない（生成時に凍結する）。
 */
export interface SubscriptionDescriptor {
  /** ドメイン種別 */
  readonly domain: StreamDomain;
  /** 名前空間付きのアイテムキー（重複なし、挿入順） */
  readonly items: readonly string[];
  /** 要求フィールド名（重複なし、挿入順） */
  readonly fields: readonly string[];
  readonly mode: DeliveryMode;
  /** スナップショット要求の有無 */
  readonly snapshot: boolean;
  /** データアダプター名（null は接続のデフォルト） */
  readonly dataAdapter: string | null;
}

/**
 * 外部プロトコルクライアントから受け取る未デコードの更新。
 * 保持しない（デコード後に破棄する）。
 */
export interface RawUpdate {
  itemName: string;
  itemPos: number;
  /** 全フィールドの現在値（値なしは null） */
  fields: Readonly<Record<string, string | null>>;
  /** 今回変化したフィールドのみ */
  changedFields: Readonly<Record<string, string>>;
  isSnapshot: boolean;
}

/**
 * デコード済み更新のエンベロープ。
 *
 * @template F ドメインごとの型付きフィールド
 */
export interface StreamUpdate<F> {
  itemName: string;
  itemPos: number;
  fields: F;
  /** 変化したフィールドのみ値を持つ（それ以外は null） */
  changedFields: F;
  isSnapshot: boolean;
}

/**
 * ストリーミング接続に必要なセッション情報。
 * REST 側で取得済みのものを不透明な値として受け取る。
 */
export interface StreamingSession {
  /** プッシュサーバーのエンドポイント URL */
  endpoint: string;
  accountId: string;
  /** ストリーミング用パスワード（CST-...|XST-...） */
  password: string;
}
