import type { ConnectionClass } from './types';

export type DecodeErrorKind = 'InvalidNumber' | 'UnknownEnumValue';

/**
 * フィールド値のデコード失敗。
 * 1 件の更新だけを失敗させる（ストリーム全体は止めない）。
 */
export class DecodeError extends Error {
  constructor(
    public readonly kind: DecodeErrorKind,
    public readonly field: string,
    public readonly value: string
  ) {
    super(
      kind === 'InvalidNumber'
        ? `Failed to parse ${field} as number: ${value}`
        : `Unknown value for ${field}: ${value}`
    );
    this.name = 'DecodeError';
  }
}

/**
 * 購読パラメータや設定値の不正。呼び出し時点で同期的に投げ、再試行しない。
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * API の誤用（共有レシーバーの二重取得など）。再試行可能な状態ではない。
 */
export class StreamUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StreamUsageError';
  }
}

/**
 * 接続ごとの失敗内容
 */
export interface ConnectionFailure {
  connection: ConnectionClass;
  error: unknown;
}

/**
 * 接続系のエラー（リトライ上限超過、集約エラー、切断失敗）。
 */
export class StreamingError extends Error {
  constructor(
    message: string,
    public readonly failures: readonly ConnectionFailure[] = [],
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'StreamingError';
  }
}

/**
 * 購読が 1 件もない接続をサーバーが閉じたことを表す。
 * 正常終了として扱う。
 */
export class NoActiveSubscriptionsError extends Error {
  constructor(message = 'No active subscriptions to serve') {
    super(message);
    this.name = 'NoActiveSubscriptionsError';
  }
}
