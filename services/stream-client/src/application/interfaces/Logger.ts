/**
 * ロガーインターフェース
 *
 * 構造化ログを出力する。実装は pino（infra/logger）。
 * エラーは meta の `err` キーに入れる（例: `logger.error('...', { err: error })`）。
 */
export interface Logger {
  debug(msg: string, meta?: object): void;

  info(msg: string, meta?: object): void;

  warn(msg: string, meta?: object): void;

  error(msg: string, meta?: object): void;

  /**
   * 子ロガーを作成
   * component, connection, domain などのコンテキストを自動付与するために使用
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: object): Logger;
}
