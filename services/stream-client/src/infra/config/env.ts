import { DEFAULT_PRICE_DATA_ADAPTER } from '@/application/subscription/SubscriptionBuilder';
import { ConfigurationError } from '@/domain/errors';

export type Env = Readonly<Record<string, string | undefined>>;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @param key 環境変数名
 * @param env 参照する環境（テストで差し替える）
 * @throws {ConfigurationError} 環境変数が未設定の場合
 */
export function requireEnv(key: string, env: Env = process.env): string {
  const value = env[key];
  if (!value) {
    throw new ConfigurationError(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * 価格ラダーのデータアダプター名。
 * 環境ごとに名前が異なるため `STREAMING_PRICE_ADAPTER` で上書きできる。
 */
export function resolvePriceDataAdapter(env: Env = process.env): string {
  const value = env.STREAMING_PRICE_ADAPTER?.trim();
  return value ? value : DEFAULT_PRICE_DATA_ADAPTER;
}

/**
 * カンマ区切りのリストを配列にする（空要素は捨てる）
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
}

/**
 * ポート番号。未設定ならデフォルト値。
 * @throws {ConfigurationError} 1..65535 の整数でない場合
 */
export function parsePort(value: string | undefined, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port: ${value}`);
  }
  return port;
}
