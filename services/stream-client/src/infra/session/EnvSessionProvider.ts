import type { SessionProvider } from '@/application/interfaces/SessionProvider';
import type { StreamingSession } from '@/domain/types';
import { type Env, requireEnv } from '@/infra/config/env';

/**
 * REST セッションのトークンからストリーミング用パスワードを組み立てる。
 */
export function buildStreamingPassword(cst: string, securityToken: string): string {
  return `CST-${cst}|XST-${securityToken}`;
}

/**
 * インフラ層: 環境変数からセッション情報を読む SessionProvider
 *
 * 責務: REST ログインで得た値（`STREAMING_ENDPOINT`, `ACCOUNT_ID`, `CST`, `X_SECURITY_TOKEN`）を
 * ストリーミング接続パラメータに変換する。値の中身は検証しない（存在のみ）。
 */
export class EnvSessionProvider implements SessionProvider {
  constructor(private readonly env: Env = process.env) {}

  async getStreamingSession(): Promise<StreamingSession> {
    return {
      endpoint: requireEnv('STREAMING_ENDPOINT', this.env),
      accountId: requireEnv('ACCOUNT_ID', this.env),
      password: buildStreamingPassword(
        requireEnv('CST', this.env),
        requireEnv('X_SECURITY_TOKEN', this.env)
      ),
    };
  }
}
