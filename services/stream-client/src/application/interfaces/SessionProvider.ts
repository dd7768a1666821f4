import type { StreamingSession } from '@/domain/types';

/**
 * セッション提供元のインターフェイス（REST 側の認証結果をストリーミングへ渡す）。
 */
export interface SessionProvider {
  getStreamingSession(): Promise<StreamingSession>;
}
