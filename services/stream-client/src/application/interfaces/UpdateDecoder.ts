import type { FieldsByDomain } from '@/domain/records';
import type { RawUpdate, StreamDomain, StreamUpdate } from '@/domain/types';

/**
 * 更新デコーダーのインターフェイス（インフラ層で実装される）。
 */
export interface UpdateDecoder {
  /**
   * 未デコードの更新をドメインごとの型付きレコードに変換する。
   * @param domain 購読のドメイン種別
   * @param raw プロトコルクライアントから受け取った更新
   * @throws {DecodeError} 数値でない値、または未知の列挙トークンを含む場合
   */
  decode<D extends StreamDomain>(domain: D, raw: RawUpdate): StreamUpdate<FieldsByDomain[D]>;
}
