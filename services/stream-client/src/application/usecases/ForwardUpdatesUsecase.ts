import type { UpdateSender } from '@/application/channel/UpdateChannel';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { UpdateDecoder } from '@/application/interfaces/UpdateDecoder';
import { DecodeError } from '@/domain/errors';
import type { FieldsByDomain } from '@/domain/records';
import type { RawUpdate, StreamDomain, StreamUpdate } from '@/domain/types';

/**
 * アプリケーション層: 更新転送ユースケース
 *
 * 責務: 未デコードの更新をデコードし、購読ごとのチャネルへ渡す司令塔。
 * デコードに失敗した更新は 1 件だけ捨てる（ストリームは止めない）。
 */
export class ForwardUpdatesUsecase<D extends StreamDomain> {
  constructor(
    private readonly domain: D,
    private readonly decoder: UpdateDecoder,
    private readonly sender: UpdateSender<StreamUpdate<FieldsByDomain[D]>>,
    private readonly logger: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {}

  /**
   * @returns 受信側が破棄済みで、以降の転送が不要な場合は false
   */
  execute(raw: RawUpdate): boolean {
    let update: StreamUpdate<FieldsByDomain[D]>;
    try {
      update = this.decoder.decode(this.domain, raw);
    } catch (error) {
      if (!(error instanceof DecodeError)) {
        throw error;
      }
      this.logger.warn('Dropping update that failed to decode', {
        domain: this.domain,
        item: raw.itemName,
        field: error.field,
        value: error.value,
        kind: error.kind,
      });
      this.metricsCollector?.incrementDecodeError(this.domain, error.kind);
      return !this.sender.closed;
    }

    if (!this.sender.send(update)) {
      return false;
    }
    this.metricsCollector?.incrementDelivered(this.domain);
    return true;
  }
}
