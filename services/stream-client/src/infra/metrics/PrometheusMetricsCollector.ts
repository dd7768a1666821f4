import { Counter, Registry } from 'prom-client';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { StreamDomain } from '@/domain/types';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してストリーミング層のメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly receivedCounter: Counter;
  private readonly deliveredCounter: Counter;
  private readonly decodeErrorCounter: Counter;
  private readonly connectionFailureCounter: Counter;

  constructor() {
    this.register = new Registry();

    this.receivedCounter = new Counter({
      name: 'stream_updates_received_total',
      help: 'Total number of raw updates received from the push connection',
      labelNames: ['domain'],
      registers: [this.register],
    });

    this.deliveredCounter = new Counter({
      name: 'stream_updates_delivered_total',
      help: 'Total number of decoded updates delivered to update channels',
      labelNames: ['domain'],
      registers: [this.register],
    });

    this.decodeErrorCounter = new Counter({
      name: 'stream_decode_errors_total',
      help: 'Total number of updates dropped because a field failed to decode',
      labelNames: ['domain', 'kind'],
      registers: [this.register],
    });

    this.connectionFailureCounter = new Counter({
      name: 'stream_connection_failures_total',
      help: 'Total number of failed connection attempts',
      labelNames: ['connection'],
      registers: [this.register],
    });
  }

  incrementReceived(domain: StreamDomain): void {
    this.receivedCounter.inc({ domain });
  }

  incrementDelivered(domain: StreamDomain): void {
    this.deliveredCounter.inc({ domain });
  }

  incrementDecodeError(domain: StreamDomain, kind: string): void {
    this.decodeErrorCounter.inc({ domain, kind });
  }

  incrementConnectionFailure(connection: string): void {
    this.connectionFailureCounter.inc({ connection });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): Registry {
    return this.register;
  }
}
