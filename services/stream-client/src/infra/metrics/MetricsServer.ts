import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

/**
 * メトリクス HTTP サーバー
 *
 * 責務: /metrics エンドポイントで Prometheus 形式のメトリクスを公開
 */
export class MetricsServer {
  private server: Server | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly metricsCollector: MetricsCollector,
    private readonly port: number,
    logger?: Logger
  ) {
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'MetricsServer' });
  }

  /**
   * HTTP サーバーを起動し、listen 完了を待つ
   */
  start(): Promise<void> {
    const server = createServer((req, res) => {
      void this.handle(req, res);
    });
    this.server = server;

    return new Promise((resolve) => {
      server.listen(this.port, () => {
        this.logger.info('Metrics server started', { port: this.port });
        resolve();
      });
    });
  }

  /**
   * HTTP サーバーを停止
   */
  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  private async handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    if (req.url !== '/metrics' || req.method !== 'GET') {
      res.statusCode = 404;
      res.end('Not Found');
      return;
    }
    try {
      const metrics = await this.metricsCollector.getMetrics();
      res.setHeader('Content-Type', this.metricsCollector.getRegistry().contentType);
      res.statusCode = 200;
      res.end(metrics);
    } catch (error) {
      this.logger.error('Failed to get metrics', { err: error });
      res.statusCode = 500;
      res.end('Internal Server Error');
    }
  }
}
