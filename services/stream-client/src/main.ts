import 'dotenv/config';
import process from 'node:process';
import type { UpdateReceiver } from '@/application/channel/UpdateChannel';
import type { Logger } from '@/application/interfaces/Logger';
import { parseList, parsePort, requireEnv } from '@/infra/config/env';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { EnvSessionProvider } from '@/infra/session/EnvSessionProvider';
import { StreamingClient } from '@/presentation/streaming/StreamingClient';

/**
 * 受信チャネルを読み切るまでログに出す
 */
async function drain<T extends { itemName: string }>(
  receiver: UpdateReceiver<T>,
  logger: Logger
): Promise<void> {
  for await (const update of receiver) {
    logger.info('update', { item: update.itemName, update });
  }
}

/**
 * エントリーポイント: アプリケーションの起動処理、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と購読の登録
 * - SIGINT/SIGTERM までストリーミングを継続
 *
 * 注意: 接続・再試行・デコードは StreamingClient 以下に任せ、ここでは「配線するだけ」にする。
 */
async function bootstrap(): Promise<void> {
  const logger = LoggerFactory.create();

  // `.env` から購読対象を取得。必須項目なので未設定ならエラー。
  const epics = parseList(requireEnv('EPICS'));
  const metricsPort = parsePort(process.env.METRICS_PORT, 9464);

  const metricsCollector = new PrometheusMetricsCollector();
  const metricsServer = new MetricsServer(metricsCollector, metricsPort, logger);

  // セッション情報は 1 回だけ取得する
  const client = await StreamingClient.create(new EnvSessionProvider(), {
    logger,
    metricsCollector,
  });

  const consumers = [
    drain(client.subscribeMarket(epics), logger.child({ domain: 'market' })),
    drain(client.subscribeAccount(), logger.child({ domain: 'account' })),
    drain(client.subscribeTrade(), logger.child({ domain: 'trade' })),
  ];

  await metricsServer.start();
  try {
    // SIGINT/SIGTERM を受けるか、接続が致命的に失敗するまで戻らない
    await client.connect();
    await Promise.all(consumers);
  } finally {
    await client.disconnect();
    await metricsServer.stop();
  }
  logger.info('Stream client stopped');
}

bootstrap().catch((error) => {
  LoggerFactory.create().error('Failed to run stream client', { err: error });
  process.exit(1);
});
