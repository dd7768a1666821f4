import { createUpdateChannel, type UpdateReceiver } from '@/application/channel/UpdateChannel';
import type { Logger } from '@/application/interfaces/Logger';
import { ConfigurationError, StreamUsageError } from '@/domain/errors';
import { MARKET_FIELDS, type MarketField } from '@/domain/fields';
import type { MarketUpdate } from '@/domain/records';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { createShutdownSignal, waitForAbort } from '@/infra/process/shutdownSignal';
import { sleep } from '@/infra/reconnect/sleep';
import type { StreamingClient } from './StreamingClient';

/**
 * プレゼンテーション層: 実行時に銘柄を増減できるマーケット購読
 *
 * 責務:
 * - 購読したい銘柄集合（epic）を保持する唯一の情報源
 * - 集合が変わったら接続を止め、猶予時間後に新しい StreamingClient で張り直す
 * - どの接続から来た更新も 1 本の共有チャネルに流す
 *
 * プロトコルが差分購読を持たないため、変更のたびに切断・再接続する。
 * 再接続処理は直列に実行する（短時間の連続変更はその回数だけ再接続する）。
 */
export class DynamicMarketStream {
  static readonly RECONNECT_GRACE_MS = 500;

  private readonly epics = new Set<string>();
  private readonly fields: readonly MarketField[];
  private readonly channel = createUpdateChannel<MarketUpdate>();
  private readonly logger: Logger;
  private receiverTaken = false;
  private client: StreamingClient | null = null;
  private shutdown: AbortController | null = null;
  private connected = false;
  private active = false;
  private queue: Promise<void> = Promise.resolve();

  /**
   * @param createClient 接続のたびに新しい StreamingClient を作る
   * @param fields 購読するマーケットフィールド
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   */
  constructor(
    private readonly createClient: () => Promise<StreamingClient>,
    fields: Iterable<MarketField> = MARKET_FIELDS,
    logger?: Logger
  ) {
    this.fields = [...new Set(fields)];
    if (this.fields.length === 0) {
      throw new ConfigurationError('At least one field is required');
    }
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'DynamicMarketStream' });
  }

  /**
   * 銘柄を追加する。既に含まれていれば何もしない。
   */
  async add(epic: string): Promise<void> {
    if (epic === '' || /\s/.test(epic)) {
      throw new ConfigurationError(`Invalid epic: "${epic}"`);
    }
    if (this.epics.has(epic)) {
      return;
    }
    this.epics.add(epic);
    this.logger.info('Epic added', { epic, count: this.epics.size });
    if (this.active) {
      await this.reconnect();
    }
  }

  /**
   * 銘柄を削除する。含まれていなければ何もしない。
   */
  async remove(epic: string): Promise<void> {
    if (!this.epics.delete(epic)) {
      return;
    }
    this.logger.info('Epic removed', { epic, count: this.epics.size });
    if (this.active) {
      await this.reconnect();
    }
  }

  /**
   * 集合を空にする（再接続はしない）。
   */
  clear(): void {
    this.epics.clear();
  }

  getEpics(): string[] {
    return [...this.epics];
  }

  isConnected(): boolean {
    return this.connected;
  }

  /**
   * 共有チャネルの受信側を返す。2 回目以降の呼び出しはエラー。
   * @throws {StreamUsageError}
   */
  getReceiver(): UpdateReceiver<MarketUpdate> {
    if (this.receiverTaken) {
      throw new StreamUsageError('Receiver already taken');
    }
    this.receiverTaken = true;
    return this.channel.receiver;
  }

  /**
   * 現在の銘柄集合で配信を開始する（集合が空なら接続しない）。
   */
  async start(): Promise<void> {
    if (this.active) {
      return;
    }
    this.active = true;
    await this.enqueue(() => this.startInternal());
  }

  /**
   * 接続を止め、猶予時間後に現在の銘柄集合で張り直す。
   */
  reconnect(): Promise<void> {
    return this.enqueue(async () => {
      this.stopCurrent();
      await sleep(DynamicMarketStream.RECONNECT_GRACE_MS);
      if (!this.active) {
        return;
      }
      await this.startInternal();
    });
  }

  /**
   * 開始し、停止シグナルを受けたら切断する。
   * @param signal 停止シグナル（未指定の場合は SIGINT / SIGTERM）
   */
  async connect(signal?: AbortSignal): Promise<void> {
    const shutdown = signal ? { signal, dispose: () => undefined } : createShutdownSignal();
    try {
      await this.start();
      await waitForAbort(shutdown.signal);
    } finally {
      shutdown.dispose();
      await this.disconnect();
    }
  }

  /**
   * 配信を止める。銘柄集合と共有チャネルはそのまま残る。
   */
  async disconnect(): Promise<void> {
    this.active = false;
    await this.enqueue(async () => {
      const client = this.client;
      this.stopCurrent();
      if (client) {
        await client.disconnect();
      }
    });
    this.logger.info('Dynamic market stream disconnected');
  }

  /**
   * 切断し、共有チャネルも閉じる（受信側の for await が終わる）。
   */
  async close(): Promise<void> {
    await this.disconnect();
    this.channel.sender.close();
  }

  /**
   * 再接続系の処理を直列化する。失敗は戻り値の Promise で呼び出し元へ返す。
   */
  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private stopCurrent(): void {
    if (this.shutdown) {
      this.logger.info('Stopping current connection');
      this.shutdown.abort();
    }
    this.shutdown = null;
    this.client = null;
    this.connected = false;
  }

  private async startInternal(): Promise<void> {
    if (this.epics.size === 0) {
      this.logger.info('No epics to stream, staying disconnected');
      return;
    }

    const epics = [...this.epics];
    const client = await this.createClient();
    const receiver = client.subscribeMarket(epics, this.fields);
    const shutdown = new AbortController();

    this.client = client;
    this.shutdown = shutdown;
    this.connected = true;

    void this.pipe(receiver);
    void this.runClient(client, shutdown.signal);
    this.logger.info('Streaming started', { epics });
  }

  private async runClient(client: StreamingClient, signal: AbortSignal): Promise<void> {
    try {
      await client.connect(signal);
    } catch (error) {
      this.logger.error('Streaming connection failed', { err: error });
    } finally {
      // 既に張り直していれば新しい接続の状態には触れない
      if (this.client === client) {
        this.client = null;
        this.shutdown = null;
        this.connected = false;
      }
    }
  }

  private async pipe(receiver: UpdateReceiver<MarketUpdate>): Promise<void> {
    for await (const update of receiver) {
      if (!this.channel.sender.send(update)) {
        this.logger.warn('Shared receiver dropped, discarding updates');
        break;
      }
    }
  }
}
