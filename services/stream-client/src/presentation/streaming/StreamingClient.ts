import {
  createUpdateChannel,
  type UpdateReceiver,
  type UpdateSender,
} from '@/application/channel/UpdateChannel';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { PushConnection, PushConnectionFactory } from '@/application/interfaces/PushConnection';
import type { SessionProvider } from '@/application/interfaces/SessionProvider';
import type { UpdateDecoder } from '@/application/interfaces/UpdateDecoder';
import { SubscriptionBuilder } from '@/application/subscription/SubscriptionBuilder';
import { ForwardUpdatesUsecase } from '@/application/usecases/ForwardUpdatesUsecase';
import { type ConnectionFailure, StreamingError } from '@/domain/errors';
import {
  ACCOUNT_FIELDS,
  type AccountField,
  CHART_FIELDS,
  type ChartField,
  type ChartScale,
  MARKET_FIELDS,
  type MarketField,
  PRICE_FIELDS,
  type PriceField,
} from '@/domain/fields';
import type {
  AccountUpdate,
  ChartUpdate,
  FieldsByDomain,
  MarketUpdate,
  PriceUpdate,
  TradeUpdate,
} from '@/domain/records';
import type {
  ConnectionClass,
  RawUpdate,
  StreamDomain,
  StreamingSession,
  StreamUpdate,
  SubscriptionDescriptor,
} from '@/domain/types';
import { StreamingUpdateDecoder } from '@/infra/codec/StreamingUpdateDecoder';
import { resolvePriceDataAdapter } from '@/infra/config/env';
import { createLightstreamerConnectionFactory } from '@/infra/lightstreamer/LightstreamerConnection';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { type ConnectionState, ConnectionManager } from '@/infra/reconnect/ConnectionManager';
import { createShutdownSignal } from '@/infra/process/shutdownSignal';

export interface StreamingClientOptions {
  /** 未指定の場合は lightstreamer-client-node を使う */
  connectionFactory?: PushConnectionFactory;
  decoder?: UpdateDecoder;
  /** 価格ラダーのデータアダプター名（未指定なら購読時に環境変数から解決） */
  priceDataAdapter?: string;
  logger?: Logger;
  metricsCollector?: MetricsCollector;
}

/**
 * 接続クラスごとの状態
 */
interface ConnectionSlot {
  readonly name: ConnectionClass;
  readonly connection: PushConnection;
  readonly manager: ConnectionManager;
  /** 接続終了時に閉じる転送元 */
  readonly rawSenders: UpdateSender<RawUpdate>[];
  hasSubscribers: boolean;
  started: boolean;
}

/**
 * プレゼンテーション層: ストリーミングクライアント（2 本の接続を束ねる）
 *
 * 責務:
 * - primary（market/trade/account/chart）と secondary（価格ラダー）の接続を保持
 * - ドメインごとの購読を受け付け、購読ごとに独立した受信チャネルを返す
 * - 購読者がいる接続クラスだけを並列に接続し、失敗を 1 つのエラーに集約する
 *
 * 一方の接続が失敗しても、もう一方は停止シグナルまで配信を続ける。
 * 2 本の接続の間で配信順序は保証しない。
 */
export class StreamingClient {
  private readonly primary: ConnectionSlot;
  private readonly secondary: ConnectionSlot;
  private readonly builder: SubscriptionBuilder;
  private readonly decoder: UpdateDecoder;
  private readonly logger: Logger;
  private runController: AbortController | null = null;

  /**
   * セッション情報を 1 回だけ取得してクライアントを作る。
   */
  static async create(
    sessionProvider: SessionProvider,
    options: StreamingClientOptions = {}
  ): Promise<StreamingClient> {
    const session = await sessionProvider.getStreamingSession();
    return new StreamingClient(session, options);
  }

  constructor(
    session: StreamingSession,
    private readonly options: StreamingClientOptions = {}
  ) {
    this.logger = (options.logger ?? LoggerFactory.create()).child({ component: 'StreamingClient' });
    this.decoder = options.decoder ?? new StreamingUpdateDecoder();
    this.builder = new SubscriptionBuilder(session.accountId);

    const factory = options.connectionFactory ?? createLightstreamerConnectionFactory(options.logger);
    const base = { endpoint: session.endpoint, user: session.accountId, password: session.password };

    this.primary = this.createSlot('primary', factory({ ...base, adapterSet: null }));
    this.secondary = this.createSlot(
      'secondary',
      factory({ ...base, adapterSet: options.priceDataAdapter ?? resolvePriceDataAdapter() })
    );
  }

  subscribeMarket(
    epics: Iterable<string>,
    fields: Iterable<MarketField> = MARKET_FIELDS
  ): UpdateReceiver<MarketUpdate> {
    return this.attach(this.primary, 'market', this.builder.market(epics, fields));
  }

  /**
   * 価格ラダーは専用データアダプターを持つ secondary 接続で購読する。
   */
  subscribePrice(
    epics: Iterable<string>,
    fields: Iterable<PriceField> = PRICE_FIELDS
  ): UpdateReceiver<PriceUpdate> {
    const dataAdapter = this.options.priceDataAdapter ?? resolvePriceDataAdapter();
    return this.attach(this.secondary, 'price', this.builder.price(epics, fields, dataAdapter));
  }

  subscribeTrade(): UpdateReceiver<TradeUpdate> {
    return this.attach(this.primary, 'trade', this.builder.trade());
  }

  subscribeAccount(fields: Iterable<AccountField> = ACCOUNT_FIELDS): UpdateReceiver<AccountUpdate> {
    return this.attach(this.primary, 'account', this.builder.account(fields));
  }

  subscribeChart(
    epics: Iterable<string>,
    scale: ChartScale,
    fields: Iterable<ChartField> = CHART_FIELDS
  ): UpdateReceiver<ChartUpdate> {
    return this.attach(this.primary, 'chart', this.builder.chart(epics, scale, fields));
  }

  getConnectionState(connection: ConnectionClass): ConnectionState {
    return this.slot(connection).manager.getState();
  }

  /**
   * 購読者がいる接続クラスを並列に接続し、すべて終わるまで待つ。
   * 失敗は全接続の終了後にまとめて返す。
   * @param shutdownSignal 停止シグナル（未指定の場合は SIGINT / SIGTERM）
   * @throws {StreamingError} いずれかの接続がリトライ上限を超えて失敗した場合
   */
  async connect(shutdownSignal?: AbortSignal): Promise<void> {
    const active = [this.primary, this.secondary].filter((slot) => slot.hasSubscribers);
    if (active.length === 0) {
      this.logger.warn('No subscriptions registered, nothing to connect');
      return;
    }

    const shutdown = shutdownSignal
      ? { signal: shutdownSignal, dispose: () => undefined }
      : createShutdownSignal();
    const controller = new AbortController();
    const onShutdown = (): void => controller.abort();
    if (shutdown.signal.aborted) {
      controller.abort();
    } else {
      shutdown.signal.addEventListener('abort', onShutdown, { once: true });
    }
    this.runController = controller;

    this.logger.info('Connecting', { connections: active.map((slot) => slot.name) });

    try {
      const results = await Promise.allSettled(
        active.map((slot) => this.runConnection(slot, controller.signal))
      );
      const failures: ConnectionFailure[] = results.flatMap((result, index) =>
        result.status === 'rejected' ? [{ connection: active[index].name, error: result.reason }] : []
      );
      if (failures.length > 0) {
        this.logger.error('Streaming connections failed', {
          failed: failures.map((failure) => failure.connection),
          succeeded: active.length - failures.length,
        });
        throw new StreamingError('One or more streaming connections failed', failures);
      }
      this.logger.info('All streaming connections closed');
    } finally {
      shutdown.signal.removeEventListener('abort', onShutdown);
      shutdown.dispose();
      if (this.runController === controller) {
        this.runController = null;
      }
    }
  }

  /**
   * 開始済みの接続を切断する。一度も接続していなければ何もしない。
   */
  async disconnect(): Promise<void> {
    this.runController?.abort();

    const started = [this.primary, this.secondary].filter((slot) => slot.started);
    const results = await Promise.allSettled(started.map((slot) => slot.connection.disconnect()));
    const failures: ConnectionFailure[] = results.flatMap((result, index) =>
      result.status === 'rejected' ? [{ connection: started[index].name, error: result.reason }] : []
    );
    if (failures.length > 0) {
      throw new StreamingError('Failed to disconnect streaming connections', failures);
    }
    this.logger.info('Disconnected', { connections: started.map((slot) => slot.name) });
  }

  private createSlot(name: ConnectionClass, connection: PushConnection): ConnectionSlot {
    return {
      name,
      connection,
      manager: new ConnectionManager(name, this.options.logger, this.options.metricsCollector),
      rawSenders: [],
      hasSubscribers: false,
      started: false,
    };
  }

  private slot(connection: ConnectionClass): ConnectionSlot {
    return connection === 'primary' ? this.primary : this.secondary;
  }

  /**
   * リスナーは受け取った更新をキューに積むだけにし、デコードと配信は転送タスクで行う。
   */
  private attach<D extends StreamDomain>(
    slot: ConnectionSlot,
    domain: D,
    descriptor: SubscriptionDescriptor
  ): UpdateReceiver<StreamUpdate<FieldsByDomain[D]>> {
    const raw = createUpdateChannel<RawUpdate>();
    const typed = createUpdateChannel<StreamUpdate<FieldsByDomain[D]>>();
    const usecase = new ForwardUpdatesUsecase(
      domain,
      this.decoder,
      typed.sender,
      this.logger.child({ domain }),
      this.options.metricsCollector
    );

    slot.connection.subscribe(descriptor, {
      onItemUpdate: (update) => {
        this.options.metricsCollector?.incrementReceived(domain);
        raw.sender.send(update);
      },
      onSubscription: () => {
        this.logger.info('Subscribed', { domain, items: descriptor.items });
      },
      onSubscriptionError: (code, message) => {
        this.logger.error('Subscription failed', { domain, items: descriptor.items, code, message });
      },
    });
    slot.rawSenders.push(raw.sender);
    slot.hasSubscribers = true;

    void this.forward(raw.receiver, usecase, typed.sender);
    return typed.receiver;
  }

  private async forward<D extends StreamDomain>(
    rawReceiver: UpdateReceiver<RawUpdate>,
    usecase: ForwardUpdatesUsecase<D>,
    typedSender: UpdateSender<StreamUpdate<FieldsByDomain[D]>>
  ): Promise<void> {
    try {
      for await (const update of rawReceiver) {
        if (!usecase.execute(update)) {
          this.logger.debug('Receiver dropped, stop forwarding');
          break;
        }
      }
    } catch (error) {
      this.logger.error('Forwarding task failed', { err: error });
    } finally {
      rawReceiver.close();
      typedSender.close();
    }
  }

  /**
   * 1 本の接続を最後まで実行する。失敗しても他方の接続には触れない（集約は connect() で行う）。
   */
  private async runConnection(slot: ConnectionSlot, signal: AbortSignal): Promise<void> {
    slot.started = true;
    try {
      await slot.manager.run(slot.connection, signal);
    } finally {
      for (const sender of slot.rawSenders.splice(0)) {
        sender.close();
      }
    }
  }
}
