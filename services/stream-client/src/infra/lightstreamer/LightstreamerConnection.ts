import { LightstreamerClient, Subscription } from 'lightstreamer-client-node';
import type { Logger } from '@/application/interfaces/Logger';
import type {
  PushConnection,
  PushConnectionFactory,
  PushConnectionOptions,
  PushTransport,
  UpdateListener,
} from '@/application/interfaces/PushConnection';
import { NoActiveSubscriptionsError, StreamingError } from '@/domain/errors';
import type { RawUpdate, SubscriptionDescriptor } from '@/domain/types';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';

type FieldIterator = (name: string | null, position: number, value: string | null) => void;

/**
 * ItemUpdate のうち変換に使う部分
 */
interface ItemUpdateView {
  getItemName(): string | null;
  getItemPos(): number;
  isSnapshot(): boolean;
  forEachField(iterator: FieldIterator): void;
  forEachChangedField(iterator: FieldIterator): void;
}

/**
 * ItemUpdate → RawUpdate（フィールド名で引けるマップに詰め替える）
 */
export function toRawUpdate(update: ItemUpdateView): RawUpdate {
  const fields: Record<string, string | null> = {};
  const changedFields: Record<string, string> = {};

  update.forEachField((name, _position, value) => {
    if (name !== null) {
      fields[name] = value;
    }
  });
  update.forEachChangedField((name, _position, value) => {
    if (name !== null && value !== null) {
      changedFields[name] = value;
    }
  });

  return {
    itemName: update.getItemName() ?? '',
    itemPos: update.getItemPos(),
    fields,
    changedFields,
    isSnapshot: update.isSnapshot(),
  };
}

/**
 * インフラ層: lightstreamer-client-node による PushConnection 実装
 *
 * 責務:
 * - SubscriptionDescriptor を Subscription に変換して登録
 * - クライアントの状態遷移を「セッション終了まで待つ Promise」に変換
 *
 * 初回接続前に DISCONNECTED:WILL-RETRY になった場合は失敗として返し、
 * 再試行は ConnectionManager に任せる。確立後の再接続はクライアント自身が行う。
 */
export class LightstreamerConnection implements PushConnection {
  private readonly client: LightstreamerClient;
  private readonly logger: Logger;
  private subscriptionCount = 0;

  constructor(options: PushConnectionOptions, logger?: Logger) {
    this.client = new LightstreamerClient(options.endpoint, options.adapterSet ?? undefined);
    this.client.connectionDetails.setUser(options.user);
    this.client.connectionDetails.setPassword(options.password);
    this.logger = (logger ?? LoggerFactory.create()).child({
      component: 'LightstreamerConnection',
      adapterSet: options.adapterSet ?? 'DEFAULT',
    });
  }

  subscribe(descriptor: SubscriptionDescriptor, listener: UpdateListener): void {
    const subscription = new Subscription(descriptor.mode, [...descriptor.items], [
      ...descriptor.fields,
    ]);
    if (descriptor.dataAdapter !== null) {
      subscription.setDataAdapter(descriptor.dataAdapter);
    }
    // RAW モードはスナップショットを要求できない
    subscription.setRequestedSnapshot(descriptor.snapshot && descriptor.mode !== 'RAW' ? 'yes' : 'no');

    subscription.addListener({
      onItemUpdate: (update) => {
        listener.onItemUpdate(toRawUpdate(update));
      },
      onSubscription: () => {
        this.logger.debug('Subscription confirmed', { items: descriptor.items });
        listener.onSubscription?.();
      },
      onSubscriptionError: (code: number, message: string) => {
        this.logger.warn('Subscription rejected', { items: descriptor.items, code, message });
        listener.onSubscriptionError?.(code, message);
      },
    });

    this.client.subscribe(subscription);
    this.subscriptionCount += 1;
  }

  setForcedTransport(transport: PushTransport): void {
    this.client.connectionOptions.setForcedTransport(transport);
  }

  connect(signal: AbortSignal, onConnected?: () => void): Promise<void> {
    if (this.subscriptionCount === 0) {
      return Promise.reject(new NoActiveSubscriptionsError());
    }
    if (signal.aborted) {
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      let established = false;
      let settled = false;

      const settle = (error?: Error): void => {
        if (settled) {
          return;
        }
        settled = true;
        this.client.removeListener(clientListener);
        signal.removeEventListener('abort', onAbort);
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      };

      const onAbort = (): void => {
        this.logger.info('Disconnect requested');
        this.client.disconnect();
        settle();
      };

      const clientListener = {
        onStatusChange: (status: string) => {
          this.logger.debug('Status changed', { status });
          if (status.startsWith('CONNECTED:') && status !== 'CONNECTED:STREAM-SENSING') {
            if (!established) {
              established = true;
              onConnected?.();
            }
            return;
          }
          if (status === 'DISCONNECTED:WILL-RETRY' && !established) {
            this.client.disconnect();
            settle(new StreamingError('Unable to establish streaming session'));
            return;
          }
          if (status === 'DISCONNECTED' && established) {
            settle();
          }
        },
        onServerError: (code: number, message: string) => {
          settle(new StreamingError(`Server error ${code}: ${message}`));
        },
      };

      signal.addEventListener('abort', onAbort, { once: true });
      this.client.addListener(clientListener);
      this.client.connect();
    });
  }

  async disconnect(): Promise<void> {
    this.client.disconnect();
  }
}

/**
 * StreamingClient に渡すファクトリー
 */
export function createLightstreamerConnectionFactory(logger?: Logger): PushConnectionFactory {
  return (options) => new LightstreamerConnection(options, logger);
}
