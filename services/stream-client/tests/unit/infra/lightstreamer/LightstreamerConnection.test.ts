import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import type { UpdateListener } from '@/application/interfaces/PushConnection';
import { NoActiveSubscriptionsError, StreamingError } from '@/domain/errors';
import type { SubscriptionDescriptor } from '@/domain/types';
import { LightstreamerConnection, toRawUpdate } from '@/infra/lightstreamer/LightstreamerConnection';

interface ClientListenerStub {
  onStatusChange?(status: string): void;
  onServerError?(code: number, message: string): void;
}

interface SubscriptionListenerStub {
  onItemUpdate?(update: unknown): void;
  onSubscription?(): void;
  onSubscriptionError?(code: number, message: string): void;
}

const lightstreamer = vi.hoisted(() => {
  class FakeSubscription {
    dataAdapter: string | null = null;
    snapshot: string | null = null;
    readonly listeners: SubscriptionListenerStub[] = [];

    constructor(
      readonly mode: string,
      readonly items: string[],
      readonly fields: string[]
    ) {}

    setDataAdapter(name: string): void {
      this.dataAdapter = name;
    }

    setRequestedSnapshot(value: string): void {
      this.snapshot = value;
    }

    addListener(listener: SubscriptionListenerStub): void {
      this.listeners.push(listener);
    }
  }

  class FakeClient {
    static instances: FakeClient[] = [];

    user: string | null = null;
    password: string | null = null;
    forcedTransport: string | null = null;
    readonly listeners: ClientListenerStub[] = [];
    readonly subscriptions: FakeSubscription[] = [];
    connectCalls = 0;
    disconnectCalls = 0;

    readonly connectionDetails = {
      setUser: (user: string) => {
        this.user = user;
      },
      setPassword: (password: string) => {
        this.password = password;
      },
    };

    readonly connectionOptions = {
      setForcedTransport: (transport: string) => {
        this.forcedTransport = transport;
      },
    };

    constructor(
      readonly serverAddress: string,
      readonly adapterSet: string | undefined
    ) {
      FakeClient.instances.push(this);
    }

    subscribe(subscription: FakeSubscription): void {
      this.subscriptions.push(subscription);
    }

    addListener(listener: ClientListenerStub): void {
      this.listeners.push(listener);
    }

    removeListener(listener: ClientListenerStub): void {
      const index = this.listeners.indexOf(listener);
      if (index >= 0) {
        this.listeners.splice(index, 1);
      }
    }

    connect(): void {
      this.connectCalls += 1;
    }

    disconnect(): void {
      this.disconnectCalls += 1;
    }

    status(status: string): void {
      for (const listener of [...this.listeners]) {
        listener.onStatusChange?.(status);
      }
    }

    serverError(code: number, message: string): void {
      for (const listener of [...this.listeners]) {
        listener.onServerError?.(code, message);
      }
    }
  }

  return { FakeClient, FakeSubscription };
});

vi.mock('lightstreamer-client-node', () => ({
  LightstreamerClient: lightstreamer.FakeClient,
  Subscription: lightstreamer.FakeSubscription,
}));

/**
 * ItemUpdate の最小スタブ
 */
function itemUpdate(
  itemName: string | null,
  fields: Array<[string, string | null]>,
  changed: string[]
) {
  return {
    getItemName: () => itemName,
    getItemPos: () => 2,
    isSnapshot: () => true,
    forEachField: (iterator: (name: string | null, position: number, value: string | null) => void) => {
      fields.forEach(([name, value], index) => iterator(name, index + 1, value));
    },
    forEachChangedField: (
      iterator: (name: string | null, position: number, value: string | null) => void
    ) => {
      fields
        .filter(([name]) => changed.includes(name))
        .forEach(([name, value], index) => iterator(name, index + 1, value));
    },
  };
}

/**
 * 単体テスト: LightstreamerConnection
 *
 * lightstreamer-client-node をプロセス内の偽クライアントに差し替えて、
 * 状態遷移 → Promise の変換と購読の組み立てを確認する。
 */
describe('LightstreamerConnection', () => {
  const descriptor: SubscriptionDescriptor = {
    domain: 'market',
    mode: 'MERGE',
    items: ['MARKET:A', 'MARKET:B'],
    fields: ['BID', 'OFFER'],
    dataAdapter: null,
    snapshot: true,
  };

  let loggerMock: LoggerMock;
  let listener: UpdateListener;

  beforeEach(() => {
    lightstreamer.FakeClient.instances.length = 0;
    loggerMock = new LoggerMock();
    listener = {
      onItemUpdate: vi.fn(),
      onSubscription: vi.fn(),
      onSubscriptionError: vi.fn(),
    };
  });

  function createConnection(adapterSet: string | null = null) {
    const connection = new LightstreamerConnection(
      { endpoint: 'https://push.example.test', adapterSet, user: 'ACC-001', password: 'test-secret' },
      loggerMock
    );
    const client = lightstreamer.FakeClient.instances[0];
    return { connection, client };
  }

  describe('constructor', () => {
    it('エンドポイント・アダプターセット・認証情報を設定する', () => {
      const { client } = createConnection('Pricing');

      expect(client.serverAddress).toBe('https://push.example.test');
      expect(client.adapterSet).toBe('Pricing');
      expect(client.user).toBe('ACC-001');
      expect(client.password).toBe('test-secret');
    });

    it('アダプターセットが null ならサーバーのデフォルトを使う', () => {
      const { client } = createConnection(null);

      expect(client.adapterSet).toBeUndefined();
    });
  });

  describe('subscribe()', () => {
    it('記述子どおりの Subscription を登録する', () => {
      const { connection, client } = createConnection();

      connection.subscribe(descriptor, listener);

      const subscription = client.subscriptions[0];
      expect(subscription.mode).toBe('MERGE');
      expect(subscription.items).toEqual(['MARKET:A', 'MARKET:B']);
      expect(subscription.fields).toEqual(['BID', 'OFFER']);
      expect(subscription.dataAdapter).toBeNull();
      expect(subscription.snapshot).toBe('yes');
    });

    it('データアダプターを指定できる', () => {
      const { connection, client } = createConnection('Pricing');

      connection.subscribe({ ...descriptor, dataAdapter: 'Pricing' }, listener);

      expect(client.subscriptions[0].dataAdapter).toBe('Pricing');
    });

    it('RAW モードではスナップショットを要求しない', () => {
      const { connection, client } = createConnection();

      connection.subscribe({ ...descriptor, mode: 'RAW', snapshot: true }, listener);

      expect(client.subscriptions[0].snapshot).toBe('no');
    });

    it('更新を RawUpdate に変換してリスナーへ渡す', () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);

      client.subscriptions[0].listeners[0].onItemUpdate?.(
        itemUpdate('MARKET:A', [['BID', '1.1'], ['OFFER', '1.2']], ['BID'])
      );

      expect(listener.onItemUpdate).toHaveBeenCalledWith({
        itemName: 'MARKET:A',
        itemPos: 2,
        fields: { BID: '1.1', OFFER: '1.2' },
        changedFields: { BID: '1.1' },
        isSnapshot: true,
      });
    });

    it('購読の受理・拒否をリスナーへ渡す', () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);
      const subscriptionListener = client.subscriptions[0].listeners[0];

      subscriptionListener.onSubscription?.();
      subscriptionListener.onSubscriptionError?.(21, 'Bad item');

      expect(listener.onSubscription).toHaveBeenCalledTimes(1);
      expect(listener.onSubscriptionError).toHaveBeenCalledWith(21, 'Bad item');
      expect(loggerMock.messages('warn')).toEqual(['Subscription rejected']);
    });
  });

  describe('setForcedTransport()', () => {
    it('クライアントのトランスポートを固定する', () => {
      const { connection, client } = createConnection();

      connection.setForcedTransport('WS-STREAMING');

      expect(client.forcedTransport).toBe('WS-STREAMING');
    });
  });

  describe('connect()', () => {
    it('購読がなければ NoActiveSubscriptionsError で reject し、接続しない', async () => {
      const { connection, client } = createConnection();

      await expect(connection.connect(new AbortController().signal)).rejects.toThrow(
        NoActiveSubscriptionsError
      );
      expect(client.connectCalls).toBe(0);
    });

    it('開始前に停止シグナルが発火していれば接続しない', async () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);
      const controller = new AbortController();
      controller.abort();

      await connection.connect(controller.signal);

      expect(client.connectCalls).toBe(0);
    });

    it('CONNECTED:WS-STREAMING で onConnected を呼び、DISCONNECTED で resolve する', async () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);
      const onConnected = vi.fn();

      const session = connection.connect(new AbortController().signal, onConnected);
      client.status('CONNECTING');
      client.status('CONNECTED:STREAM-SENSING');
      expect(onConnected).not.toHaveBeenCalled();

      client.status('CONNECTED:WS-STREAMING');
      client.status('CONNECTED:WS-STREAMING');
      expect(onConnected).toHaveBeenCalledTimes(1);

      client.status('DISCONNECTED');
      await expect(session).resolves.toBeUndefined();
      expect(client.listeners).toHaveLength(0);
    });

    it('確立前の DISCONNECTED:WILL-RETRY は失敗として reject する', async () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);

      const session = connection.connect(new AbortController().signal);
      client.status('CONNECTING');
      client.status('DISCONNECTED:WILL-RETRY');

      await expect(session).rejects.toThrow(StreamingError);
      await expect(session).rejects.toThrow('Unable to establish streaming session');
      expect(client.disconnectCalls).toBe(1);
    });

    it('確立後の DISCONNECTED:WILL-RETRY ではクライアントの再接続に任せて待ち続ける', async () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);
      const controller = new AbortController();

      const session = connection.connect(controller.signal);
      client.status('CONNECTED:WS-STREAMING');
      client.status('DISCONNECTED:WILL-RETRY');
      client.status('CONNECTED:WS-STREAMING');

      expect(client.listeners).toHaveLength(1);
      controller.abort();
      await expect(session).resolves.toBeUndefined();
    });

    it('サーバーエラーで reject する', async () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);

      const session = connection.connect(new AbortController().signal);
      client.serverError(1, 'User/password check failed');

      await expect(session).rejects.toThrow('Server error 1: User/password check failed');
    });

    it('停止シグナルで切断して resolve する', async () => {
      const { connection, client } = createConnection();
      connection.subscribe(descriptor, listener);
      const controller = new AbortController();

      const session = connection.connect(controller.signal);
      client.status('CONNECTED:WS-STREAMING');
      controller.abort();

      await expect(session).resolves.toBeUndefined();
      expect(client.disconnectCalls).toBe(1);
      expect(loggerMock.messages('info')).toContain('Disconnect requested');
    });
  });

  describe('disconnect()', () => {
    it('未接続でもエラーにしない', async () => {
      const { connection, client } = createConnection();

      await expect(connection.disconnect()).resolves.toBeUndefined();
      expect(client.disconnectCalls).toBe(1);
    });
  });
});

describe('toRawUpdate()', () => {
  it('名前のないフィールドは捨て、変更フィールドから null を除く', () => {
    const update = itemUpdate(
      null,
      [
        ['BID', null],
        ['OFFER', '1.5'],
      ],
      ['BID', 'OFFER']
    );

    expect(toRawUpdate(update)).toEqual({
      itemName: '',
      itemPos: 2,
      fields: { BID: null, OFFER: '1.5' },
      changedFields: { OFFER: '1.5' },
      isSnapshot: true,
    });
  });
});
