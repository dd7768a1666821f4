/**
 * 送信側ハンドル（フォワーディングタスクが保持する）
 */
export interface UpdateSender<T> {
  /**
   * 値をキューに積む。
   * @returns 受信側が破棄済み、または送信側が閉じている場合は false
   */
  send(value: T): boolean;
  /** これ以上送らない。バッファ済みの値は受信側で読み切れる */
  close(): void;
  readonly closed: boolean;
}

/**
 * 受信側ハンドル（呼び出し元が所有する）。
 * for await で読み、ループを抜けると受信側は破棄される。
 */
export interface UpdateReceiver<T> extends AsyncIterable<T> {
  next(): Promise<IteratorResult<T, undefined>>;
  /** 受信側を破棄する。未読の値は捨て、以降の send は false を返す */
  close(): void;
  /** 未読の件数 */
  readonly size: number;
  readonly closed: boolean;
}

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined };

/** 読み出し済みの先頭がこの件数を超えたら詰め直す */
const COMPACT_THRESHOLD = 1024;

class ChannelState<T> {
  private buffer: T[] = [];
  /** 次に読む位置（先頭からの削除を避ける） */
  private head = 0;
  readonly waiters: Array<(result: IteratorResult<T, undefined>) => void> = [];
  senderClosed = false;
  receiverDropped = false;

  get pending(): number {
    return this.buffer.length - this.head;
  }

  push(value: T): void {
    this.buffer.push(value);
  }

  /**
   * 先頭の値を取り出す。pending > 0 のときだけ呼ぶ。
   */
  take(): T {
    const value = this.buffer[this.head];
    this.head += 1;
    if (this.head === this.buffer.length) {
      this.discard();
    } else if (this.head > COMPACT_THRESHOLD && this.head * 2 > this.buffer.length) {
      this.buffer = this.buffer.slice(this.head);
      this.head = 0;
    }
    return value;
  }

  discard(): void {
    this.buffer = [];
    this.head = 0;
  }

  finishWaiters(): void {
    for (const waiter of this.waiters.splice(0)) {
      waiter(DONE);
    }
  }
}

class ChannelSender<T> implements UpdateSender<T> {
  constructor(private readonly state: ChannelState<T>) {}

  get closed(): boolean {
    return this.state.senderClosed || this.state.receiverDropped;
  }

  send(value: T): boolean {
    if (this.closed) {
      return false;
    }
    const waiter = this.state.waiters.shift();
    if (waiter) {
      waiter({ done: false, value });
    } else {
      this.state.push(value);
    }
    return true;
  }

  close(): void {
    this.state.senderClosed = true;
    // 待機者がいる = バッファは空
    this.state.finishWaiters();
  }
}

class ChannelReceiver<T> implements UpdateReceiver<T> {
  constructor(private readonly state: ChannelState<T>) {}

  get size(): number {
    return this.state.pending;
  }

  get closed(): boolean {
    return this.state.receiverDropped || (this.state.senderClosed && this.state.pending === 0);
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.state.pending > 0) {
      const value = this.state.take();
      return Promise.resolve({ done: false, value });
    }
    if (this.state.senderClosed || this.state.receiverDropped) {
      return Promise.resolve(DONE);
    }
    return new Promise((resolve) => {
      this.state.waiters.push(resolve);
    });
  }

  close(): void {
    this.state.receiverDropped = true;
    this.state.discard();
    this.state.finishWaiters();
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve(DONE);
      },
    };
  }
}

/**
 * アプリケーション層: 無制限の非同期キュー（コールバック → ストリーム変換）
 *
 * 責務: プロトコルのリスナーから受け取った値を、呼び出し元が所有する受信側へ渡す。
 * 上限はない（消費されなければ増え続ける）。
 */
export function createUpdateChannel<T>(): { sender: UpdateSender<T>; receiver: UpdateReceiver<T> } {
  const state = new ChannelState<T>();
  return { sender: new ChannelSender(state), receiver: new ChannelReceiver(state) };
}
