import process from 'node:process';

export interface ShutdownSignal {
  readonly signal: AbortSignal;
  /** プロセスシグナルのリスナーを外す */
  dispose(): void;
}

/**
 * SIGINT / SIGTERM で発火する AbortSignal を作る。
 * 使い終わったら dispose() でリスナーを外す。
 */
export function createShutdownSignal(): ShutdownSignal {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals): void => {
    controller.abort(new Error(`Received ${name}`));
  };

  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return {
    signal: controller.signal,
    dispose: () => {
      process.off('SIGINT', onSignal);
      process.off('SIGTERM', onSignal);
    },
  };
}

/**
 * signal が発火するまで待つ
 */
export function waitForAbort(signal: AbortSignal): Promise<void> {
  if (signal.aborted) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
