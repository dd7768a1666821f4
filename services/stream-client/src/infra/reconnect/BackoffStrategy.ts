/**
 * インフラ層: 線形増加バックオフ戦略の実装
 *
 * 遅延は 0ms から始まり、試行ごとに STEP_DELAY × 試行番号 ずつ増える（MAX_DELAY で頭打ち）。
 * 0, 200, 600, 1200, 2000, 3000, 4200, 5000, 5000, ...
 */
export class BackoffStrategy {
  private attempt = 0;
  private delay = 0;
  private readonly STEP_DELAY = 200; // 0.2秒
  private readonly MAX_DELAY = 5000; // 5秒

  /**
   * 次の再接続までの遅延時間（ミリ秒）を取得する。
   * @returns 遅延時間（ミリ秒）
   */
  getNextDelay(): number {
    const current = this.delay;
    this.attempt += 1;
    this.delay = Math.min(this.delay + this.STEP_DELAY * this.attempt, this.MAX_DELAY);
    return current;
  }

  /**
   * バックオフカウンターをリセットする。
   */
  reset(): void {
    this.attempt = 0;
    this.delay = 0;
  }
}
