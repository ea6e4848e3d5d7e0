/**
 * 非同期ミューテックス
 *
 * @description Promise チェーンで排他区間を直列化する。待機順は取得要求順
 */

export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private pending = 0;

  /**
   * ロックを取得し、解放関数を返す
   */
  async acquire(): Promise<() => void> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });

    const previous = this.tail;
    this.tail = previous.then(() => next);
    this.pending++;

    await previous;

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.pending--;
      release();
    };
  }

  /**
   * 排他区間で fn を実行（例外時もロックは解放される）
   */
  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** 保持中 + 待機中の数 */
  get size(): number {
    return this.pending;
  }

  get isLocked(): boolean {
    return this.pending > 0;
  }
}
