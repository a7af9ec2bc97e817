import { AsyncLocalStorage } from "node:async_hooks";

/**
 * 可重入的异步互斥锁。
 *
 * 等待者按调用顺序排队；持锁回调内（同一异步上下文）再次 runExclusive 会直接执行，
 * 不会自锁。嵌套调用必须在回调返回前 await 完成。
 */
export class Mutex {
  private tail: Promise<void> = Promise.resolve();
  private readonly holder = new AsyncLocalStorage<Mutex>();
  private waiting = 0;

  /** 当前排队（含持锁者）的任务数 */
  get pending(): number {
    return this.waiting;
  }

  /** 当前异步上下文是否已持有此锁 */
  isHeldByCurrentContext(): boolean {
    return this.holder.getStore() === this;
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    if (this.isHeldByCurrentContext()) {
      return fn();
    }

    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const previous = this.tail;
    this.tail = previous.then(() => current);
    this.waiting++;

    await previous;
    try {
      return await this.holder.run(this, fn);
    } finally {
      this.waiting--;
      release();
    }
  }
}
