/**
 * 计数信号量：限制同时进行中的远端调用数量
 * 任务结束（包括抛错）时总会释放，排队者按 FIFO 顺序获得许可
 */
export class CountingGate {
  private available: number;
  private readonly waiters: Array<() => void> = [];
  private active = 0;
  private peak = 0;

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency bound must be a positive integer, got ${capacity}`);
    }
    this.available = capacity;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get maxObserved(): number {
    return this.peak;
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      this.markActive();
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiters.push(() => {
        this.markActive();
        resolve();
      });
    });
  }

  private release(): void {
    this.active--;
    const next = this.waiters.shift();
    if (next) {
      // 许可直接移交给下一个等待者
      next();
    } else {
      this.available = Math.min(this.capacity, this.available + 1);
    }
  }

  private markActive(): void {
    this.active++;
    this.peak = Math.max(this.peak, this.active);
  }
}
