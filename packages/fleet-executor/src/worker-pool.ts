/**
 * A unit whose caller is answered by `result` while its pool slot stays taken
 * until `settled`.
 */
export interface HeldTask<T> {
  readonly result: Promise<T>;
  readonly settled: Promise<unknown>;
}

/**
 * Bounded-concurrency FIFO runner. One pool is meant to be shared by every
 * caller so the process never holds more than `concurrency` device sessions.
 */
export class WorkerPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer, got ${concurrency}.`);
    }
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.hold(() => {
      const result = task();
      return { result, settled: result };
    });
  }

  /**
   * Sessions abandoned at a deadline keep counting against the bound until
   * the device call behind them returns.
   */
  hold<T>(task: () => HeldTask<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const release = (): void => {
        this.active -= 1;
        this.queue.shift()?.();
      };

      const start = (): void => {
        this.active += 1;
        let held: HeldTask<T>;
        try {
          held = task();
        } catch (error) {
          release();
          reject(error);
          return;
        }
        void held.result.then(resolve, reject);
        void held.settled.then(release, release);
      };

      if (this.active < this.concurrency) {
        start();
      } else {
        this.queue.push(start);
      }
    });
  }

  get running(): number {
    return this.active;
  }

  get waiting(): number {
    return this.queue.length;
  }
}
