import { abortReason, systemClock, type Clock } from "./clock.js";

type Waiter = {
  resolve: () => void;
  reject: (err: Error) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
};

/**
 * Minimum-interval gate shared by every caller of a GeneratorClient.
 * Turns are granted strictly in arrival order; a waiter whose signal aborts
 * leaves the queue without consuming a turn.
 */
export class IntervalThrottle {
  private readonly queue: Waiter[] = [];
  private lastGrantAt: number | null = null;
  private draining = false;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: Clock = systemClock
  ) {}

  acquire(signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const waiter: Waiter = { resolve, reject, signal };
      if (signal) {
        waiter.onAbort = () => {
          const idx = this.queue.indexOf(waiter);
          if (idx !== -1) this.queue.splice(idx, 1);
          reject(abortReason(signal));
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }

      this.queue.push(waiter);
      void this.drain();
    });
  }

  private remainingMs(): number {
    if (this.lastGrantAt === null) return 0;
    return this.lastGrantAt + this.minIntervalMs - this.clock.now();
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      while (this.queue.length > 0) {
        const wait = this.remainingMs();
        if (wait > 0) {
          await this.clock.sleep(wait);
          continue;
        }
        // Non-empty: checked by the loop condition and nothing else runs between.
        const next = this.queue.shift()!;
        if (next.signal && next.onAbort) next.signal.removeEventListener("abort", next.onAbort);
        this.lastGrantAt = this.clock.now();
        next.resolve();
      }
    } catch (err) {
      const failure = err instanceof Error ? err : new Error(String(err));
      for (const waiter of this.queue.splice(0)) {
        if (waiter.signal && waiter.onAbort) waiter.signal.removeEventListener("abort", waiter.onAbort);
        waiter.reject(failure);
      }
    } finally {
      this.draining = false;
    }
  }
}
