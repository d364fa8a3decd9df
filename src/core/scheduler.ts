import { CancellationError } from "./errors";

export interface TimerHandle {
  cancel(): void;
}

export interface Scheduler {
  schedule(delayMs: number, fn: () => void): TimerHandle;
}

export const systemScheduler: Scheduler = {
  schedule(delayMs: number, fn: () => void): TimerHandle {
    const timer = setTimeout(fn, delayMs);
    return {
      cancel: () => clearTimeout(timer),
    };
  },
};

export function sleep(scheduler: Scheduler, ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancellationError());
      return;
    }

    const onAbort = (): void => {
      handle.cancel();
      reject(new CancellationError());
    };

    const handle = scheduler.schedule(ms, () => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    });

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Named cancellable timers. Setting a key that is already armed replaces
 * the earlier timer.
 */
export class TimerGroup {
  private readonly timers = new Map<string, TimerHandle>();

  constructor(private readonly scheduler: Scheduler) {}

  set(key: string, delayMs: number, fn: () => void): void {
    this.cancel(key);
    const handle = this.scheduler.schedule(delayMs, () => {
      this.timers.delete(key);
      fn();
    });
    this.timers.set(key, handle);
  }

  has(key: string): boolean {
    return this.timers.has(key);
  }

  cancel(key: string): void {
    const handle = this.timers.get(key);
    if (handle) {
      handle.cancel();
      this.timers.delete(key);
    }
  }

  cancelWhere(predicate: (key: string) => boolean): void {
    for (const key of [...this.timers.keys()]) {
      if (predicate(key)) {
        this.cancel(key);
      }
    }
  }

  cancelAll(): void {
    this.cancelWhere(() => true);
  }

  get size(): number {
    return this.timers.size;
  }
}
