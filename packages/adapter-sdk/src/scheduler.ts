export interface Clock {
  now(): number;
}

/**
 * Host timer facility. `scheduleAt` fires the task at or after `at` (epoch
 * ms); there is no cancellation, callers make late or superseded firings
 * harmless instead.
 */
export interface Scheduler extends Clock {
  scheduleAt(at: number, task: () => void): void;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

export class TimerScheduler implements Scheduler {
  private timers = new Set<ReturnType<typeof setTimeout>>();
  private disposed = false;

  constructor(private clock: Clock = systemClock) {}

  now(): number {
    return this.clock.now();
  }

  scheduleAt(at: number, task: () => void): void {
    if (this.disposed) {
      throw new Error("Scheduler has been disposed");
    }

    this.arm(at, task);
  }

  /** Pending timer count. */
  get size(): number {
    return this.timers.size;
  }

  /** Drops every pending timer. Only used at shutdown. */
  dispose(): void {
    this.disposed = true;
    for (const timer of this.timers) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  // setTimeout may fire a little before the clock reads `at`; wait out the rest
  private arm(at: number, task: () => void): void {
    const delay = Math.max(0, at - this.clock.now());
    const timer = setTimeout(() => {
      this.timers.delete(timer);
      if (this.disposed) return;
      if (this.clock.now() < at) {
        this.arm(at, task);
        return;
      }
      task();
    }, delay);
    timer.unref();
    this.timers.add(timer);
  }
}
