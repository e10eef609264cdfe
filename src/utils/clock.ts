export type TimerHandle = { cancel(): void };

/**
 * Time source and timer factory used by every stateful component, so timers
 * can be cancelled as a group on shutdown and driven by hand in tests.
 */
export interface Scheduler {
  now(): number;
  setTimeout(fn: () => void, ms: number): TimerHandle;
  setInterval(fn: () => void, ms: number): TimerHandle;
}

export class SystemScheduler implements Scheduler {
  now(): number {
    return Date.now();
  }

  setTimeout(fn: () => void, ms: number): TimerHandle {
    const timer = setTimeout(fn, ms);
    timer.unref();
    return { cancel: () => clearTimeout(timer) };
  }

  setInterval(fn: () => void, ms: number): TimerHandle {
    const timer = setInterval(fn, ms);
    timer.unref();
    return { cancel: () => clearInterval(timer) };
  }
}

interface ManualTimer {
  id: number;
  dueAt: number;
  fn: () => void;
  intervalMs: number | null;
  cancelled: boolean;
}

/**
 * Scheduler whose clock only moves when advance() is called. Timers fire in
 * due order, intervals re-arm after each run.
 */
export class ManualScheduler implements Scheduler {
  private current: number;
  private timers: ManualTimer[] = [];
  private nextId = 1;

  constructor(start = 1_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimeout(fn: () => void, ms: number): TimerHandle {
    return this.schedule(fn, ms, null);
  }

  setInterval(fn: () => void, ms: number): TimerHandle {
    return this.schedule(fn, ms, ms);
  }

  advance(ms: number): void {
    const target = this.current + ms;
    for (;;) {
      const due = this.timers
        .filter((t) => !t.cancelled && t.dueAt <= target)
        .sort((a, b) => a.dueAt - b.dueAt || a.id - b.id)[0];
      if (!due) break;

      this.current = due.dueAt;
      if (due.intervalMs !== null) {
        due.dueAt += Math.max(1, due.intervalMs);
      } else {
        due.cancelled = true;
      }
      due.fn();
    }
    this.current = target;
    this.timers = this.timers.filter((t) => !t.cancelled);
  }

  pendingCount(): number {
    return this.timers.filter((t) => !t.cancelled).length;
  }

  private schedule(fn: () => void, ms: number, intervalMs: number | null): TimerHandle {
    const timer: ManualTimer = {
      id: this.nextId++,
      dueAt: this.current + Math.max(0, ms),
      fn,
      intervalMs,
      cancelled: false
    };
    this.timers.push(timer);
    return { cancel: () => { timer.cancelled = true; } };
  }
}
