import { Scheduler, SystemScheduler } from '../utils/clock';

export interface QueryGovernorOptions {
  debounceMs: number;
  rateLimit: number;
  windowMs: number;
}

export interface QueryGovernorStats {
  hits: number;
  misses: number;
  throttled: number;
}

interface FlagEntry {
  value: boolean | null;
  lastCall: number | null;
  calls: number[];           // call times inside the rolling window, oldest first
}

/**
 * Shields the pipeline from status reads issued by redraw loops. A repeat
 * read inside the debounce period, or any read while more than `rateLimit`
 * reads fall inside the rolling window, is answered from the last computed
 * value.
 */
export class QueryGovernor<Key extends string> {
  private entries = new Map<Key, FlagEntry>();
  private hits = 0;
  private misses = 0;
  private throttled = 0;

  constructor(
    private readonly options: QueryGovernorOptions,
    private readonly scheduler: Scheduler = new SystemScheduler()
  ) {}

  query(key: Key, compute: () => boolean): boolean {
    const now = this.scheduler.now();
    const entry = this.entryFor(key);

    while (entry.calls.length > 0 && now - entry.calls[0] >= this.options.windowMs) {
      entry.calls.shift();
    }
    entry.calls.push(now);

    if (entry.value !== null) {
      if (entry.calls.length > this.options.rateLimit) {
        this.hits++;
        this.throttled++;
        return entry.value;
      }
      if (entry.lastCall !== null && now - entry.lastCall < this.options.debounceMs) {
        this.hits++;
        return entry.value;
      }
    }

    const value = compute();
    entry.value = value;
    entry.lastCall = now;
    this.misses++;
    return value;
  }

  // Forget cached values; call history keeps counting toward the rate limit
  invalidate(): void {
    for (const entry of this.entries.values()) {
      entry.value = null;
      entry.lastCall = null;
    }
  }

  stop(): void {
    this.entries.clear();
  }

  getStats(): QueryGovernorStats {
    return { hits: this.hits, misses: this.misses, throttled: this.throttled };
  }

  private entryFor(key: Key): FlagEntry {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = { value: null, lastCall: null, calls: [] };
      this.entries.set(key, entry);
    }
    return entry;
  }
}
