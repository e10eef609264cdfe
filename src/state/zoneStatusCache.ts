import { ZoneStatus } from '../types/panel';
import { Scheduler, TimerHandle } from '../utils/clock';

export const GENERIC_CACHE_MAX = 1000;

export interface ZoneCacheStats {
  size: number;
  maxSize: number;
  evictions: number;
  expirations: number;
  lastSweepAt: number | null;
}

/**
 * Last known status per absolute zone number.
 *
 * A Map iterates in insertion order, so deleting and re-inserting a key on
 * every touch keeps the least-recently-used zone first; eviction takes from
 * the front until the cache is back under its limit.
 */
export class ZoneStatusCache {
  private entries = new Map<number, ZoneStatus>();
  private sweepTimer: TimerHandle | null = null;
  private evictions = 0;
  private expirations = 0;
  private lastSweepAt: number | null = null;

  constructor(private readonly maxSize: number = GENERIC_CACHE_MAX) {}

  upsert(zoneNumber: number, status: ZoneStatus): number {
    this.entries.delete(zoneNumber);
    this.entries.set(zoneNumber, { ...status });

    let evicted = 0;
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      evicted++;
    }

    if (evicted > 0) {
      this.evictions += evicted;
      console.warn(`[CACHE] Evicted ${evicted} least-recently-used zone(s), limit ${this.maxSize}`);
    }
    return evicted;
  }

  get(zoneNumber: number): ZoneStatus | undefined {
    const status = this.entries.get(zoneNumber);
    if (!status) return undefined;

    this.entries.delete(zoneNumber);
    this.entries.set(zoneNumber, status);
    return { ...status };
  }

  // Read without touching the access order
  peek(zoneNumber: number): ZoneStatus | undefined {
    const status = this.entries.get(zoneNumber);
    return status ? { ...status } : undefined;
  }

  has(zoneNumber: number): boolean {
    return this.entries.has(zoneNumber);
  }

  expireOlderThan(maxAgeMs: number, now: number = Date.now()): number {
    const cutoff = now - maxAgeMs;
    let removed = 0;

    for (const [zoneNumber, status] of this.entries) {
      if (status.updatedAt < cutoff) {
        this.entries.delete(zoneNumber);
        removed++;
      }
    }

    this.expirations += removed;
    this.lastSweepAt = now;
    if (removed > 0) {
      console.log(`[CACHE] Expired ${removed} zone(s) older than ${Math.round(maxAgeMs / 1000)}s`);
    }
    return removed;
  }

  // Drop zones above the configured range after the device count shrinks
  retainRange(maxZoneNumber: number): number {
    let removed = 0;
    for (const zoneNumber of Array.from(this.entries.keys())) {
      if (zoneNumber < 1 || zoneNumber > maxZoneNumber) {
        this.entries.delete(zoneNumber);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  values(): ZoneStatus[] {
    return Array.from(this.entries.values(), (status) => ({ ...status }));
  }

  // Least-recently-used first
  keys(): number[] {
    return Array.from(this.entries.keys());
  }

  get size(): number {
    return this.entries.size;
  }

  startExpirySweep(scheduler: Scheduler, intervalMs: number, maxAgeMs: number): void {
    this.stopExpirySweep();
    this.sweepTimer = scheduler.setInterval(() => {
      this.expireOlderThan(maxAgeMs, scheduler.now());
    }, intervalMs);
  }

  stopExpirySweep(): void {
    this.sweepTimer?.cancel();
    this.sweepTimer = null;
  }

  getStats(): ZoneCacheStats {
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      evictions: this.evictions,
      expirations: this.expirations,
      lastSweepAt: this.lastSweepAt
    };
  }
}
