import { MAX_DEVICES, MAX_ZONES } from '../types/panel';
import { Scheduler, SystemScheduler } from '../utils/clock';

export type ModeTransition = 'started' | 'ended' | null;

export interface AccumulatorSnapshot<Item> {
  name: string;
  isActive: boolean;
  lastModeChange: number | null;
  sets: Record<string, Item[]>;
  dropped: number;
}

/**
 * Collects every item seen in a category while the master Alarm LED is lit.
 *
 * The sets only grow during one alarm episode and are emptied in full on any
 * LED edge, so an operator reviewing the episode sees every zone or bell that
 * took part, including ones that have since self-cleared.
 */
export class AccumulationEngine<Item, Category extends string> {
  private readonly sets = new Map<Category, Set<Item>>();
  private accumulationActive = false;
  private lastModeChange: number | null = null;
  private dropped = 0;

  constructor(
    readonly name: string,
    private readonly categories: readonly Category[],
    private readonly capacity: number,
    private readonly scheduler: Scheduler = new SystemScheduler()
  ) {
    for (const category of categories) {
      this.sets.set(category, new Set<Item>());
    }
  }

  /**
   * Apply the LED mode rule without an observation. Called for every new
   * master status so the sets empty as soon as the LED goes off.
   */
  syncMode(ledAlarmOn: boolean): ModeTransition {
    if (this.accumulationActive === ledAlarmOn) return null;

    this.reset();
    this.accumulationActive = ledAlarmOn;
    this.lastModeChange = this.scheduler.now();
    console.log(`[ACCUMULATOR:${this.name}] ${ledAlarmOn ? 'accumulation started' : 'accumulation ended, sets cleared'}`);
    return ledAlarmOn ? 'started' : 'ended';
  }

  observe(item: Item, flags: Partial<Record<Category, boolean>>, ledAlarmOn: boolean): ModeTransition {
    const transition = this.syncMode(ledAlarmOn);
    if (!this.accumulationActive) return transition;

    for (const category of this.categories) {
      if (!flags[category]) continue;
      const set = this.setOf(category);
      if (set.has(item)) continue;
      if (set.size >= this.capacity) {
        this.dropped++;
        console.warn(`[ACCUMULATOR:${this.name}] ${category} set full (${this.capacity}), ${String(item)} dropped`);
        continue;
      }
      set.add(item);
    }
    return transition;
  }

  isAccumulated(item: Item, category: Category): boolean {
    return this.setOf(category).has(item);
  }

  count(category: Category): number {
    return this.setOf(category).size;
  }

  items(category: Category): Item[] {
    return Array.from(this.setOf(category));
  }

  get isActive(): boolean {
    return this.accumulationActive;
  }

  timeSinceLastModeChange(): number | null {
    if (this.lastModeChange === null) return null;
    return this.scheduler.now() - this.lastModeChange;
  }

  // Drop items that no longer exist, e.g. zones beyond a reduced device count
  retainWhere(keep: (item: Item) => boolean): number {
    let removed = 0;
    for (const set of this.sets.values()) {
      for (const item of set) {
        if (keep(item)) continue;
        set.delete(item);
        removed++;
      }
    }
    return removed;
  }

  reset(): void {
    for (const set of this.sets.values()) {
      set.clear();
    }
    this.accumulationActive = false;
    this.lastModeChange = null;
  }

  getSnapshot(): AccumulatorSnapshot<Item> {
    return {
      name: this.name,
      isActive: this.accumulationActive,
      lastModeChange: this.lastModeChange,
      sets: Object.fromEntries(this.categories.map((category) => [category, this.items(category)])),
      dropped: this.dropped
    };
  }

  private setOf(category: Category): Set<Item> {
    const set = this.sets.get(category);
    if (!set) throw new Error(`Accumulator ${this.name} has no category ${category}`);
    return set;
  }
}

export type ZoneCategory = 'alarm' | 'trouble';
export type BellCategory = 'active';

export class ZoneAccumulator extends AccumulationEngine<number, ZoneCategory> {
  constructor(scheduler?: Scheduler, capacity: number = MAX_ZONES) {
    super('zones', ['alarm', 'trouble'], capacity, scheduler);
  }

  isZoneAccumulatedAlarm(zoneNumber: number): boolean {
    return this.isAccumulated(zoneNumber, 'alarm');
  }

  isZoneAccumulatedTrouble(zoneNumber: number): boolean {
    return this.isAccumulated(zoneNumber, 'trouble');
  }
}

export class BellAccumulator extends AccumulationEngine<number, BellCategory> {
  constructor(scheduler?: Scheduler, capacity: number = MAX_DEVICES) {
    super('bells', ['active'], capacity, scheduler);
  }

  isBellAccumulated(deviceAddress: number): boolean {
    return this.isAccumulated(deviceAddress, 'active');
  }
}
