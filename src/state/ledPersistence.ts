import { Scheduler, SystemScheduler, TimerHandle } from '../utils/clock';

export interface PersistedLeds {
  alarm: boolean;
  trouble: boolean;
}

/**
 * Display-side smoothing of the Trouble LED. A reading that goes OFF keeps the
 * persisted state ON until the hold time elapses with no new ON in between.
 * Alarm is passed through untouched.
 */
export class LEDPersistenceFilter {
  private alarm = false;
  private troubleReading = false;
  private troublePersisted = false;
  private troubleOnAt: number | null = null;
  private clearTimer: TimerHandle | null = null;

  constructor(
    private readonly holdMs: number = 7000,
    private readonly scheduler: Scheduler = new SystemScheduler(),
    private readonly onChange?: (leds: PersistedLeds) => void
  ) {}

  update(alarmOn: boolean, troubleOn: boolean): PersistedLeds {
    const before = this.current();
    this.alarm = alarmOn;

    if (troubleOn) {
      this.cancelClear();
      if (!this.troublePersisted) {
        this.troubleOnAt = this.scheduler.now();
      }
      this.troublePersisted = true;
    } else if (this.troubleReading && this.troublePersisted) {
      this.armClear();
    }
    this.troubleReading = troubleOn;

    const after = this.current();
    if (before.alarm !== after.alarm || before.trouble !== after.trouble) {
      this.onChange?.(after);
    }
    return after;
  }

  current(): PersistedLeds {
    return { alarm: this.alarm, trouble: this.troublePersisted };
  }

  get troubleSince(): number | null {
    return this.troubleOnAt;
  }

  get clearPending(): boolean {
    return this.clearTimer !== null;
  }

  reset(): void {
    this.cancelClear();
    this.alarm = false;
    this.troubleReading = false;
    this.troublePersisted = false;
    this.troubleOnAt = null;
  }

  private armClear(): void {
    this.cancelClear();
    this.clearTimer = this.scheduler.setTimeout(() => {
      this.clearTimer = null;
      // A newer ON may have landed between arming and firing
      if (!this.troublePersisted || this.troubleReading) return;

      this.troublePersisted = false;
      this.troubleOnAt = null;
      console.log(`[LED] Trouble cleared after ${this.holdMs}ms hold`);
      this.onChange?.(this.current());
    }, this.holdMs);
  }

  private cancelClear(): void {
    this.clearTimer?.cancel();
    this.clearTimer = null;
  }
}
