import { BellConfirmation } from '../types/panel';
import { Scheduler, SystemScheduler } from '../utils/clock';

export interface BellApplyResult {
  accepted: BellConfirmation[];
  stale: BellConfirmation[];
}

export interface BellStatus {
  deviceAddress: number;
  isActive: boolean;
  lastConfirmedAt: number;
  rawToken: string;
}

/**
 * Keeps the bounded confirmation history (newest first) and the per-device
 * "current" map. Cleared on every Alarm LED edge.
 */
export class BellConfirmationTracker {
  private history: BellConfirmation[] = [];
  private current = new Map<number, BellConfirmation>();
  private alarmLed: boolean | null = null;
  private staleCount = 0;

  constructor(
    private readonly historyLimit: number = 100,
    private readonly activeWindowMs: number = 2000,
    private readonly scheduler: Scheduler = new SystemScheduler()
  ) {}

  /**
   * Returns true when the LED changed and the tracker was cleared. The first
   * observation only establishes the baseline.
   */
  syncAlarmLed(alarmOn: boolean): boolean {
    const previous = this.alarmLed;
    this.alarmLed = alarmOn;
    if (previous === null || previous === alarmOn) return false;

    this.clear();
    console.log(`[BELL] Alarm LED ${alarmOn ? 'ON' : 'OFF'}, confirmations cleared`);
    return true;
  }

  apply(confirmations: BellConfirmation[], alarmLedOn: boolean): BellApplyResult {
    const accepted: BellConfirmation[] = [];
    const stale: BellConfirmation[] = [];

    for (const confirmation of confirmations) {
      if (confirmation.isActive && !alarmLedOn) {
        stale.push(confirmation);
        continue;
      }

      this.current.set(confirmation.deviceAddress, confirmation);
      this.history.unshift(confirmation);
      accepted.push(confirmation);
    }

    if (this.history.length > this.historyLimit) {
      this.history.length = this.historyLimit;
    }
    this.staleCount += stale.length;
    return { accepted, stale };
  }

  isCurrentlyActive(deviceAddress: number): boolean {
    const confirmation = this.current.get(deviceAddress);
    if (!confirmation || !confirmation.isActive) return false;
    return this.scheduler.now() - confirmation.timestamp < this.activeWindowMs;
  }

  activeDevices(): number[] {
    return Array.from(this.current.keys())
      .filter((deviceAddress) => this.isCurrentlyActive(deviceAddress))
      .sort((a, b) => a - b);
  }

  getStatuses(): BellStatus[] {
    return Array.from(this.current.values())
      .map((confirmation) => ({
        deviceAddress: confirmation.deviceAddress,
        isActive: this.isCurrentlyActive(confirmation.deviceAddress),
        lastConfirmedAt: confirmation.timestamp,
        rawToken: confirmation.rawToken
      }))
      .sort((a, b) => a.deviceAddress - b.deviceAddress);
  }

  getHistory(limit: number = this.historyLimit): BellConfirmation[] {
    return this.history.slice(0, limit);
  }

  get staleDiscarded(): number {
    return this.staleCount;
  }

  clear(): void {
    this.history = [];
    this.current.clear();
  }

  // Full reset forgets the LED baseline too
  reset(): void {
    this.clear();
    this.alarmLed = null;
  }
}
