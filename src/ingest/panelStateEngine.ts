import { EventEmitter } from 'events';
import { DEFAULT_PANEL_CONFIG, PanelConfig } from '../config/panelConfig';
import { BellConfirmationDecoder } from '../protocol/bellConfirmationDecoder';
import { MasterStatusDecoder } from '../protocol/masterStatusDecoder';
import { ProtocolTable, getProtocolTable } from '../protocol/protocolTables';
import { TelegramFramer } from '../protocol/telegramFramer';
import { ZoneFrameDecoder } from '../protocol/zoneFrameDecoder';
import { AccumulatorSnapshot, BellAccumulator, ZoneAccumulator } from '../state/accumulator';
import { BellConfirmationTracker, BellStatus } from '../state/bellConfirmationTracker';
import { LEDPersistenceFilter } from '../state/ledPersistence';
import { ZoneCacheStats, ZoneStatusCache } from '../state/zoneStatusCache';
import { LabelInputs, StatusAggregator } from '../status/statusAggregator';
import { QueryGovernor, QueryGovernorStats } from '../status/queryGovernor';
import {
  AccumulatedCounts,
  AggregatedStatus,
  BellConfirmation,
  DeviceRecord,
  IngestSource,
  MAX_DEVICES,
  MasterFlag,
  MasterStatus,
  RejectionKind,
  StatusLabel,
  TelegramEvent,
  ZONES_PER_DEVICE,
  ZoneCondition,
  ZoneStatus
} from '../types/panel';
import { Scheduler, SystemScheduler, TimerHandle } from '../utils/clock';
import { IngestionRouter, RouterStats, TelegramSink } from './ingestionRouter';

const STATUS_WATCH_MS = 1000;

export interface TelegramRejection {
  kind: RejectionKind;
  reason: string;
  source: IngestSource;
  raw: string;
  at: number;
}

export interface TelegramDrop {
  source: IngestSource;
  reason: string;
  raw: string;
  at: number;
}

export interface StatusChange {
  previous: StatusLabel | null;
  current: AggregatedStatus;
  at: number;
}

export interface EpisodeEvent {
  at: number;
  alarmZones: number[];
  troubleZones: number[];
  bells: number[];
}

export interface ModeChangeEvent {
  mode: IngestSource;
  previous: IngestSource;
  at: number;
}

export interface PanelSnapshot {
  label: AggregatedStatus;
  master: MasterStatus | null;
  accumulated: AccumulatedCounts;
  activeAlarmZones: number[];
  activeTroubleZones: number[];
  activeBells: number[];
  mode: IngestSource;
  deviceCount: number;
  lastTelegramAt: number | null;
  at: number;
}

export interface EngineStats {
  startedAt: number | null;
  lastTelegramAt: number | null;
  telegramsAccepted: number;
  rejections: Record<RejectionKind, number>;
  router: RouterStats;
  cache: ZoneCacheStats;
  accumulators: {
    zones: AccumulatorSnapshot<number>;
    bells: AccumulatorSnapshot<number>;
  };
  governor: QueryGovernorStats;
  bells: { staleDiscarded: number; active: number[] };
}

/**
 * Owns every piece of panel state and applies telegrams one at a time via
 * the ingestion router. Does no I/O; producers call ingest() and consumers
 * read through the getters or listen to the emitted events:
 *
 *   status-change, snapshot, episode-start, episode-end, bell-confirmation,
 *   mode-change, telegram-accepted, telegram-rejected, telegram-dropped,
 *   system-reset
 */
export class PanelStateEngine extends EventEmitter implements TelegramSink {
  private readonly config: PanelConfig;
  private readonly table: ProtocolTable;
  private readonly router: IngestionRouter;
  private readonly cache: ZoneStatusCache;
  private readonly zoneAccumulator: ZoneAccumulator;
  private readonly bellAccumulator: BellAccumulator;
  private readonly leds: LEDPersistenceFilter;
  private readonly bells: BellConfirmationTracker;
  private readonly governor: QueryGovernor<MasterFlag>;

  private master: MasterStatus | null = null;
  private deviceCount: number;
  private zoneNames = new Map<number, string>();
  private startedAt: number | null = null;
  private lastTelegramAt: number | null = null;
  private lastLabel: StatusLabel | null = null;
  private applying = false;
  private resetting = false;
  private resetTimer: TimerHandle | null = null;
  private loadingTimer: TimerHandle | null = null;
  private watchTimer: TimerHandle | null = null;
  private telegramsAccepted = 0;
  private rejections: Record<RejectionKind, number> = {
    malformed_telegram: 0,
    out_of_range_address: 0,
    integrity_violation: 0,
    stale_confirmation: 0
  };

  constructor(config: Partial<PanelConfig> = {}, private readonly scheduler: Scheduler = new SystemScheduler()) {
    super();
    this.config = { ...DEFAULT_PANEL_CONFIG, ...config };
    this.table = getProtocolTable(this.config.protocol);
    this.deviceCount = this.clampDeviceCount(this.config.deviceCount);

    this.cache = new ZoneStatusCache(this.config.zoneCacheMax);
    this.zoneAccumulator = new ZoneAccumulator(scheduler);
    this.bellAccumulator = new BellAccumulator(scheduler);
    this.leds = new LEDPersistenceFilter(this.config.troublePersistMs, scheduler, () => this.evaluateStatus());
    this.bells = new BellConfirmationTracker(this.config.bellHistoryLimit, this.config.bellActiveWindowMs, scheduler);
    this.governor = new QueryGovernor<MasterFlag>(
      {
        debounceMs: this.config.queryDebounceMs,
        rateLimit: this.config.queryRateLimit,
        windowMs: this.config.queryRateWindowMs
      },
      scheduler
    );
    this.router = new IngestionRouter(this, this.config.ingestMode);
    this.router.onDrop((event, reason) => {
      const drop: TelegramDrop = { source: event.source, reason, raw: event.raw, at: event.receivedAt ?? scheduler.now() };
      this.emit('telegram-dropped', drop);
    });
  }

  start(): void {
    this.startedAt = this.scheduler.now();
    this.cache.startExpirySweep(this.scheduler, this.config.zoneSweepIntervalMs, this.config.zoneExpiryMs);

    this.loadingTimer?.cancel();
    this.loadingTimer = this.scheduler.setTimeout(() => {
      this.loadingTimer = null;
      this.evaluateStatus();
    }, this.config.loadingGraceMs);

    this.watchTimer?.cancel();
    this.watchTimer = this.scheduler.setInterval(() => this.evaluateStatus(), STATUS_WATCH_MS);

    console.log(`🔥 Panel engine started (protocol ${this.table.version}, ${this.deviceCount} devices, mode ${this.router.activeMode})`);
    this.evaluateStatus();
  }

  stop(): void {
    this.cache.stopExpirySweep();
    this.governor.stop();
    for (const timer of [this.loadingTimer, this.watchTimer, this.resetTimer]) {
      timer?.cancel();
    }
    this.loadingTimer = null;
    this.watchTimer = null;
    this.resetTimer = null;
    this.resetting = false;
    console.log('Panel engine stopped');
  }

  // ---- inbound ----

  ingest(raw: string, source: IngestSource): void {
    this.router.ingest({ source, raw, receivedAt: this.scheduler.now() });
  }

  onModeChanged(mode: IngestSource): void {
    this.router.onModeChanged(mode);
  }

  setDeviceCount(count: number): number {
    const next = this.clampDeviceCount(count);
    if (next !== count) {
      console.warn(`[ENGINE] Device count ${count} clamped to ${next}`);
    }

    const previous = this.deviceCount;
    this.deviceCount = next;
    const removed = this.cache.retainRange(next * ZONES_PER_DEVICE);
    const pruned = this.zoneAccumulator.retainWhere((zoneNumber) => this.inRange(zoneNumber));
    console.log(
      `[ENGINE] Device count ${previous} -> ${next}, ${removed} cached and ${pruned} accumulated zone(s) outside range removed`
    );

    this.refresh();
    return next;
  }

  setZoneName(zoneNumber: number, name: string): void {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      this.zoneNames.delete(zoneNumber);
    } else {
      this.zoneNames.set(zoneNumber, trimmed);
    }

    const cached = this.cache.peek(zoneNumber);
    if (cached) {
      this.cache.upsert(zoneNumber, { ...cached, description: this.describeZone(zoneNumber, cached) });
    }
  }

  getZoneName(zoneNumber: number): string | null {
    return this.zoneNames.get(zoneNumber) ?? null;
  }

  beginSystemReset(): void {
    this.resetTimer?.cancel();
    this.resetting = true;
    this.resetTimer = this.scheduler.setTimeout(() => {
      this.resetTimer = null;
      this.resetting = false;
      this.evaluateStatus();
    }, this.config.resetDisplayMs);

    console.log(`[ENGINE] System reset requested, holding label for ${this.config.resetDisplayMs}ms`);
    this.emit('system-reset', { at: this.scheduler.now() });
    this.evaluateStatus();
  }

  // ---- TelegramSink ----

  applyTelegram(event: TelegramEvent): void {
    const at = event.receivedAt ?? this.scheduler.now();

    const framed = TelegramFramer.frame(event.raw, this.table);
    if (!framed.ok) {
      this.reject('malformed_telegram', framed.reason, event, at);
      return;
    }
    const { telegram } = framed;

    let master: MasterStatus | null = null;
    if (telegram.masterWord !== null) {
      master = MasterStatusDecoder.decode(telegram.masterWord, at);
      if (!master) {
        this.reject('malformed_telegram', `invalid master word "${telegram.masterWord}"`, event, at);
        return;
      }
    }

    let records: DeviceRecord[] = [];
    let zones: ZoneStatus[] = [];
    if (telegram.recordTexts.length > 0) {
      const decoded = ZoneFrameDecoder.decode(telegram.recordTexts, {
        table: this.table,
        deviceCount: this.deviceCount,
        timestamp: at,
        describe: (zoneNumber) => this.zoneNames.get(zoneNumber)
      });
      if (!decoded.ok) {
        this.reject(decoded.kind, decoded.reason, event, at);
        return;
      }
      records = decoded.records;
      zones = decoded.zones;
      for (const ignored of decoded.ignored) {
        this.rejections.out_of_range_address++;
        console.warn(`[ZONES] Record "${ignored.recordText}" ignored: ${ignored.reason}`);
      }
    }

    // Fully validated; apply without yielding
    this.applying = true;
    try {
      this.lastTelegramAt = at;
      this.telegramsAccepted++;

      if (master) {
        this.master = master;
        this.leds.update(master.alarm, master.trouble);
        this.syncAlarmMode(master.alarm, at);
      }
      const alarmLed = this.master?.alarm ?? false;

      for (const zone of zones) {
        this.cache.upsert(zone.zoneNumber, zone);
        this.zoneAccumulator.observe(zone.zoneNumber, { alarm: zone.hasAlarm, trouble: zone.hasTrouble }, alarmLed);
      }

      this.applyBells(BellConfirmationDecoder.scan(telegram.text, records, at), alarmLed);
    } finally {
      this.applying = false;
    }

    this.emit('telegram-accepted', {
      source: event.source,
      at,
      masterWord: telegram.masterWord,
      zoneCount: zones.length
    });
    this.refresh();
  }

  applyModeChange(mode: IngestSource, previous: IngestSource): void {
    this.cache.clear();
    this.zoneAccumulator.reset();
    this.bellAccumulator.reset();
    this.bells.reset();
    this.governor.invalidate();

    const change: ModeChangeEvent = { mode, previous, at: this.scheduler.now() };
    this.emit('mode-change', change);
    this.refresh();
  }

  // ---- outbound ----

  getMasterFlag(flag: MasterFlag): boolean {
    return this.governor.query(flag, () => {
      const master = this.master;
      return master ? MasterStatusDecoder.getFlag(master, flag) : false;
    });
  }

  getMasterStatus(): MasterStatus | null {
    return this.master ? { ...this.master } : null;
  }

  getZoneStatus(zoneNumber: number): ZoneStatus | null {
    if (!this.inRange(zoneNumber)) return null;
    const status = this.cache.get(zoneNumber);
    if (!status) return null;
    return this.isOffline(status) ? { ...status, condition: ZoneCondition.OFFLINE } : status;
  }

  getAggregatedLabel(): AggregatedStatus {
    return StatusAggregator.aggregate(() => this.labelInputs());
  }

  getAccumulatedCounts(): AccumulatedCounts {
    return {
      alarmCount: this.zoneAccumulator.count('alarm'),
      troubleCount: this.zoneAccumulator.count('trouble'),
      bellCount: this.bellAccumulator.count('active'),
      isAccumulating: this.zoneAccumulator.isActive
    };
  }

  getActiveAlarmZones(): number[] {
    return this.currentZones((zone) => zone.hasAlarm);
  }

  getActiveTroubleZones(): number[] {
    return this.currentZones((zone) => zone.hasTrouble);
  }

  isZoneAccumulatedAlarm(zoneNumber: number): boolean {
    return this.zoneAccumulator.isZoneAccumulatedAlarm(zoneNumber);
  }

  isZoneAccumulatedTrouble(zoneNumber: number): boolean {
    return this.zoneAccumulator.isZoneAccumulatedTrouble(zoneNumber);
  }

  getAccumulatedZones(): { alarm: number[]; trouble: number[]; bells: number[] } {
    const sorted = (items: number[]) => items.sort((a, b) => a - b);
    return {
      alarm: sorted(this.zoneAccumulator.items('alarm')),
      trouble: sorted(this.zoneAccumulator.items('trouble')),
      bells: sorted(this.bellAccumulator.items('active'))
    };
  }

  getBellStatus(historyLimit = 20): { active: number[]; devices: BellStatus[]; accumulated: number[]; history: BellConfirmation[] } {
    return {
      active: this.bells.activeDevices(),
      devices: this.bells.getStatuses(),
      accumulated: this.bellAccumulator.items('active').sort((a, b) => a - b),
      history: this.bells.getHistory(historyLimit)
    };
  }

  getDeviceCount(): number {
    return this.deviceCount;
  }

  getMode(): IngestSource {
    return this.router.activeMode;
  }

  getSnapshot(): PanelSnapshot {
    return {
      label: this.getAggregatedLabel(),
      master: this.getMasterStatus(),
      accumulated: this.getAccumulatedCounts(),
      activeAlarmZones: this.getActiveAlarmZones(),
      activeTroubleZones: this.getActiveTroubleZones(),
      activeBells: this.bells.activeDevices(),
      mode: this.router.activeMode,
      deviceCount: this.deviceCount,
      lastTelegramAt: this.lastTelegramAt,
      at: this.scheduler.now()
    };
  }

  getStats(): EngineStats {
    return {
      startedAt: this.startedAt,
      lastTelegramAt: this.lastTelegramAt,
      telegramsAccepted: this.telegramsAccepted,
      rejections: { ...this.rejections },
      router: this.router.getStats(),
      cache: this.cache.getStats(),
      accumulators: {
        zones: this.zoneAccumulator.getSnapshot(),
        bells: this.bellAccumulator.getSnapshot()
      },
      governor: this.governor.getStats(),
      bells: { staleDiscarded: this.bells.staleDiscarded, active: this.bells.activeDevices() }
    };
  }

  // ---- internals ----

  private syncAlarmMode(alarmOn: boolean, at: number): void {
    const before: EpisodeEvent = {
      at,
      alarmZones: this.zoneAccumulator.items('alarm'),
      troubleZones: this.zoneAccumulator.items('trouble'),
      bells: this.bellAccumulator.items('active')
    };

    const transition = this.zoneAccumulator.syncMode(alarmOn);
    this.bellAccumulator.syncMode(alarmOn);
    this.bells.syncAlarmLed(alarmOn);

    if (transition === 'started') {
      this.emit('episode-start', { at, alarmZones: [], troubleZones: [], bells: [] });
    } else if (transition === 'ended') {
      this.emit('episode-end', before);
    }
  }

  private applyBells(confirmations: BellConfirmation[], alarmLed: boolean): void {
    if (confirmations.length === 0) return;

    const { accepted, stale } = this.bells.apply(confirmations, alarmLed);
    this.rejections.stale_confirmation += stale.length;

    for (const confirmation of accepted) {
      if (confirmation.isActive) {
        this.bellAccumulator.observe(confirmation.deviceAddress, { active: true }, alarmLed);
      }
      this.emit('bell-confirmation', confirmation);
    }
  }

  private reject(kind: RejectionKind, reason: string, event: TelegramEvent, at: number): void {
    this.rejections[kind]++;
    console.warn(`[ENGINE] Telegram from ${event.source} rejected (${kind}): ${reason}`);
    const rejection: TelegramRejection = { kind, reason, source: event.source, raw: event.raw, at };
    this.emit('telegram-rejected', rejection);
  }

  private labelInputs(): LabelInputs {
    const now = this.scheduler.now();
    const alarmZones = new Set<number>([...this.getActiveAlarmZones(), ...this.zoneAccumulator.items('alarm')]);
    return {
      resetting: this.resetting,
      loading: this.startedAt !== null && now - this.startedAt < this.config.loadingGraceMs,
      master: this.master,
      persistedTrouble: this.leds.current().trouble,
      alarmZoneCount: alarmZones.size,
      lastTelegramAt: this.lastTelegramAt,
      configuredZones: this.deviceCount * ZONES_PER_DEVICE,
      noDataTimeoutMs: this.config.noDataTimeoutMs,
      now
    };
  }

  // Emits status-change and a snapshot when the label moved
  private evaluateStatus(): boolean {
    if (this.applying) return false;

    const current = this.getAggregatedLabel();
    if (current.text === this.lastLabel) return false;

    const change: StatusChange = { previous: this.lastLabel, current, at: this.scheduler.now() };
    this.lastLabel = current.text;
    console.log(`[STATUS] ${change.previous ?? '-'} -> ${current.text}`);
    this.emit('status-change', change);
    this.emitSnapshot();
    return true;
  }

  private refresh(): void {
    if (!this.evaluateStatus()) this.emitSnapshot();
  }

  private emitSnapshot(): void {
    if (this.listenerCount('snapshot') === 0) return;
    this.emit('snapshot', this.getSnapshot());
  }

  private currentZones(predicate: (zone: ZoneStatus) => boolean): number[] {
    return this.cache
      .values()
      .filter((zone) => this.inRange(zone.zoneNumber) && !this.isOffline(zone) && predicate(zone))
      .map((zone) => zone.zoneNumber)
      .sort((a, b) => a - b);
  }

  private describeZone(zoneNumber: number, zone: ZoneStatus): string {
    const address = this.table.addressRadix === 10
      ? String(zone.deviceAddress).padStart(2, '0')
      : zone.deviceAddress.toString(16).toUpperCase().padStart(2, '0');
    return this.zoneNames.get(zoneNumber) ?? `Device ${address} Zone ${zone.zoneInDevice}`;
  }

  private isOffline(zone: ZoneStatus): boolean {
    return this.scheduler.now() - zone.updatedAt >= this.config.noDataTimeoutMs;
  }

  private inRange(zoneNumber: number): boolean {
    return Number.isInteger(zoneNumber) && zoneNumber >= 1 && zoneNumber <= this.deviceCount * ZONES_PER_DEVICE;
  }

  private clampDeviceCount(count: number): number {
    if (!Number.isFinite(count)) return MAX_DEVICES;
    return Math.max(1, Math.min(MAX_DEVICES, Math.floor(count)));
  }
}
