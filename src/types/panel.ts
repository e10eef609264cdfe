// Fire-alarm panel telegram types and enums

export const ZONES_PER_DEVICE = 5;
export const MAX_DEVICES = 63;
export const MAX_ZONES = MAX_DEVICES * ZONES_PER_DEVICE; // 315

export type IngestSource = 'push' | 'socket';

export interface TelegramEvent {
  source: IngestSource;
  raw: string;
  receivedAt?: number;
}

export enum MasterFlag {
  AC_POWER = 'acPower',
  DC_POWER = 'dcPower',
  ALARM = 'alarm',
  TROUBLE = 'trouble',
  DRILL = 'drill',
  SILENCED = 'silenced',
  DISABLED = 'disabled'
}

export const MASTER_FLAGS: readonly MasterFlag[] = [
  MasterFlag.AC_POWER,
  MasterFlag.DC_POWER,
  MasterFlag.ALARM,
  MasterFlag.TROUBLE,
  MasterFlag.DRILL,
  MasterFlag.SILENCED,
  MasterFlag.DISABLED
];

export interface MasterStatus {
  acPower: boolean;
  dcPower: boolean;
  alarm: boolean;
  trouble: boolean;
  drill: boolean;
  silenced: boolean;
  disabled: boolean;
  header: number;      // first byte, diagnostics only
  statusByte: number;
  rawWord: string;
  timestamp: number;
}

export enum ZoneCondition {
  ALARM = 'Alarm',
  TROUBLE = 'Trouble',
  ACTIVE = 'Active',
  NORMAL = 'Normal',
  OFFLINE = 'Offline'
}

export interface ZoneStatus {
  zoneNumber: number;      // 1..315
  deviceAddress: number;   // 1..63
  zoneInDevice: number;    // 1..5
  hasAlarm: boolean;
  hasTrouble: boolean;
  isActive: boolean;
  condition: ZoneCondition;
  description: string;
  updatedAt: number;
}

export interface DeviceRecord {
  deviceAddress: number;
  addressText: string;
  statusText: string;
  bellActive: boolean;
  zones: ZoneStatus[];
}

export interface BellConfirmation {
  deviceAddress: number;
  isActive: boolean;
  timestamp: number;
  rawToken: string;
}

export enum StatusLabel {
  SYSTEM_RESETTING = 'SYSTEM RESETTING',
  LOADING = 'LOADING',
  ALARM_DRILL = 'ALARM DRILL',
  ALARM = 'ALARM',
  SYSTEM_TROUBLE = 'SYSTEM TROUBLE',
  SYSTEM_SILENCED = 'SYSTEM SILENCED',
  SYSTEM_DISABLED = 'SYSTEM DISABLED',
  NO_DATA = 'NO DATA',
  SYSTEM_NORMAL = 'SYSTEM NORMAL',
  SYSTEM_ERROR = 'SYSTEM ERROR'
}

export enum StatusSeverity {
  CRITICAL = 'critical',
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
  INFO = 'info',
  UNKNOWN = 'unknown'
}

export interface AggregatedStatus {
  text: StatusLabel;
  severity: StatusSeverity;
  color: string;
}

export interface AccumulatedCounts {
  alarmCount: number;
  troubleCount: number;
  bellCount: number;
  isAccumulating: boolean;
}

export type RejectionKind =
  | 'malformed_telegram'
  | 'out_of_range_address'
  | 'integrity_violation'
  | 'stale_confirmation';
