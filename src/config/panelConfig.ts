import * as dotenv from 'dotenv';
import { IngestSource, MAX_DEVICES, MAX_ZONES } from '../types/panel';
import { ProtocolVersion, isProtocolVersion } from '../protocol/protocolTables';

export interface PanelConfig {
  ingestMode: IngestSource;
  protocol: ProtocolVersion;
  deviceCount: number;
  zoneCacheMax: number;
  zoneExpiryMs: number;
  zoneSweepIntervalMs: number;
  troublePersistMs: number;
  loadingGraceMs: number;
  noDataTimeoutMs: number;
  resetDisplayMs: number;
  bellActiveWindowMs: number;
  bellHistoryLimit: number;
  queryDebounceMs: number;
  queryRateLimit: number;
  queryRateWindowMs: number;
}

export interface ServiceConfig extends PanelConfig {
  telegramTcpPort: number;
  apiPort: number;
  supabaseUrl: string | null;
  supabaseKey: string | null;
  supabaseTelegramTable: string;
  eventLogEnabled: boolean;
  rawIngestLogEnabled: boolean;
}

export const DEFAULT_PANEL_CONFIG: PanelConfig = {
  ingestMode: 'socket',
  protocol: 'aabbcc',
  deviceCount: MAX_DEVICES,
  zoneCacheMax: MAX_ZONES,
  zoneExpiryMs: 60 * 60_000,
  zoneSweepIntervalMs: 30 * 60_000,
  troublePersistMs: 7000,
  loadingGraceMs: 5000,
  noDataTimeoutMs: 10_000,
  resetDisplayMs: 3000,
  bellActiveWindowMs: 2000,
  bellHistoryLimit: 100,
  queryDebounceMs: 500,
  queryRateLimit: 10,
  queryRateWindowMs: 1000
};

type Env = Record<string, string | undefined>;

const num = (env: Env, key: string, fallback: number): number => {
  const value = Number(env[key] || fallback);
  return Number.isFinite(value) ? value : fallback;
};

const flag = (env: Env, key: string, fallback: boolean): boolean => {
  const value = env[key];
  if (value === undefined || value === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

export function loadConfig(env: Env = process.env): ServiceConfig {
  const mode = String(env.INGEST_MODE || DEFAULT_PANEL_CONFIG.ingestMode).toLowerCase();
  const protocol = String(env.PANEL_PROTOCOL || DEFAULT_PANEL_CONFIG.protocol).toLowerCase();

  if (!isProtocolVersion(protocol)) {
    console.warn(`[CONFIG] Unknown PANEL_PROTOCOL "${protocol}", using ${DEFAULT_PANEL_CONFIG.protocol}`);
  }

  return {
    ingestMode: mode === 'push' ? 'push' : 'socket',
    protocol: isProtocolVersion(protocol) ? protocol : DEFAULT_PANEL_CONFIG.protocol,
    deviceCount: Math.max(1, Math.min(MAX_DEVICES, num(env, 'DEVICE_COUNT', DEFAULT_PANEL_CONFIG.deviceCount))),
    zoneCacheMax: Math.max(1, num(env, 'ZONE_CACHE_MAX', DEFAULT_PANEL_CONFIG.zoneCacheMax)),
    zoneExpiryMs: Math.max(1000, num(env, 'ZONE_EXPIRY_MS', DEFAULT_PANEL_CONFIG.zoneExpiryMs)),
    zoneSweepIntervalMs: Math.max(1000, num(env, 'ZONE_SWEEP_INTERVAL_MS', DEFAULT_PANEL_CONFIG.zoneSweepIntervalMs)),
    troublePersistMs: Math.max(0, num(env, 'TROUBLE_PERSIST_MS', DEFAULT_PANEL_CONFIG.troublePersistMs)),
    loadingGraceMs: Math.max(0, num(env, 'LOADING_GRACE_MS', DEFAULT_PANEL_CONFIG.loadingGraceMs)),
    noDataTimeoutMs: Math.max(1000, num(env, 'NO_DATA_TIMEOUT_MS', DEFAULT_PANEL_CONFIG.noDataTimeoutMs)),
    resetDisplayMs: Math.max(0, num(env, 'RESET_DISPLAY_MS', DEFAULT_PANEL_CONFIG.resetDisplayMs)),
    bellActiveWindowMs: Math.max(0, num(env, 'BELL_ACTIVE_WINDOW_MS', DEFAULT_PANEL_CONFIG.bellActiveWindowMs)),
    bellHistoryLimit: Math.max(1, num(env, 'BELL_HISTORY_LIMIT', DEFAULT_PANEL_CONFIG.bellHistoryLimit)),
    queryDebounceMs: Math.max(0, num(env, 'QUERY_DEBOUNCE_MS', DEFAULT_PANEL_CONFIG.queryDebounceMs)),
    queryRateLimit: Math.max(1, num(env, 'QUERY_RATE_LIMIT', DEFAULT_PANEL_CONFIG.queryRateLimit)),
    queryRateWindowMs: Math.max(100, num(env, 'QUERY_RATE_WINDOW_MS', DEFAULT_PANEL_CONFIG.queryRateWindowMs)),
    telegramTcpPort: num(env, 'TELEGRAM_TCP_PORT', 7620),
    apiPort: num(env, 'API_PORT', 3000),
    supabaseUrl: env.SUPABASE_URL || null,
    supabaseKey: env.SUPABASE_ANON_KEY || null,
    supabaseTelegramTable: env.SUPABASE_TELEGRAM_TABLE || 'panel_telegrams',
    eventLogEnabled: flag(env, 'EVENT_LOG_ENABLED', true),
    rawIngestLogEnabled: flag(env, 'RAW_INGEST_LOG_ENABLED', true)
  };
}

// Load environment variables first
export function loadEnv(): void {
  dotenv.config();
}
