import { EventEmitter } from 'events';
import { BellConfirmation } from '../types/panel';
import type { EpisodeEvent, ModeChangeEvent, StatusChange, TelegramRejection } from '../ingest/panelStateEngine';

export type PanelEventType =
  | 'status_change'
  | 'episode_start'
  | 'episode_end'
  | 'bell_confirmation'
  | 'mode_change'
  | 'telegram_rejected'
  | 'system_reset';

export const PANEL_EVENT_TYPES: readonly PanelEventType[] = [
  'status_change',
  'episode_start',
  'episode_end',
  'bell_confirmation',
  'mode_change',
  'telegram_rejected',
  'system_reset'
];

export interface PanelEventInput {
  eventType: PanelEventType;
  label?: string | null;
  severity?: string | null;
  source?: string | null;
  payload?: Record<string, unknown>;
  occurredAt: number;
}

export interface PanelEventRecord {
  id: number;
  eventType: string;
  label: string | null;
  severity: string | null;
  source: string | null;
  payload: unknown;
  occurredAt: string;
}

export type QueryFn = (
  text: string,
  params?: unknown[]
) => Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;

const text = (row: Record<string, unknown>, key: string): string | null => {
  const value = row[key];
  return value === null || value === undefined ? null : String(value);
};

const isoTime = (value: unknown): string => {
  if (value instanceof Date) return value.toISOString();
  return new Date(String(value)).toISOString();
};

/**
 * Writes panel events to the panel_events table. Writes happen off the
 * telegram path: callers fire and forget, failures are logged.
 */
export class PanelEventStorage {
  private pending = 0;
  private failures = 0;

  constructor(private readonly query: QueryFn) {}

  async record(event: PanelEventInput): Promise<void> {
    await this.query(
      `INSERT INTO panel_events (event_type, label, severity, source, payload, occurred_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [
        event.eventType,
        event.label || null,
        event.severity || null,
        event.source || null,
        JSON.stringify(event.payload || {}),
        new Date(event.occurredAt).toISOString()
      ]
    );
  }

  recordInBackground(event: PanelEventInput): void {
    this.pending++;
    void this.record(event)
      .catch((error: unknown) => {
        this.failures++;
        console.error(`[EVENTS] Failed to store ${event.eventType}:`, error);
      })
      .finally(() => {
        this.pending--;
      });
  }

  async recent(limit = 50, eventType?: PanelEventType): Promise<PanelEventRecord[]> {
    const safeLimit = Math.max(1, Math.min(500, Math.floor(limit) || 50));
    const params: unknown[] = [];
    let sql = 'SELECT id, event_type, label, severity, source, payload, occurred_at FROM panel_events';

    if (eventType) {
      params.push(eventType);
      sql += ` WHERE event_type = $${params.length}`;
    }
    params.push(safeLimit);
    sql += ` ORDER BY occurred_at DESC, id DESC LIMIT $${params.length}`;

    const result = await this.query(sql, params);
    return result.rows.map((row) => ({
      id: Number(row.id),
      eventType: String(row.event_type),
      label: text(row, 'label'),
      severity: text(row, 'severity'),
      source: text(row, 'source'),
      payload: row.payload ?? {},
      occurredAt: isoTime(row.occurred_at)
    }));
  }

  // Subscribe to a PanelStateEngine's events
  attachTo(engine: EventEmitter): void {
    engine.on('status-change', (change: StatusChange) => {
      this.recordInBackground({
        eventType: 'status_change',
        label: change.current.text,
        severity: change.current.severity,
        payload: { previous: change.previous },
        occurredAt: change.at
      });
    });

    engine.on('episode-start', (episode: EpisodeEvent) => {
      this.recordInBackground({ eventType: 'episode_start', label: 'ALARM ON', occurredAt: episode.at });
    });

    engine.on('episode-end', (episode: EpisodeEvent) => {
      this.recordInBackground({
        eventType: 'episode_end',
        label: 'ALARM OFF',
        payload: {
          alarmZones: episode.alarmZones,
          troubleZones: episode.troubleZones,
          bells: episode.bells
        },
        occurredAt: episode.at
      });
    });

    engine.on('bell-confirmation', (confirmation: BellConfirmation) => {
      this.recordInBackground({
        eventType: 'bell_confirmation',
        label: confirmation.isActive ? 'BELL ON' : 'BELL OFF',
        payload: { deviceAddress: confirmation.deviceAddress, token: confirmation.rawToken },
        occurredAt: confirmation.timestamp
      });
    });

    engine.on('mode-change', (change: ModeChangeEvent) => {
      this.recordInBackground({
        eventType: 'mode_change',
        source: change.mode,
        payload: { previous: change.previous },
        occurredAt: change.at
      });
    });

    engine.on('telegram-rejected', (rejection: TelegramRejection) => {
      this.recordInBackground({
        eventType: 'telegram_rejected',
        label: rejection.kind,
        source: rejection.source,
        payload: { reason: rejection.reason, raw: rejection.raw.slice(0, 512) },
        occurredAt: rejection.at
      });
    });

    engine.on('system-reset', (event: { at: number }) => {
      this.recordInBackground({ eventType: 'system_reset', label: 'SYSTEM RESET', occurredAt: event.at });
    });
  }

  getStats(): { pending: number; failures: number } {
    return { pending: this.pending, failures: this.failures };
  }
}

export function isPanelEventType(value: string): value is PanelEventType {
  return PANEL_EVENT_TYPES.some((type) => type === value);
}
