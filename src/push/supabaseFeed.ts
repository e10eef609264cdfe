import {
  RealtimeChannel,
  RealtimePostgresInsertPayload,
  SupabaseClient,
  createClient
} from '@supabase/supabase-js';
import { RawIngestLogger } from '../logging/rawIngestLogger';

type TelegramRow = Record<string, unknown>;

// Column names seen on the gateway's telegram table, in preference order
const TELEGRAM_FIELDS = ['raw_data', 'data', 'raw', 'telegram'];

export function extractTelegramText(row: TelegramRow): string | null {
  for (const field of TELEGRAM_FIELDS) {
    const value = row[field];
    if (typeof value === 'string' && value.trim().length > 0) {
      return value;
    }
  }
  return null;
}

export function createSupabaseClient(url: string, key: string): SupabaseClient {
  return createClient(url, key, { auth: { persistSession: false, autoRefreshToken: false } });
}

/**
 * Push producer: every row inserted into the telegram table arrives through
 * Supabase realtime and is handed to the ingestion callback.
 */
export class SupabaseTelegramFeed {
  private channel: RealtimeChannel | null = null;
  private received = 0;
  private skipped = 0;

  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string,
    private readonly onTelegram: (raw: string) => void
  ) {}

  start(): void {
    if (this.channel) return;

    this.channel = this.client
      .channel(`telegrams:${this.table}`)
      .on(
        'postgres_changes',
        { event: 'INSERT', schema: 'public', table: this.table },
        (payload: RealtimePostgresInsertPayload<TelegramRow>) => this.handleInsert(payload)
      )
      .subscribe((status, error) => {
        if (error) {
          console.error(`[PUSH] Subscription to ${this.table} failed:`, error);
          return;
        }
        console.log(`[PUSH] ${this.table} subscription ${status}`);
      });
  }

  async stop(): Promise<void> {
    if (!this.channel) return;
    const channel = this.channel;
    this.channel = null;
    await this.client.removeChannel(channel);
    console.log(`[PUSH] Unsubscribed from ${this.table}`);
  }

  getStats(): { subscribed: boolean; received: number; skipped: number } {
    return { subscribed: this.channel !== null, received: this.received, skipped: this.skipped };
  }

  handleInsert(payload: Pick<RealtimePostgresInsertPayload<TelegramRow>, 'new'>): void {
    const raw = extractTelegramText(payload.new);
    if (raw === null) {
      this.skipped++;
      console.warn(`[PUSH] Row on ${this.table} without telegram text, skipped`);
      return;
    }

    this.received++;
    RawIngestLogger.write('telegram_received', { source: 'push', table: this.table, raw });
    this.onTelegram(raw);
  }
}
