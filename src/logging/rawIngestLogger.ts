import * as fs from 'fs';
import * as path from 'path';

export type RawIngestEvent = 'telegram_received' | 'telegram_dropped' | 'telegram_rejected';

/**
 * Appends every telegram seen by the producers to logs/raw-ingest.ndjson,
 * one JSON row per line, so field captures can be replayed later.
 */
export class RawIngestLogger {
  private static dirPath = path.join(process.cwd(), 'logs');
  private static filePath = path.join(RawIngestLogger.dirPath, 'raw-ingest.ndjson');
  private static readonly maxRawChars = 4096;
  private static enabled = true;
  private static warned = false;

  static configure(options: { enabled?: boolean; dirPath?: string }): void {
    if (options.enabled !== undefined) this.enabled = options.enabled;
    if (options.dirPath) {
      this.dirPath = options.dirPath;
      this.filePath = path.join(options.dirPath, 'raw-ingest.ndjson');
    }
  }

  private static ensureReady(): void {
    if (!fs.existsSync(this.dirPath)) {
      fs.mkdirSync(this.dirPath, { recursive: true });
    }
  }

  // Control characters stay readable in the log as <STX>/<ETX>
  static visible(raw: string): string {
    const marked = raw.replace(/\x02/g, '<STX>').replace(/\x03/g, '<ETX>');
    if (marked.length <= this.maxRawChars) return marked;
    return `${marked.slice(0, this.maxRawChars)}...[truncated]`;
  }

  static write(eventType: RawIngestEvent, payload: Record<string, unknown>): void {
    if (!this.enabled) return;

    try {
      this.ensureReady();
      const safePayload: Record<string, unknown> = { ...payload };
      if (typeof safePayload.raw === 'string') {
        safePayload.raw = this.visible(safePayload.raw);
      }
      const row = {
        ts: new Date().toISOString(),
        eventType,
        ...safePayload
      };
      fs.appendFileSync(this.filePath, `${JSON.stringify(row)}\n`, 'utf8');
    } catch (error) {
      // Logging must never stop ingestion; report the first failure only
      if (!this.warned) {
        this.warned = true;
        console.warn('[RAW] Raw ingest log write failed, further failures not reported:', error);
      }
    }
  }
}
