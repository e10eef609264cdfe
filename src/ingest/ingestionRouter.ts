import { IngestSource, TelegramEvent } from '../types/panel';

export type RouterInput =
  | { kind: 'telegram'; event: TelegramEvent }
  | { kind: 'mode'; mode: IngestSource };

export interface TelegramSink {
  applyTelegram(event: TelegramEvent): void;
  applyModeChange(mode: IngestSource, previous: IngestSource): void;
}

export interface SourceStats {
  received: number;
  processed: number;
  dropped: number;
  failed: number;
}

export interface RouterStats {
  activeMode: IngestSource;
  modeChanges: number;
  queueDepth: number;
  sources: Record<IngestSource, SourceStats>;
}

export type DropListener = (event: TelegramEvent, reason: string) => void;

const emptyStats = (): SourceStats => ({ received: 0, processed: 0, dropped: 0, failed: 0 });

/**
 * Single serialization point for both producers. Inputs are queued and
 * applied one at a time, so a mode switch that arrives mid-stream takes
 * effect between two telegrams and never inside one.
 */
export class IngestionRouter {
  private queue: RouterInput[] = [];
  private draining = false;
  private modeChanges = 0;
  private stats: Record<IngestSource, SourceStats> = { push: emptyStats(), socket: emptyStats() };
  private dropListeners: DropListener[] = [];

  constructor(
    private readonly sink: TelegramSink,
    private mode: IngestSource = 'socket'
  ) {}

  get activeMode(): IngestSource {
    return this.mode;
  }

  ingest(event: TelegramEvent): void {
    this.stats[event.source].received++;
    this.dispatch({ kind: 'telegram', event });
  }

  onModeChanged(mode: IngestSource): void {
    this.dispatch({ kind: 'mode', mode });
  }

  onDrop(listener: DropListener): void {
    this.dropListeners.push(listener);
  }

  dispatch(input: RouterInput): void {
    this.queue.push(input);
    if (this.draining) return;

    this.draining = true;
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        this.handle(next);
      }
    } finally {
      this.draining = false;
    }
  }

  getStats(): RouterStats {
    return {
      activeMode: this.mode,
      modeChanges: this.modeChanges,
      queueDepth: this.queue.length,
      sources: {
        push: { ...this.stats.push },
        socket: { ...this.stats.socket }
      }
    };
  }

  private handle(input: RouterInput): void {
    switch (input.kind) {
      case 'mode':
        this.switchMode(input.mode);
        return;
      case 'telegram':
        this.route(input.event);
        return;
    }
  }

  private switchMode(mode: IngestSource): void {
    if (mode === this.mode) return;

    const previous = this.mode;
    this.mode = mode;
    this.modeChanges++;
    console.log(`[ROUTER] Ingest mode ${previous} -> ${mode}`);
    this.sink.applyModeChange(mode, previous);
  }

  private route(event: TelegramEvent): void {
    const stats = this.stats[event.source];

    if (event.source !== this.mode) {
      stats.dropped++;
      for (const listener of this.dropListeners) {
        listener(event, `inactive source ${event.source}`);
      }
      return;
    }

    try {
      this.sink.applyTelegram(event);
      stats.processed++;
    } catch (error) {
      stats.failed++;
      console.error(`[ROUTER] Telegram from ${event.source} failed:`, error);
    }
  }
}
