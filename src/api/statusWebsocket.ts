import { IncomingMessage } from 'http';
import { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { PanelSnapshot, PanelStateEngine } from '../ingest/panelStateEngine';

interface StatusMessage {
  type: 'snapshot';
  ts: number;
  data: PanelSnapshot;
}

/**
 * Pushes a panel snapshot to every connected client: once on connect, then
 * on every engine update.
 */
export class StatusWebSocketServer {
  private wss: WebSocketServer;
  private clients = new Set<WebSocket>();
  private pingTimer: NodeJS.Timeout;
  private readonly onSnapshot = (snapshot: PanelSnapshot) => this.broadcast(snapshot);

  constructor(private engine: PanelStateEngine, private path = '/ws/status') {
    this.wss = new WebSocketServer({ noServer: true });

    this.wss.on('connection', (ws, req) => {
      this.clients.add(ws);
      console.log(`[WS:status] client connected (${this.clients.size}) from ${req.socket.remoteAddress}`);
      this.safeSend(ws, { type: 'snapshot', ts: Date.now(), data: this.engine.getSnapshot() });

      ws.on('close', () => {
        this.clients.delete(ws);
        console.log(`[WS:status] client disconnected (${this.clients.size})`);
      });

      ws.on('error', (err) => {
        console.error('[WS:status] client error:', err);
      });
    });

    this.pingTimer = setInterval(() => {
      for (const ws of this.clients) {
        if (ws.readyState === WebSocket.OPEN) {
          ws.ping();
        }
      }
    }, 25000);
    this.pingTimer.unref();

    this.engine.on('snapshot', this.onSnapshot);
    console.log(`[WS:status] initialized on ${this.path}`);
  }

  getPath(): string {
    return this.path;
  }

  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.wss.emit('connection', ws, request);
    });
  }

  broadcast(snapshot: PanelSnapshot): number {
    let sent = 0;
    for (const ws of this.clients) {
      if (this.safeSend(ws, { type: 'snapshot', ts: Date.now(), data: snapshot })) sent++;
    }
    return sent;
  }

  getClientCount(): number {
    return this.clients.size;
  }

  close(): void {
    clearInterval(this.pingTimer);
    this.engine.off('snapshot', this.onSnapshot);
    for (const ws of this.clients) {
      ws.terminate();
    }
    this.clients.clear();
    this.wss.close();
  }

  private safeSend(ws: WebSocket, message: StatusMessage): boolean {
    if (ws.readyState !== WebSocket.OPEN) return false;
    try {
      ws.send(JSON.stringify(message));
      return true;
    } catch (error) {
      console.error('[WS:status] send failed:', error);
      return false;
    }
  }
}
