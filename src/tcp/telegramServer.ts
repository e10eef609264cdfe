import * as net from 'net';
import { RawIngestLogger } from '../logging/rawIngestLogger';

const ETX = 0x03;
const LF = 0x0A;
const MAX_PENDING_BYTES = 64 * 1024;

export type TelegramHandler = (raw: string, remote: string) => void;

/**
 * Socket producer. Panel gateways connect over TCP and stream telegrams,
 * each terminated by ETX or a newline.
 */
export class TelegramTcpServer {
  private server: net.Server;
  private connections = new Set<net.Socket>();
  private received = 0;
  private overflows = 0;

  constructor(private port: number, private onTelegram: TelegramHandler) {
    this.server = net.createServer(this.handleConnection.bind(this));
  }

  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.port, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        const boundPort = address && typeof address === 'object' ? address.port : this.port;
        console.log(`Telegram TCP server listening on port ${boundPort}`);
        resolve(boundPort);
      });
    });
  }

  stop(): Promise<void> {
    for (const socket of this.connections) {
      socket.destroy();
    }
    this.connections.clear();
    return new Promise((resolve, reject) => {
      this.server.close((error) => (error ? reject(error) : resolve()));
    });
  }

  getStats(): { connections: number; received: number; overflows: number } {
    return { connections: this.connections.size, received: this.received, overflows: this.overflows };
  }

  private handleConnection(socket: net.Socket): void {
    const remote = `${socket.remoteAddress}:${socket.remotePort}`;
    console.log(`New telegram connection from ${remote}`);
    this.connections.add(socket);

    let buffer = Buffer.alloc(0);

    socket.on('data', (data) => {
      buffer = Buffer.concat([buffer, data]);

      // Split off every complete telegram
      for (;;) {
        const end = this.findTerminator(buffer);
        if (end === -1) break;

        const frame = buffer.subarray(0, end + 1);
        buffer = buffer.subarray(end + 1);
        this.processFrame(frame, remote);
      }

      if (buffer.length > MAX_PENDING_BYTES) {
        this.overflows++;
        console.warn(`[TCP] ${remote} sent ${buffer.length} bytes without a terminator, buffer discarded`);
        buffer = Buffer.alloc(0);
      }
    });

    socket.on('close', () => {
      console.log(`Telegram connection closed: ${remote}`);
      this.connections.delete(socket);
    });

    socket.on('error', (error) => {
      console.error(`Telegram socket error (${remote}):`, error);
    });
  }

  private findTerminator(buffer: Buffer): number {
    const etx = buffer.indexOf(ETX);
    const lf = buffer.indexOf(LF);
    if (etx === -1) return lf;
    if (lf === -1) return etx;
    return Math.min(etx, lf);
  }

  private processFrame(frame: Buffer, remote: string): void {
    const raw = frame.toString('latin1').replace(/[\r\n]+$/, '');
    if (raw.trim().length === 0) return;

    this.received++;
    RawIngestLogger.write('telegram_received', { source: 'socket', remote, raw });
    this.onTelegram(raw, remote);
  }
}
