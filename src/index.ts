import express from 'express';
import { createServer } from 'http';
import { loadConfig, loadEnv } from './config/panelConfig';
import { PanelStateEngine, TelegramDrop, TelegramRejection } from './ingest/panelStateEngine';
import { TelegramTcpServer } from './tcp/telegramServer';
import { SupabaseTelegramFeed, createSupabaseClient } from './push/supabaseFeed';
import { PanelEventStorage } from './storage/panelEventStorage';
import { RawIngestLogger } from './logging/rawIngestLogger';
import { createRoutes } from './api/routes';
import { StatusWebSocketServer } from './api/statusWebsocket';

// Load environment variables first
loadEnv();

async function startServer() {
  console.log('Starting fire panel telegram service...');
  const config = loadConfig();
  RawIngestLogger.configure({ enabled: config.rawIngestLogEnabled });

  const engine = new PanelStateEngine(config);
  engine.on('telegram-dropped', (drop: TelegramDrop) => {
    RawIngestLogger.write('telegram_dropped', { source: drop.source, reason: drop.reason, raw: drop.raw });
  });
  engine.on('telegram-rejected', (rejection: TelegramRejection) => {
    RawIngestLogger.write('telegram_rejected', {
      source: rejection.source,
      kind: rejection.kind,
      reason: rejection.reason,
      raw: rejection.raw
    });
  });

  let events: PanelEventStorage | null = null;
  if (config.eventLogEnabled) {
    const { query } = await import('./storage/database');
    events = new PanelEventStorage(query);
    events.attachTo(engine);
  }

  engine.start();

  // Socket producer
  const tcpServer = new TelegramTcpServer(config.telegramTcpPort, (raw) => engine.ingest(raw, 'socket'));
  await tcpServer.start();

  // Push producer
  let feed: SupabaseTelegramFeed | null = null;
  if (config.supabaseUrl && config.supabaseKey) {
    const client = createSupabaseClient(config.supabaseUrl, config.supabaseKey);
    feed = new SupabaseTelegramFeed(client, config.supabaseTelegramTable, (raw) => engine.ingest(raw, 'push'));
    feed.start();
  } else {
    console.warn('⚠️ SUPABASE_URL / SUPABASE_ANON_KEY not set, push producer disabled');
  }

  // REST API
  const app = express();
  app.use(express.json());
  app.use('/api', createRoutes(engine, events));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      label: engine.getAggregatedLabel().text,
      services: {
        tcp: `listening on port ${config.telegramTcpPort}`,
        push: feed ? `subscribed to ${config.supabaseTelegramTable}` : 'disabled',
        api: `listening on port ${config.apiPort}`,
        mode: engine.getMode()
      }
    });
  });

  const httpServer = createServer(app);
  const statusSocket = new StatusWebSocketServer(engine);
  httpServer.on('upgrade', (request, socket, head) => {
    const pathname = new URL(request.url || '/', 'http://localhost').pathname;
    if (pathname === statusSocket.getPath()) {
      statusSocket.handleUpgrade(request, socket, head);
    } else {
      socket.destroy();
    }
  });

  httpServer.listen(config.apiPort, () => {
    console.log(`REST API server listening on port ${config.apiPort}`);
  });

  console.log('\n=== Fire Panel Telegram Service Started ===');
  console.log(`Protocol: ${config.protocol} (${config.deviceCount} devices)`);
  console.log(`Ingest mode: ${config.ingestMode}`);
  console.log(`TCP telegrams: ${config.telegramTcpPort}`);
  console.log(`REST API: ${config.apiPort}`);
  console.log(`Status WebSocket: ${statusSocket.getPath()}`);
  console.log('===========================================\n');

  // Graceful shutdown
  process.on('SIGINT', () => {
    console.log('\nShutting down server...');
    engine.stop();
    statusSocket.close();
    httpServer.close();
    Promise.all([tcpServer.stop(), feed ? feed.stop() : Promise.resolve()])
      .catch((error) => console.error('Shutdown error:', error))
      .finally(() => process.exit(0));
  });
}

startServer().catch((error) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
