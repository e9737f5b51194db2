import { createServer } from 'http';
import { Server } from 'socket.io';
import { createApp } from './src/app';
import { Broadcaster } from './src/broadcaster';
import { systemClock } from './src/clock';
import { isOriginAllowed, loadConfig } from './src/config';
import { startMaintenance } from './src/maintenance';
import { RoomRegistry } from './src/roomManager';
import type { SyncContext } from './src/session';
import { attachSyncHandlers } from './src/socketTransport';
import type { SyncServer } from './src/socketTransport';
import { SyncEngine } from './src/syncEngine';
import type { ClientToServerEvents, ServerToClientEvents } from './src/types';
import { logProduction } from './src/utils';

const config = loadConfig();

const context: SyncContext = {
  registry: new RoomRegistry(systemClock),
  engine: new SyncEngine(systemClock),
  broadcaster: new Broadcaster(),
  maxNameLength: config.maxNameLength,
};

const app = createApp({
  registry: context.registry,
  engine: context.engine,
  config,
  connectionCount: () => io.engine.clientsCount,
});
const server = createServer(app);

const io: SyncServer = new Server<ClientToServerEvents, ServerToClientEvents>(server, {
  cors: {
    origin: (origin, callback) => {
      callback(null, !origin || isOriginAllowed(origin, config.allowedOrigins));
    },
    methods: ['GET', 'POST'],
    credentials: true,
  },
  pingTimeout: config.pingTimeoutMs,
  pingInterval: config.pingIntervalMs,
  maxHttpBufferSize: 1e5,
  transports: ['websocket', 'polling'],
});

attachSyncHandlers(io, context);

const stopMaintenance = startMaintenance(context, {
  resyncIntervalMs: config.resyncIntervalMs,
  sweepIntervalMs: config.sweepIntervalMs,
  emptyRoomTimeoutMs: config.emptyRoomTimeoutMs,
});

const shutdown = (signal: string): void => {
  logProduction('info', `${signal} received, shutting down gracefully`);
  stopMaintenance();
  // closes the underlying HTTP server as well
  io.close(() => {
    logProduction('info', 'Process terminated');
    process.exit(0);
  });
};

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

server.listen(config.port, () => {
  logProduction('info', '🎬 Watch Sync Server running', {
    port: config.port,
    environment: config.nodeEnv,
    corsOrigins: config.allowedOrigins.map(String),
    rateLimitMax: config.rateLimitMax,
    resyncIntervalMs: config.resyncIntervalMs,
  });
  logProduction('info', '📡 WebSocket server ready');
  logProduction('info', `🔗 Health check: http://localhost:${config.port}/api/health`);
});
