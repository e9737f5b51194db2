import express, { Router } from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import helmet from 'helmet';
import compression from 'compression';
import { isOriginAllowed } from './config';
import type { ServerConfig } from './config';
import type { RoomRegistry } from './roomManager';
import type { SyncEngine } from './syncEngine';
import { logProduction, validateRoomCode } from './utils';

export interface AppDependencies {
  registry: RoomRegistry;
  engine: SyncEngine;
  config: ServerConfig;
  connectionCount: () => number;
}

export const createRoomsRouter = (registry: RoomRegistry, engine: SyncEngine): Router => {
  const router = Router();

  // Room id allocator: hands out a fresh id before any client connects
  router.post('/', (_req: Request, res: Response): void => {
    const room = registry.create();
    res.status(201).json({ room_id: room.roomId });
  });

  router.get('/:roomId', (req: Request, res: Response): void => {
    const { roomId } = req.params;

    if (!validateRoomCode(roomId)) {
      res.status(400).json({ error: 'Invalid room id format' });
      return;
    }

    const room = registry.get(roomId);
    if (!room) {
      res.status(404).json({ error: 'Room not found' });
      return;
    }

    const snapshot = engine.snapshot(room);
    res.json({
      success: true,
      room: {
        room_id: room.roomId,
        member_count: room.members.size,
        has_host: room.hostId !== null,
        media_id: snapshot.media_id,
        playing: snapshot.playing,
        position: snapshot.position,
        created_at: room.createdAt,
        last_activity: room.lastActivity,
      },
    });
  });

  return router;
};

export const createApp = ({ registry, engine, config, connectionCount }: AppDependencies): Express => {
  const app = express();

  app.set('trust proxy', 1);

  app.use(cors({
    origin: (origin, callback) => {
      // Allow requests with no origin (curl, native clients)
      if (!origin || isOriginAllowed(origin, config.allowedOrigins)) {
        callback(null, true);
        return;
      }
      logProduction('warn', `🚫 CORS blocked origin: ${origin}`);
      callback(new Error('Not allowed by CORS'));
    },
    credentials: true,
    methods: ['GET', 'POST', 'OPTIONS'],
  }));

  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  }));
  app.use(compression());
  app.use(express.json({ limit: '100kb' }));

  const limiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: config.rateLimitMax,
    message: { error: 'Too many requests from this IP, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.method === 'OPTIONS',
  });
  app.use('/api', limiter);

  app.get('/', (_req: Request, res: Response): void => {
    res.json({ ok: true, service: 'watch-sync', ts_ms: Date.now() });
  });

  app.get('/api/health', (_req: Request, res: Response): void => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      memory: {
        roomCount: registry.size,
        connections: connectionCount(),
      },
      environment: config.nodeEnv,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/rooms', createRoomsRouter(registry, engine));

  app.use((req: Request, res: Response): void => {
    res.status(404).json({ error: 'Not found', path: req.path });
  });

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    logProduction('error', 'Express error:', err.message);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
};
