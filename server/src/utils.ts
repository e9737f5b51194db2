import { v4 as uuidv4 } from 'uuid';

type LogLevel = 'info' | 'error' | 'warn';

const isDevelopment = process.env.NODE_ENV !== 'production';
const isLocalDev = isDevelopment && !process.env.RENDER;
const isSilent = process.env.LOG_LEVEL === 'silent' || process.env.NODE_ENV === 'test';

const colors: Record<LogLevel | 'reset', string> = {
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  reset: '\x1b[0m',
};

const serialize = (data: unknown): unknown => {
  if (data instanceof Error) {
    return { name: data.name, message: data.message };
  }
  return data;
};

export const logProduction = (level: LogLevel, message: string, data?: unknown): void => {
  if (isSilent) return;

  if (isLocalDev) {
    console.log(`${colors[level]}[${level.toUpperCase()}]${colors.reset} ${message}`);
    if (data !== undefined) {
      console.log(JSON.stringify(serialize(data), null, 2));
    }
    return;
  }

  // one JSON object per line for log collectors
  console.log(JSON.stringify({
    level,
    message,
    data: serialize(data),
    timestamp: new Date().toISOString(),
    environment: isDevelopment ? 'development' : 'production',
  }));
};

const MAX_ROOM_ID_LENGTH = 128;

// Room ids are opaque: any non-blank string within the length cap.
export const validateRoomCode = (roomCode: string): boolean => {
  return roomCode.trim().length >= 1 &&
         roomCode.length <= MAX_ROOM_ID_LENGTH;
};

const hexId = (length: number): string => uuidv4().replace(/-/g, '').slice(0, length);

export const generateRoomCode = (): string => hexId(8);

export const generateSessionId = (): string => hexId(10);
