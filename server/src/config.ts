export interface ServerConfig {
  port: number;
  nodeEnv: string;
  isDevelopment: boolean;
  isLocalDev: boolean;
  allowedOrigins: Array<string | RegExp>;
  rateLimitMax: number;
  pingTimeoutMs: number;
  pingIntervalMs: number;
  /** 0 turns the periodic re-sync of playing rooms off. */
  resyncIntervalMs: number;
  emptyRoomTimeoutMs: number;
  sweepIntervalMs: number;
  maxNameLength: number;
}

const LOCAL_ORIGINS = ['http://localhost:5173', 'http://localhost:3000', 'http://127.0.0.1:5173'];

const readInt = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed >= 0 ? parsed : fallback;
};

const readOrigins = (value: string | undefined): string[] =>
  (value ?? '')
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServerConfig => {
  const nodeEnv = env.NODE_ENV ?? 'development';
  const isDevelopment = nodeEnv !== 'production';
  const isLocalDev = isDevelopment && !env.RENDER;

  const configuredOrigins = readOrigins(env.CORS_ORIGINS);
  const allowedOrigins: Array<string | RegExp> = configuredOrigins.length > 0
    ? configuredOrigins
    : isLocalDev
      ? LOCAL_ORIGINS
      : [/^https:\/\/.+$/];

  return {
    port: readInt(env.PORT, 3001),
    nodeEnv,
    isDevelopment,
    isLocalDev,
    allowedOrigins,
    rateLimitMax: readInt(env.RATE_LIMIT_MAX, isLocalDev ? 1000 : 100),
    pingTimeoutMs: readInt(env.PING_TIMEOUT_MS, isLocalDev ? 60000 : 25000),
    pingIntervalMs: readInt(env.PING_INTERVAL_MS, isLocalDev ? 25000 : 10000),
    resyncIntervalMs: readInt(env.RESYNC_INTERVAL_MS, 0),
    emptyRoomTimeoutMs: readInt(env.EMPTY_ROOM_TIMEOUT_MS, 30 * 60 * 1000),
    sweepIntervalMs: readInt(env.SWEEP_INTERVAL_MS, 10 * 60 * 1000),
    maxNameLength: readInt(env.MAX_NAME_LENGTH, 40),
  };
};

export const isOriginAllowed = (origin: string, allowedOrigins: Array<string | RegExp>): boolean =>
  allowedOrigins.some((allowed) =>
    typeof allowed === 'string' ? allowed === origin : allowed.test(origin));
