import { describe, expect, it } from 'vitest';
import { isOriginAllowed, loadConfig } from './config';

describe('loadConfig', () => {
  it('uses local development defaults', () => {
    const config = loadConfig({});

    expect(config).toMatchObject({
      port: 3001,
      nodeEnv: 'development',
      isLocalDev: true,
      rateLimitMax: 1000,
      resyncIntervalMs: 0,
      emptyRoomTimeoutMs: 30 * 60 * 1000,
      maxNameLength: 40,
    });
    expect(config.allowedOrigins).toContain('http://localhost:5173');
  });

  it('tightens limits in production', () => {
    const config = loadConfig({ NODE_ENV: 'production' });

    expect(config.isDevelopment).toBe(false);
    expect(config.rateLimitMax).toBe(100);
    expect(config.pingIntervalMs).toBe(10000);
  });

  it('reads overrides and falls back on garbage', () => {
    const config = loadConfig({
      PORT: '8080',
      RESYNC_INTERVAL_MS: '2000',
      MAX_NAME_LENGTH: 'lots',
      CORS_ORIGINS: 'https://a.example, https://b.example ,',
    });

    expect(config.port).toBe(8080);
    expect(config.resyncIntervalMs).toBe(2000);
    expect(config.maxNameLength).toBe(40);
    expect(config.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
  });
});

describe('isOriginAllowed', () => {
  it('matches exact strings and patterns', () => {
    const allowed = ['https://a.example', /^https:\/\/.*\.preview\.example$/];

    expect(isOriginAllowed('https://a.example', allowed)).toBe(true);
    expect(isOriginAllowed('https://pr-1.preview.example', allowed)).toBe(true);
    expect(isOriginAllowed('https://evil.example', allowed)).toBe(false);
  });
});
