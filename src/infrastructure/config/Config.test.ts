import { describe, it, expect } from 'vitest';
import { loadConfig, observerLocationFrom, validateConfig } from './Config.js';

describe('Config', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.telescope).toEqual({
      host: undefined,
      tcpPort: 4700,
      udpPort: 4720,
      connectTimeoutMs: 10000,
      requestTimeoutMs: 30000,
      gotoTimeoutMs: 120000,
    });
    expect(config.reconnection).toEqual({ baseDelayMs: 1000, maxDelayMs: 60000, maxAttempts: 0 });
    expect(config.catalogs.cacheTtlMs).toBe(86400000);
    expect(config.http).toEqual({ port: 3000, host: '0.0.0.0' });
    expect(config.logging).toEqual({ level: 'info', pretty: true });
    expect(observerLocationFrom(config)).toBeNull();
    expect(() => validateConfig(config)).not.toThrow();
  });

  it('should read telescope and observer settings', () => {
    const config = loadConfig({
      TELESCOPE_HOST: ' 192.168.1.50 ',
      TELESCOPE_TCP_PORT: '4701',
      OBSERVER_LATITUDE: '34.0522',
      OBSERVER_LONGITUDE: '-118.2437',
      OBSERVER_ELEVATION_M: '89',
      OBSERVER_TIMEZONE: 'America/Los_Angeles',
      LOG_LEVEL: 'DEBUG',
      NODE_ENV: 'production',
    });

    expect(config.telescope.host).toBe('192.168.1.50');
    expect(config.telescope.tcpPort).toBe(4701);
    expect(observerLocationFrom(config)).toEqual({
      latitude: 34.0522,
      longitude: -118.2437,
      elevationMeters: 89,
      timezoneId: 'America/Los_Angeles',
    });
    expect(config.logging).toEqual({ level: 'debug', pretty: false });
  });

  it('should fall back to info for an unknown log level', () => {
    expect(loadConfig({ LOG_LEVEL: 'verbose' }).logging.level).toBe('info');
  });

  it.each([
    [{ TELESCOPE_TCP_PORT: 'abc' }, 'TELESCOPE_TCP_PORT must be a port between 1 and 65535, got NaN'],
    [{ HTTP_PORT: '70000' }, 'HTTP_PORT must be a port between 1 and 65535, got 70000'],
    [{ TELESCOPE_GOTO_TIMEOUT_MS: '0' }, 'TELESCOPE_GOTO_TIMEOUT_MS must be a positive integer, got 0'],
    [
      { RECONNECT_MAX_ATTEMPTS: '-1' },
      'RECONNECT_MAX_ATTEMPTS must be 0 (unbounded) or a positive integer, got -1',
    ],
    [
      { RECONNECT_BASE_DELAY_MS: '5000', RECONNECT_MAX_DELAY_MS: '1000' },
      'RECONNECT_MAX_DELAY_MS must not be smaller than RECONNECT_BASE_DELAY_MS',
    ],
    [{ HEARTBEAT_SILENCE_MS: '15000' }, 'HEARTBEAT_SILENCE_MS must be greater than HEARTBEAT_INTERVAL_MS'],
    [{ OBSERVER_LATITUDE: '34' }, 'OBSERVER_LATITUDE and OBSERVER_LONGITUDE must be set together'],
    [
      { OBSERVER_LATITUDE: '95', OBSERVER_LONGITUDE: '0' },
      'OBSERVER_LATITUDE must be between -90 and 90, got 95',
    ],
  ])('should reject %o', (env, message) => {
    expect(() => validateConfig(loadConfig(env))).toThrow(message);
  });
});
