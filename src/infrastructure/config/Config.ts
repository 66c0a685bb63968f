import dotenv from "dotenv";
import type { LogLevel } from "../../domain/ports/ILogger.js";
import type { ObserverLocation } from "../../domain/entities/ObserverLocation.js";

// Load environment variables from .env when present
dotenv.config();

type Env = Record<string, string | undefined>;

export interface AppConfig {
  telescope: {
    /** Unset means the bridge starts without connecting */
    host?: string;
    tcpPort: number;
    udpPort: number;
    connectTimeoutMs: number;
    requestTimeoutMs: number;
    gotoTimeoutMs: number;
  };
  heartbeat: {
    intervalMs: number;
    silenceMs: number;
  };
  reconnection: {
    baseDelayMs: number;
    maxDelayMs: number;
    /** 0 = unbounded */
    maxAttempts: number;
  };
  observer: {
    latitude: number | null;
    longitude: number | null;
    elevationMeters: number;
    timezoneId: string;
  };
  catalogs: {
    timeoutMs: number;
    cacheTtlMs: number;
    cacheSize: number;
    deepSkyCatalogPath?: string;
  };
  http: {
    port: number;
    host: string;
  };
  logging: {
    level: LogLevel;
    pretty: boolean;
  };
}

const LOG_LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function getEnvOrDefault(env: Env, key: string, defaultValue: string): string {
  const value = env[key]?.trim();
  return value ? value : defaultValue;
}

function getEnvOptional(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Unparseable values come back as NaN so validateConfig can name them
 */
function getEnvNumber(env: Env, key: string, defaultValue: number): number {
  const value = getEnvOptional(env, key);
  return value === undefined ? defaultValue : Number(value);
}

function getEnvNumberOrNull(env: Env, key: string): number | null {
  const value = getEnvOptional(env, key);
  return value === undefined ? null : Number(value);
}

/**
 * Load configuration from the environment (and .env, loaded on import)
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const level = getEnvOrDefault(env, "LOG_LEVEL", "info").toLowerCase();

  return {
    telescope: {
      host: getEnvOptional(env, "TELESCOPE_HOST"),
      tcpPort: getEnvNumber(env, "TELESCOPE_TCP_PORT", 4700),
      udpPort: getEnvNumber(env, "TELESCOPE_UDP_PORT", 4720),
      connectTimeoutMs: getEnvNumber(env, "TELESCOPE_CONNECT_TIMEOUT_MS", 10000),
      requestTimeoutMs: getEnvNumber(env, "TELESCOPE_REQUEST_TIMEOUT_MS", 30000),
      gotoTimeoutMs: getEnvNumber(env, "TELESCOPE_GOTO_TIMEOUT_MS", 120000),
    },
    heartbeat: {
      intervalMs: getEnvNumber(env, "HEARTBEAT_INTERVAL_MS", 15000),
      silenceMs: getEnvNumber(env, "HEARTBEAT_SILENCE_MS", 45000),
    },
    reconnection: {
      baseDelayMs: getEnvNumber(env, "RECONNECT_BASE_DELAY_MS", 1000),
      maxDelayMs: getEnvNumber(env, "RECONNECT_MAX_DELAY_MS", 60000),
      maxAttempts: getEnvNumber(env, "RECONNECT_MAX_ATTEMPTS", 0),
    },
    observer: {
      latitude: getEnvNumberOrNull(env, "OBSERVER_LATITUDE"),
      longitude: getEnvNumberOrNull(env, "OBSERVER_LONGITUDE"),
      elevationMeters: getEnvNumber(env, "OBSERVER_ELEVATION_M", 0),
      timezoneId: getEnvOrDefault(env, "OBSERVER_TIMEZONE", "UTC"),
    },
    catalogs: {
      timeoutMs: getEnvNumber(env, "CATALOG_TIMEOUT_MS", 10000),
      cacheTtlMs: getEnvNumber(env, "TARGET_CACHE_TTL_MS", 24 * 60 * 60 * 1000),
      cacheSize: getEnvNumber(env, "TARGET_CACHE_SIZE", 256),
      deepSkyCatalogPath: getEnvOptional(env, "DEEP_SKY_CATALOG_PATH"),
    },
    http: {
      port: getEnvNumber(env, "HTTP_PORT", 3000),
      host: getEnvOrDefault(env, "HTTP_HOST", "0.0.0.0"),
    },
    logging: {
      level: isLogLevel(level) ? level : "info",
      pretty: env.NODE_ENV !== "production",
    },
  };
}

function requirePositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got ${value}`);
  }
}

function requirePort(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new Error(`${name} must be a port between 1 and 65535, got ${value}`);
  }
}

/**
 * Validate configuration
 */
export function validateConfig(config: AppConfig): void {
  requirePort("TELESCOPE_TCP_PORT", config.telescope.tcpPort);
  requirePort("TELESCOPE_UDP_PORT", config.telescope.udpPort);
  requirePort("HTTP_PORT", config.http.port);

  requirePositiveInteger("TELESCOPE_CONNECT_TIMEOUT_MS", config.telescope.connectTimeoutMs);
  requirePositiveInteger("TELESCOPE_REQUEST_TIMEOUT_MS", config.telescope.requestTimeoutMs);
  requirePositiveInteger("TELESCOPE_GOTO_TIMEOUT_MS", config.telescope.gotoTimeoutMs);
  requirePositiveInteger("HEARTBEAT_INTERVAL_MS", config.heartbeat.intervalMs);
  requirePositiveInteger("HEARTBEAT_SILENCE_MS", config.heartbeat.silenceMs);
  requirePositiveInteger("RECONNECT_BASE_DELAY_MS", config.reconnection.baseDelayMs);
  requirePositiveInteger("RECONNECT_MAX_DELAY_MS", config.reconnection.maxDelayMs);
  requirePositiveInteger("CATALOG_TIMEOUT_MS", config.catalogs.timeoutMs);
  requirePositiveInteger("TARGET_CACHE_TTL_MS", config.catalogs.cacheTtlMs);
  requirePositiveInteger("TARGET_CACHE_SIZE", config.catalogs.cacheSize);

  if (!Number.isInteger(config.reconnection.maxAttempts) || config.reconnection.maxAttempts < 0) {
    throw new Error(
      `RECONNECT_MAX_ATTEMPTS must be 0 (unbounded) or a positive integer, got ${config.reconnection.maxAttempts}`
    );
  }
  if (config.reconnection.maxDelayMs < config.reconnection.baseDelayMs) {
    throw new Error("RECONNECT_MAX_DELAY_MS must not be smaller than RECONNECT_BASE_DELAY_MS");
  }
  if (config.heartbeat.silenceMs <= config.heartbeat.intervalMs) {
    throw new Error("HEARTBEAT_SILENCE_MS must be greater than HEARTBEAT_INTERVAL_MS");
  }

  const { latitude, longitude, elevationMeters } = config.observer;
  if ((latitude === null) !== (longitude === null)) {
    throw new Error("OBSERVER_LATITUDE and OBSERVER_LONGITUDE must be set together");
  }
  if (latitude !== null && (!Number.isFinite(latitude) || latitude < -90 || latitude > 90)) {
    throw new Error(`OBSERVER_LATITUDE must be between -90 and 90, got ${latitude}`);
  }
  if (longitude !== null && (!Number.isFinite(longitude) || longitude < -180 || longitude > 180)) {
    throw new Error(`OBSERVER_LONGITUDE must be between -180 and 180, got ${longitude}`);
  }
  if (!Number.isFinite(elevationMeters)) {
    throw new Error(`OBSERVER_ELEVATION_M must be a number, got ${elevationMeters}`);
  }
}

/**
 * The configured observer position, or null when none was given
 */
export function observerLocationFrom(config: AppConfig): ObserverLocation | null {
  const { latitude, longitude, elevationMeters, timezoneId } = config.observer;
  if (latitude === null || longitude === null) return null;
  return { latitude, longitude, elevationMeters, timezoneId };
}
