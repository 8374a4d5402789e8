/**
 * Service configuration, read once at startup from the environment
 */
import { LogLevel, isLogLevel, createLogger } from './utils/logger';

const log = createLogger('CONFIG');

export interface ServiceConfig {
  /** Name reported by GET /health */
  serviceName: string;
  port: number;
  logLevel: LogLevel;
  /** Deadline for a whole render, including context checkout */
  requestTimeoutMs: number;
  /** Context checkout timeout; a dead engine should fail fast */
  acquireTimeoutMs: number;
  /** Window for launching the browser at startup */
  startupTimeoutMs: number;
  /** How long shutdown waits for in-flight renders */
  shutdownGraceMs: number;
  maxHtmlBytes: number;
  chromiumPath: string;
}

export const DEFAULT_REQUEST_TIMEOUT_SECONDS = 60;
export const DEFAULT_ACQUIRE_TIMEOUT_MS = 5000;
export const DEFAULT_STARTUP_TIMEOUT_MS = 30000;
export const DEFAULT_MAX_HTML_BYTES = 10 * 1024 * 1024; // 10MB
export const DEFAULT_PORT = 8080;
export const DEFAULT_CHROMIUM_PATH = '/usr/bin/chromium';
export const DEFAULT_SERVICE_NAME = 'html-pdf-renderer';

type Env = Record<string, string | undefined>;

/**
 * Parse a positive number, falling back to the default for missing or invalid values
 */
function readPositiveNumber(env: Env, key: string, defaultValue: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    log.warn(`Invalid ${key}="${raw}", using default ${defaultValue}`);
    return defaultValue;
  }
  return value;
}

function readLogLevel(env: Env): LogLevel {
  const raw = env.LOG_LEVEL?.trim().toLowerCase();
  if (!raw) {
    return 'info';
  }
  if (isLogLevel(raw)) {
    return raw;
  }
  log.warn(`Invalid LOG_LEVEL="${env.LOG_LEVEL}", using default info`);
  return 'info';
}

export function loadConfig(env: Env = process.env): ServiceConfig {
  const requestTimeoutSeconds = readPositiveNumber(env, 'REQUEST_TIMEOUT_SECONDS', DEFAULT_REQUEST_TIMEOUT_SECONDS);
  const requestTimeoutMs = Math.round(requestTimeoutSeconds * 1000);

  return {
    serviceName: env.SERVICE_NAME?.trim() || DEFAULT_SERVICE_NAME,
    port: Math.floor(readPositiveNumber(env, 'PORT', DEFAULT_PORT)),
    logLevel: readLogLevel(env),
    requestTimeoutMs,
    acquireTimeoutMs: readPositiveNumber(env, 'ACQUIRE_TIMEOUT_MS', DEFAULT_ACQUIRE_TIMEOUT_MS),
    startupTimeoutMs: readPositiveNumber(env, 'STARTUP_TIMEOUT_MS', DEFAULT_STARTUP_TIMEOUT_MS),
    shutdownGraceMs: readPositiveNumber(env, 'SHUTDOWN_GRACE_MS', requestTimeoutMs),
    maxHtmlBytes: Math.floor(readPositiveNumber(env, 'MAX_HTML_BYTES', DEFAULT_MAX_HTML_BYTES)),
    chromiumPath: env.CHROMIUM_PATH?.trim() || DEFAULT_CHROMIUM_PATH,
  };
}
