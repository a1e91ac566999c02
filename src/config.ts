/**
 * Centralized configuration for ipcd
 *
 * Priority order:
 * 1. CLI arguments / constructor overrides (highest priority)
 * 2. Environment variables
 * 3. Default values (lowest priority)
 */

import { ConnectionMode } from './ipc/connection.ts';
import { createLogger } from './utils/logger.ts';

const log = createLogger('CONFIG');

export interface IPCDConfig {
  /** Max bytes accepted for one discrete (TEXT_DATA) message or one PERSISTENT line. Unbounded when undefined. */
  readLimit?: number;
  /** Max bytes delivered per STREAM_DATA message. */
  chunkSize: number;
  /** Pool capacity. Unbounded when undefined. */
  maxConnections?: number;
  /** Framing mode a new connection starts in. */
  defaultMode: ConnectionMode;
  /** Pause before the socket is destroyed so the peer observes the final flush. */
  closeDelayMs: number;
  /** Listen backlog passed to net.Server#listen. */
  listenBacklog: number;
  /** Client-side connect + request timeout in milliseconds. */
  connectTimeoutMs: number;
  /** Enable debug diagnostics. */
  debug: boolean;
}

/**
 * Environment variable names for configuration
 */
export const ENV_VARS = {
  IPCD_READ_LIMIT: 'IPCD_READ_LIMIT',
  IPCD_CHUNK_SIZE: 'IPCD_CHUNK_SIZE',
  IPCD_MAX_CONNECTIONS: 'IPCD_MAX_CONNECTIONS',
  IPCD_DEFAULT_MODE: 'IPCD_DEFAULT_MODE',
  IPCD_CLOSE_DELAY_MS: 'IPCD_CLOSE_DELAY_MS',
  IPCD_LISTEN_BACKLOG: 'IPCD_LISTEN_BACKLOG',
  IPCD_CONNECT_TIMEOUT_MS: 'IPCD_CONNECT_TIMEOUT_MS',
  IPCD_DEBUG: 'IPCD_DEBUG',
} as const;

const DEFAULT_CONFIG: IPCDConfig = {
  readLimit: undefined,
  chunkSize: 64 * 1024, // 64KB
  maxConnections: undefined,
  defaultMode: ConnectionMode.TEXT_DATA,
  closeDelayMs: 100,
  listenBacklog: 128,
  connectTimeoutMs: 10000,
  debug: false,
};

const MODE_NAMES: ReadonlyMap<string, ConnectionMode> = new Map([
  ['text', ConnectionMode.TEXT_DATA],
  ['data', ConnectionMode.TEXT_DATA],
  ['stream', ConnectionMode.STREAM_DATA],
  ['persistent', ConnectionMode.PERSISTENT],
]);

const clamp = (v: number, min: number, max: number): number => Math.max(min, Math.min(max, v));

function parseEnvInt(name: string, min: number, max: number): number | undefined {
  const raw = process.env[name];
  if (typeof raw !== 'string' || raw.trim() === '') return undefined;
  const n = Number(raw.trim());
  if (!Number.isFinite(n)) {
    log.warn(`Ignoring invalid ${name}='${raw}'. Using default.`);
    return undefined;
  }
  const v = Math.floor(n);
  if (v < min || v > max) {
    log.warn(`Clamping ${name}=${v} to range [${min}..${max}].`);
  }
  return clamp(v, min, max);
}

/**
 * Map a user-facing mode name (`text`, `stream`, `persistent`) to a ConnectionMode.
 *
 * @returns The mode, or undefined when the name is unknown.
 */
export function parseModeName(name: string): ConnectionMode | undefined {
  return MODE_NAMES.get(name.trim().toLowerCase());
}

function parseEnvMode(): ConnectionMode | undefined {
  const raw = process.env[ENV_VARS.IPCD_DEFAULT_MODE];
  if (typeof raw !== 'string' || raw.trim() === '') return undefined;
  const mode = parseModeName(raw);
  if (!mode) {
    log.warn(`Ignoring invalid ${ENV_VARS.IPCD_DEFAULT_MODE}='${raw}'. Expected text|stream|persistent.`);
  }
  return mode;
}

/**
 * Get the current ipcd configuration, considering environment variables
 */
export function getConfig(): IPCDConfig {
  return {
    readLimit: parseEnvInt(ENV_VARS.IPCD_READ_LIMIT, 1, 1024 * 1024 * 1024) ?? DEFAULT_CONFIG.readLimit,
    chunkSize:
      parseEnvInt(ENV_VARS.IPCD_CHUNK_SIZE, 1, 16 * 1024 * 1024) ?? DEFAULT_CONFIG.chunkSize,
    maxConnections:
      parseEnvInt(ENV_VARS.IPCD_MAX_CONNECTIONS, 1, 10000) ?? DEFAULT_CONFIG.maxConnections,
    defaultMode: parseEnvMode() ?? DEFAULT_CONFIG.defaultMode,
    closeDelayMs: parseEnvInt(ENV_VARS.IPCD_CLOSE_DELAY_MS, 0, 10000) ?? DEFAULT_CONFIG.closeDelayMs,
    listenBacklog:
      parseEnvInt(ENV_VARS.IPCD_LISTEN_BACKLOG, 1, 2048) ?? DEFAULT_CONFIG.listenBacklog,
    connectTimeoutMs:
      parseEnvInt(ENV_VARS.IPCD_CONNECT_TIMEOUT_MS, 100, 600000) ??
      DEFAULT_CONFIG.connectTimeoutMs,
    debug: process.env[ENV_VARS.IPCD_DEBUG] === '1',
  };
}

/**
 * Resolve the effective configuration: explicit overrides win over the
 * environment, which wins over defaults. Overrides set to `undefined` are ignored.
 *
 * @throws RangeError when a size, count or delay is out of range.
 */
export function resolveConfig(overrides: Partial<IPCDConfig> = {}): IPCDConfig {
  const env = getConfig();
  const config: IPCDConfig = {
    readLimit: overrides.readLimit ?? env.readLimit,
    chunkSize: overrides.chunkSize ?? env.chunkSize,
    maxConnections: overrides.maxConnections ?? env.maxConnections,
    defaultMode: overrides.defaultMode ?? env.defaultMode,
    closeDelayMs: overrides.closeDelayMs ?? env.closeDelayMs,
    listenBacklog: overrides.listenBacklog ?? env.listenBacklog,
    connectTimeoutMs: overrides.connectTimeoutMs ?? env.connectTimeoutMs,
    debug: overrides.debug ?? env.debug,
  };
  assertPositiveInt('chunkSize', config.chunkSize);
  if (config.readLimit !== undefined) assertPositiveInt('readLimit', config.readLimit);
  if (config.maxConnections !== undefined) assertPositiveInt('maxConnections', config.maxConnections);
  if (!Number.isInteger(config.closeDelayMs) || config.closeDelayMs < 0) {
    throw new RangeError(`closeDelayMs must be a non-negative integer, got ${config.closeDelayMs}`);
  }
  return config;
}

function assertPositiveInt(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
}
