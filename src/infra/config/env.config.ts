/**
 * Centralized environment configuration.
 * All env keys and defaults in one place. Works with .env (local) and container env.
 */

/** Redis connection config. */
export interface RedisConfig {
  host: string;
  port: number;
  /** Redis database number (0-15). */
  db?: number;
}

/** Backing store for node identities. */
export type NodeStoreDriver = 'redis' | 'memory';

/** Settings for outbound node calls and connection teardown. */
export interface NodeRpcConfig {
  /** Default per-call timeout when the caller passes none. */
  callTimeoutMs: number;
  /** Fail pending calls as soon as their node disconnects instead of letting each time out. */
  failPendingOnDisconnect: boolean;
}

/** Env key constants. */
export const EnvKeys = {
  PORT: 'PORT',
  REDIS_HOST: 'REDIS_HOST',
  REDIS_PORT: 'REDIS_PORT',
  REDIS_DB: 'REDIS_DB',
  NODE_STORE_DRIVER: 'NODE_STORE_DRIVER',
  NODE_RPC_TIMEOUT_MS: 'NODE_RPC_TIMEOUT_MS',
  NODE_RPC_FAIL_PENDING_ON_DISCONNECT: 'NODE_RPC_FAIL_PENDING_ON_DISCONNECT',
} as const;

function getEnvString(key: string, defaultValue: string): string {
  const v = process.env[key]?.trim();
  return v ? v : defaultValue;
}

function getEnvInt(key: string, defaultValue: number): number {
  const v = process.env[key];
  if (v == null || v.trim() === '') return defaultValue;
  const n = parseInt(v, 10);
  return Number.isNaN(n) ? defaultValue : n;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const v = process.env[key]?.trim().toLowerCase();
  if (v == null || v === '') return defaultValue;
  return v === 'true' || v === '1';
}

/** HTTP + WebSocket server port. */
export function getPort(): number {
  return getEnvInt(EnvKeys.PORT, 8000);
}

/** Redis connection config. */
export function getRedisConfig(): RedisConfig {
  const config: RedisConfig = {
    host: getEnvString(EnvKeys.REDIS_HOST, 'localhost'),
    port: getEnvInt(EnvKeys.REDIS_PORT, 6379),
  };
  const db = getEnvInt(EnvKeys.REDIS_DB, 0);
  if (db >= 0 && db <= 15) {
    config.db = db;
  }
  return config;
}

/** Node store driver. Unknown values fall back to redis. */
export function getNodeStoreDriver(): NodeStoreDriver {
  const raw = process.env[EnvKeys.NODE_STORE_DRIVER]?.trim().toLowerCase();
  return raw === 'memory' ? 'memory' : 'redis';
}

/** NestJS injection token for NodeRpcConfig. */
export const NODE_RPC_CONFIG = 'NodeRpcConfig' as const;

/** Longest delay a Node.js timer can hold; larger values fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 0x7fffffff;

/** Outbound call settings. Timeouts outside 1..MAX_TIMER_DELAY_MS fall back to the default. */
export function getNodeRpcConfig(): NodeRpcConfig {
  const timeout = getEnvInt(EnvKeys.NODE_RPC_TIMEOUT_MS, 30000);
  return {
    callTimeoutMs: timeout > 0 && timeout <= MAX_TIMER_DELAY_MS ? timeout : 30000,
    failPendingOnDisconnect: getEnvBool(EnvKeys.NODE_RPC_FAIL_PENDING_ON_DISCONNECT, true),
  };
}
