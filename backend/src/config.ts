export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type BackoffPolicy = 'fixed' | 'exponential';

export interface PollingConfig {
  pollIntervalMs: number;
  maxAttempts?: number;
  maxWaitMs?: number;
  backoff: BackoffPolicy;
  backoffMultiplier: number;
  maxIntervalMs: number;
  transientRetries: number;
  stabilityCheckMs: number;
  minResultBytes: number;
  inProgressSuffix: string;
}

export interface DeviceConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  connectTimeoutMs: number;
  connectAttempts: number;
  connectRetryDelayMs: number;
}

export interface DeliveryConfig {
  configDir: string;
  resultDir: string;
  resultFileTemplate: string;
  polling: PollingConfig;
}

export interface AppConfig {
  port: number;
  host: string;
  dbPath: string;
  device: DeviceConfig;
  delivery: DeliveryConfig;
}

export const DEFAULT_POLLING: PollingConfig = {
  pollIntervalMs: 3000,
  maxWaitMs: 120000,
  backoff: 'fixed',
  backoffMultiplier: 2,
  maxIntervalMs: 30000,
  transientRetries: 2,
  stabilityCheckMs: 500,
  minResultBytes: 10,
  inProgressSuffix: '.part',
};

export const DEFAULT_DEVICE: DeviceConfig = {
  host: '192.168.88.1',
  port: 22,
  username: 'root',
  password: '',
  connectTimeoutMs: 15000,
  connectAttempts: 3,
  connectRetryDelayMs: 2000,
};

export const DEFAULT_DELIVERY: DeliveryConfig = {
  configDir: '/root/config',
  resultDir: '/root/result',
  resultFileTemplate: '{base}_result.json',
  polling: DEFAULT_POLLING,
};

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigError(`${name} must be an integer >= ${min} (got "${raw}")`);
  }
  return value;
}

function readOptionalInt(env: Env, name: string, min: number): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  return readInt(env, name, 0, min);
}

function readNumber(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < min) {
    throw new ConfigError(`${name} must be a number >= ${min} (got "${raw}")`);
  }
  return value;
}

function readBackoff(env: Env): BackoffPolicy {
  const raw = env.POLL_BACKOFF;
  if (raw === undefined || raw.trim() === '') return DEFAULT_POLLING.backoff;
  if (raw === 'fixed' || raw === 'exponential') return raw;
  throw new ConfigError(`POLL_BACKOFF must be "fixed" or "exponential" (got "${raw}")`);
}

function readRemoteDir(env: Env, name: string, fallback: string): string {
  const value = env[name] || fallback;
  if (!value.startsWith('/') || value.split('/').includes('..')) {
    throw new ConfigError(`${name} must be an absolute remote path without ".." (got "${value}")`);
  }
  return value;
}

export function resolvePollingConfig(overrides: Partial<PollingConfig> = {}): PollingConfig {
  const merged: PollingConfig = { ...DEFAULT_POLLING, ...overrides };
  // An explicit attempt bound replaces the default wall-clock bound unless both are given.
  if (overrides.maxAttempts !== undefined && overrides.maxWaitMs === undefined) {
    delete merged.maxWaitMs;
  }
  if (merged.maxAttempts === undefined && merged.maxWaitMs === undefined) {
    merged.maxWaitMs = DEFAULT_POLLING.maxWaitMs;
  }
  if (merged.pollIntervalMs <= 0) {
    throw new ConfigError('pollIntervalMs must be positive');
  }
  if (merged.maxAttempts !== undefined && merged.maxAttempts < 1) {
    throw new ConfigError('maxAttempts must be at least 1');
  }
  if (merged.backoffMultiplier < 1) {
    throw new ConfigError('backoffMultiplier must be at least 1');
  }
  return merged;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const polling = resolvePollingConfig({
    pollIntervalMs: readInt(env, 'POLL_INTERVAL_MS', DEFAULT_POLLING.pollIntervalMs, 1),
    maxAttempts: readOptionalInt(env, 'POLL_MAX_ATTEMPTS', 1),
    maxWaitMs: readOptionalInt(env, 'POLL_MAX_WAIT_MS', 1),
    backoff: readBackoff(env),
    backoffMultiplier: readNumber(env, 'POLL_BACKOFF_MULTIPLIER', DEFAULT_POLLING.backoffMultiplier, 1),
    maxIntervalMs: readInt(env, 'POLL_MAX_INTERVAL_MS', DEFAULT_POLLING.maxIntervalMs, 1),
    transientRetries: readInt(env, 'POLL_TRANSIENT_RETRIES', DEFAULT_POLLING.transientRetries, 0),
    stabilityCheckMs: readInt(env, 'POLL_STABILITY_MS', DEFAULT_POLLING.stabilityCheckMs, 0),
    minResultBytes: readInt(env, 'POLL_MIN_RESULT_BYTES', DEFAULT_POLLING.minResultBytes, 0),
    inProgressSuffix: env.POLL_IN_PROGRESS_SUFFIX || DEFAULT_POLLING.inProgressSuffix,
  });

  const password = env.DEVICE_PASSWORD || '';
  if (!password) {
    console.warn('WARNING: DEVICE_PASSWORD is empty; SFTP login will rely on the device accepting it');
  }

  return {
    port: readInt(env, 'PORT', 3000, 0),
    host: env.HOST || '127.0.0.1',
    dbPath: env.DB_PATH || 'data/history.db',
    device: {
      host: env.DEVICE_HOST || DEFAULT_DEVICE.host,
      port: readInt(env, 'DEVICE_PORT', DEFAULT_DEVICE.port, 1),
      username: env.DEVICE_USERNAME || DEFAULT_DEVICE.username,
      password,
      connectTimeoutMs: readInt(env, 'CONNECT_TIMEOUT_MS', DEFAULT_DEVICE.connectTimeoutMs, 1),
      connectAttempts: readInt(env, 'CONNECT_ATTEMPTS', DEFAULT_DEVICE.connectAttempts, 1),
      connectRetryDelayMs: readInt(env, 'CONNECT_RETRY_DELAY_MS', DEFAULT_DEVICE.connectRetryDelayMs, 0),
    },
    delivery: {
      configDir: readRemoteDir(env, 'REMOTE_CONFIG_DIR', DEFAULT_DELIVERY.configDir),
      resultDir: readRemoteDir(env, 'REMOTE_RESULT_DIR', DEFAULT_DELIVERY.resultDir),
      resultFileTemplate: env.RESULT_FILE_TEMPLATE || DEFAULT_DELIVERY.resultFileTemplate,
      polling,
    },
  };
}
