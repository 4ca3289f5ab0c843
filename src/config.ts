import path from 'path';
import type { LogLevel } from './services/Logger';
import { parseLogLevel } from './services/Logger';
import type { RateLimitConfig } from './services/RateLimiter';
import type { SchedulerConfig } from './services/MonitorScheduler';
import { DEFAULT_API_URL } from './services/BattleApiClient';
import { JsonFileStateStore } from './services/JsonFileStateStore';
import { SqliteStateStore } from './services/SqliteStateStore';
import type { StateStore } from './services/StateStore';

export type StateBackend = 'sqlite' | 'json';

export interface MonitorConfig {
  apiKey: string;
  apiUrl: string;
  scheduler: Omit<SchedulerConfig, 'rivalMinEncounters'>;
  rateLimit: RateLimitConfig;
  stateBackend: StateBackend;
  dataDir: string;
  logLevel: LogLevel;
  logFile: string;
  apiPort: number;
  serverApiKey: string;
}

type Env = Record<string, string | undefined>;

function isStateBackend(value: string): value is StateBackend {
  return value === 'sqlite' || value === 'json';
}

// Unset, non-numeric or out-of-range values fall back to the default
function intEnv(env: Env, name: string, fallback: number, min: number = 0): number {
  const value = parseInt(env[name] ?? String(fallback), 10);
  return isNaN(value) || value < min ? fallback : value;
}

export function loadMonitorConfig(env: Env = process.env): MonitorConfig {
  const dataDir = env.DATA_DIR || './data';
  const backend = (env.STATE_BACKEND || 'sqlite').toLowerCase();
  if (!isStateBackend(backend)) {
    throw new Error(`STATE_BACKEND must be "sqlite" or "json", got "${env.STATE_BACKEND}"`);
  }

  return {
    apiKey: env.BATTLE_API_KEY || '',
    apiUrl: env.BATTLE_API_URL || DEFAULT_API_URL,
    scheduler: {
      pollIntervalMs: intEnv(env, 'POLL_INTERVAL_MS', 60000),
      backoffBaseMs: intEnv(env, 'BACKOFF_BASE_MS', 5000),
      backoffMaxMs: intEnv(env, 'BACKOFF_MAX_MS', 300000),
      maxConsecutiveFailures: intEnv(env, 'MAX_CONSECUTIVE_FAILURES', 5),
      storeFailureAlertThreshold: intEnv(env, 'STORE_FAILURE_ALERT_THRESHOLD', 3),
      profileRefreshEvery: intEnv(env, 'PROFILE_REFRESH_EVERY', 5),
    },
    rateLimit: {
      minIntervalMs: intEnv(env, 'REQUEST_MIN_INTERVAL_MS', 2000),
      maxRequestsPerWindow: intEnv(env, 'REQUESTS_PER_WINDOW', 20, 1),
      windowMs: intEnv(env, 'REQUEST_WINDOW_MS', 10000, 1),
    },
    stateBackend: backend,
    dataDir,
    logLevel: parseLogLevel(env.LOG_LEVEL),
    logFile: path.join(dataDir, 'logs', 'monitor.log'),
    apiPort: intEnv(env, 'API_PORT', 3000),
    serverApiKey: env.API_KEY || '',
  };
}

export function openStateStore(config: Pick<MonitorConfig, 'stateBackend' | 'dataDir'>): StateStore {
  if (config.stateBackend === 'json') {
    return new JsonFileStateStore(path.join(config.dataDir, 'subjects'));
  }
  return new SqliteStateStore(path.join(config.dataDir, 'monitor.db'));
}
