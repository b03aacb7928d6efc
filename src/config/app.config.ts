import 'dotenv/config';
import { RetryOptions } from '../utils/retry.util';
import { isLogLevel, LogLevel } from '../utils/logger';

export interface AppConfig {
  storage: {
    dbPath: string;
  };
  carrier: {
    apiUrl: string;
    apiKey: string;
    timeoutMs: number;
  };
  retry: RetryOptions;
  webhook: {
    port: number;
    token?: string;
  };
  sync: {
    intervalMs: number;   // 0 disables scheduled sync
  };
  logging: {
    level: LogLevel;
  };
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  const value = raw === undefined || raw === '' ? fallback : Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name} must be an integer between ${min} and ${max}`);
  }
  return value;
}

function readFloat(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  const value = raw === undefined || raw === '' ? fallback : Number(raw);
  if (Number.isNaN(value) || value < min || value > max) {
    throw new Error(`${name} must be a number between ${min} and ${max}`);
  }
  return value;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const logLevel = env.LOG_LEVEL || 'info';
  if (!isLogLevel(logLevel)) {
    throw new Error(`LOG_LEVEL must be one of trace, debug, info, warn, error, fatal, silent`);
  }

  const baseDelay = readInt(env, 'RETRY_BASE_DELAY_MS', 1000, 0, 600_000);
  const maxDelay = readInt(env, 'RETRY_MAX_DELAY_MS', 10_000, 0, 600_000);
  if (maxDelay < baseDelay) {
    throw new Error('RETRY_MAX_DELAY_MS must not be lower than RETRY_BASE_DELAY_MS');
  }

  return {
    storage: {
      dbPath: env.PARCEL_DB_PATH || './data/parcels.db'
    },
    carrier: {
      apiUrl: (env.TRACK17_API_URL || 'https://api.17track.net/v2').replace(/\/+$/, ''),
      apiKey: env.TRACK17_API_KEY || '',
      timeoutMs: readInt(env, 'CARRIER_TIMEOUT_MS', 10_000, 100, 120_000)
    },
    retry: {
      maxRetries: readInt(env, 'RETRY_MAX_ATTEMPTS', 3, 0, 10),
      baseDelay,
      maxDelay,
      jitterFactor: readFloat(env, 'RETRY_JITTER_FACTOR', 0.1, 0, 1)
    },
    webhook: {
      port: readInt(env, 'WEBHOOK_PORT', 8080, 1, 65_535),
      token: env.WEBHOOK_TOKEN || undefined
    },
    sync: {
      intervalMs: readInt(env, 'SYNC_INTERVAL_MS', 0, 0, 7 * 24 * 3_600_000)
    },
    logging: {
      level: logLevel
    }
  };
}
