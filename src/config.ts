import { config as dotenvConfig } from 'dotenv';
import { ConfigError } from './errors.js';

// Load environment variables
dotenvConfig();

function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined || value === '') {
    throw new ConfigError(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getEnvNumber(key: string, defaultValue?: number): number {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue === undefined) {
      throw new ConfigError(`Missing required environment variable: ${key}`);
    }
    return defaultValue;
  }
  const parsed = Number(value);
  if (isNaN(parsed)) {
    throw new ConfigError(`Environment variable ${key} must be a number`);
  }
  return parsed;
}

function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true';
}

// Logging settings are read eagerly: the logger is created at import time
// and must not depend on the Telegram credentials being present.
export const loggingConfig = {
  level: process.env.LOG_LEVEL || 'info',
  silent: getEnvBoolean('LOG_SILENT', false),
  dir: process.env.LOG_DIR || 'logs',
} as const;

/**
 * Read the full process configuration. Throws ConfigError on missing
 * or malformed variables.
 */
export function loadEnvConfig() {
  return {
    // Telegram Configuration
    telegram: {
      botToken: getEnvVar('TELEGRAM_BOT_TOKEN'),

      /** Private chat of the monitored user: control channel and "self" target */
      ownerChatId: getEnvNumber('TELEGRAM_OWNER_CHAT_ID'),

      /** Attempts for rate-limited sends (HTTP 429) */
      retryAttempts: getEnvNumber('TELEGRAM_RETRY_ATTEMPTS', 3),
    },

    // Monitor Configuration
    monitor: {
      /** Location of the keyword/group/dedup document */
      configPath: getEnvVar('CONFIG_PATH', 'config.json'),

      /** Period of the dedup expiry sweep */
      dedupSweepIntervalMs: getEnvNumber('DEDUP_SWEEP_INTERVAL_MS', 60 * 60 * 1000),

      /** Time given to in-flight tasks on shutdown */
      shutdownGraceMs: getEnvNumber('SHUTDOWN_GRACE_MS', 5000),
    },

    // Status Server Configuration
    statusServer: {
      enabled: getEnvBoolean('STATUS_SERVER_ENABLED', true),
      port: getEnvNumber('STATUS_SERVER_PORT', 3000),
      host: getEnvVar('STATUS_SERVER_HOST', '0.0.0.0'),
    },

    logging: loggingConfig,
  } as const;
}

export type EnvConfig = ReturnType<typeof loadEnvConfig>;
