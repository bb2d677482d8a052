/**
 * Tests for environment configuration
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadEnvConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';

describe('loadEnvConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should read the Telegram settings', () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', 'test-secret');
    vi.stubEnv('TELEGRAM_OWNER_CHAT_ID', '777');
    vi.stubEnv('TELEGRAM_RETRY_ATTEMPTS', '5');

    expect(loadEnvConfig().telegram).toEqual({
      botToken: 'test-secret',
      ownerChatId: 777,
      retryAttempts: 5,
    });
  });

  it('should read monitor settings', () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', 'test-secret');
    vi.stubEnv('TELEGRAM_OWNER_CHAT_ID', '777');
    vi.stubEnv('CONFIG_PATH', '/tmp/monitor.json');
    vi.stubEnv('DEDUP_SWEEP_INTERVAL_MS', '1000');
    vi.stubEnv('SHUTDOWN_GRACE_MS', '250');

    expect(loadEnvConfig().monitor).toEqual({
      configPath: '/tmp/monitor.json',
      dedupSweepIntervalMs: 1000,
      shutdownGraceMs: 250,
    });
  });

  it('should fail without a bot token', () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', '');
    vi.stubEnv('TELEGRAM_OWNER_CHAT_ID', '777');

    expect(() => loadEnvConfig()).toThrow(
      new ConfigError('Missing required environment variable: TELEGRAM_BOT_TOKEN')
    );
  });

  it('should fail on a non-numeric owner chat id', () => {
    vi.stubEnv('TELEGRAM_BOT_TOKEN', 'test-secret');
    vi.stubEnv('TELEGRAM_OWNER_CHAT_ID', 'owner');

    expect(() => loadEnvConfig()).toThrow('Environment variable TELEGRAM_OWNER_CHAT_ID must be a number');
  });
});
