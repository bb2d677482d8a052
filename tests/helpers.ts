/**
 * Shared fixtures for tests
 */

import { vi } from 'vitest';
import { freezeConfig } from '../src/store/snapshot.js';
import type { Config, ConfigDraft } from '../src/store/types.js';
import type { ChatRef, IncomingMessage } from '../src/types.js';

export function makeConfig(overrides: Partial<ConfigDraft> = {}): Config {
  return freezeConfig({
    keywords: [],
    groups: { whitelist: [], blacklist: [] },
    settings: {
      caseSensitive: false,
      sendFullMessage: true,
      maxMessageLength: 500,
      forwardMedia: true,
    },
    duplicates: { enabled: true, expiryHours: 24, includeSender: true },
    notificationTarget: { kind: 'self' },
    ...overrides,
  });
}

export function makeMessage(overrides: Partial<IncomingMessage> = {}): IncomingMessage {
  return {
    chatId: -1001234567890,
    chatTitle: 'Python Jobs',
    senderId: 1001,
    senderName: 'Ann Lee (@ann)',
    text: 'I love Python!',
    timestamp: Date.UTC(2024, 4, 1, 9, 30, 0),
    messageId: 42,
    ...overrides,
  };
}

/**
 * Let every queued microtask run
 */
export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/**
 * Transport stand-in recording sends. Resolves handles to -100555
 * and invite links to -100666 unless told otherwise.
 */
export function createFakeTransport(controlChatId = 777) {
  return {
    controlChatId,
    sendMessage: vi.fn<[ChatRef, string], Promise<void>>().mockResolvedValue(undefined),
    forwardMessage: vi
      .fn<[ChatRef, number, number], Promise<void>>()
      .mockResolvedValue(undefined),
    resolveTarget: vi.fn<[string], Promise<ChatRef>>().mockResolvedValue(-100555),
    joinChannel: vi.fn<[string], Promise<ChatRef>>().mockResolvedValue(-100666),
  };
}

export type FakeTransport = ReturnType<typeof createFakeTransport>;
