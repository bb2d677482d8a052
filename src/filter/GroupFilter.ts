/**
 * Group Filter
 *
 * Decides whether a source chat is eligible for matching.
 * Blacklist wins over whitelist; an empty whitelist admits every chat.
 */

import type { ChatIdentity } from '../types.js';
import type { Config, ConfigReader } from '../store/types.js';

export class GroupFilter {
  private readonly store: ConfigReader;

  constructor(store: ConfigReader) {
    this.store = store;
  }

  public allow(chat: ChatIdentity, config: Config = this.store.snapshot()): boolean {
    const { whitelist, blacklist } = config.groups;

    if (blacklist.some((entry) => entryMatches(entry, chat))) {
      return false;
    }

    if (whitelist.length > 0) {
      return whitelist.some((entry) => entryMatches(entry, chat));
    }

    return true;
  }
}

/**
 * An entry names a chat by exact numeric id or by display name, ignoring case
 */
export function entryMatches(entry: string, chat: ChatIdentity): boolean {
  const trimmed = entry.trim();
  if (trimmed === String(chat.chatId)) {
    return true;
  }
  return trimmed.toLowerCase() === chat.chatTitle.trim().toLowerCase();
}
