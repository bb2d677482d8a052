import type { NotificationTarget } from '../types.js';

const SELF_ALIASES = new Set(['', 'me', 'self', 'saved']);
const CHAT_ID = /^-?\d+$/;
const INVITE_LINK = /^(?:https?:\/\/)?t(?:elegram)?\.me\/(?:\+|joinchat\/)[\w-]+\/?$/i;
const PUBLIC_LINK = /^(?:https?:\/\/)?t(?:elegram)?\.me\/([A-Za-z]\w{3,31})\/?$/i;
const HANDLE = /^@([A-Za-z]\w{3,31})$/;

/**
 * Parse a notification target string.
 * Returns null when the value is not one of the recognized forms.
 *
 * @example
 * parseTarget('me')                     // { kind: 'self' }
 * parseTarget('-1001234567890')         // { kind: 'chatId', chatId: -1001234567890 }
 * parseTarget('@alerts_channel')        // { kind: 'handle', handle: 'alerts_channel' }
 * parseTarget('https://t.me/+AbCdEf')   // { kind: 'invite', link: 'https://t.me/+AbCdEf' }
 */
export function parseTarget(value: string): NotificationTarget | null {
  const trimmed = value.trim();

  if (SELF_ALIASES.has(trimmed.toLowerCase())) {
    return { kind: 'self' };
  }

  if (CHAT_ID.test(trimmed)) {
    const chatId = Number(trimmed);
    return Number.isSafeInteger(chatId) ? { kind: 'chatId', chatId } : null;
  }

  if (INVITE_LINK.test(trimmed)) {
    return { kind: 'invite', link: trimmed.replace(/\/$/, '') };
  }

  const handle = HANDLE.exec(trimmed) ?? PUBLIC_LINK.exec(trimmed);
  if (handle) {
    return { kind: 'handle', handle: handle[1] };
  }

  return null;
}

/**
 * Inverse of parseTarget, used when writing the config document
 */
export function formatTarget(target: NotificationTarget): string {
  switch (target.kind) {
    case 'self':
      return 'me';
    case 'chatId':
      return String(target.chatId);
    case 'handle':
      return `@${target.handle}`;
    case 'invite':
      return target.link;
  }
}

/**
 * Human-readable description for replies and status
 */
export function describeTarget(target: NotificationTarget): string {
  switch (target.kind) {
    case 'self':
      return 'Saved Messages (me)';
    case 'chatId':
      return `chat ${target.chatId}`;
    case 'handle':
      return `channel @${target.handle}`;
    case 'invite':
      return `invite link ${target.link}`;
  }
}
