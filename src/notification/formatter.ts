/**
 * Message Formatter
 *
 * Builds notification text and command replies. Output is plain text:
 * keywords and message bodies are user content and are sent unescaped.
 */

import type { IncomingMessage } from '../types.js';
import type { PayloadOptions } from './types.js';

/**
 * Format a keyword match notification
 *
 * Keywords: python, rust
 * Group: Dev Chat
 * Sender: Ann Lee (@ann)
 * Time: 2024-05-01 09:30:00
 * Message: ...
 * Link: https://t.me/c/1234567890/42
 */
export function formatNotification(
  keywords: readonly string[],
  message: IncomingMessage,
  options: PayloadOptions
): string {
  return [
    `Keywords: ${keywords.join(', ')}`,
    `Group: ${message.chatTitle}`,
    `Sender: ${message.senderName}`,
    `Time: ${formatTimestamp(message.timestamp)}`,
    `Message: ${formatMessageText(message.text, options)}`,
    `Link: ${buildMessageLink(message.chatId, message.messageId)}`,
  ].join('\n');
}

/**
 * Full text, or the first maxMessageLength characters plus "...".
 * Length is counted in code points so a cut never splits a surrogate pair.
 */
export function formatMessageText(text: string, options: PayloadOptions): string {
  if (options.sendFullMessage) {
    return text;
  }

  const chars = [...text];
  if (chars.length > options.maxMessageLength) {
    return chars.slice(0, options.maxMessageLength).join('') + '...';
  }
  return text;
}

/**
 * Deep link to a message in a private group or channel.
 * Supergroup and channel ids carry a -100 prefix that t.me/c links omit;
 * basic groups are negative without the prefix.
 */
export function buildMessageLink(chatId: number, messageId: number): string {
  const raw = String(chatId);
  let linkId: string;

  if (raw.startsWith('-100')) {
    linkId = raw.slice(4);
  } else {
    linkId = String(Math.abs(chatId));
  }

  return `https://t.me/c/${linkId}/${messageId}`;
}

/**
 * UTC "YYYY-MM-DD HH:mm:ss"
 */
export function formatTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString().slice(0, 19).replace('T', ' ');
}

/**
 * Format duration in ms as "1d 2h 3m 4s", omitting leading zero units
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const days = Math.floor(totalSeconds / 86400);
  const hours = Math.floor((totalSeconds % 86400) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  const parts: string[] = [];
  if (days > 0) parts.push(`${days}d`);
  if (days > 0 || hours > 0) parts.push(`${hours}h`);
  if (days > 0 || hours > 0 || minutes > 0) parts.push(`${minutes}m`);
  parts.push(`${seconds}s`);
  return parts.join(' ');
}
