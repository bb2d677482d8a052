/**
 * Common types for the keyword monitor
 */

// ===========================================
// Message Types
// ===========================================

export type MediaKind =
  | 'photo'
  | 'video'
  | 'document'
  | 'sticker'
  | 'voice'
  | 'video_note'
  | 'audio';

/**
 * Attachment carried by a source message. Forwarded, not re-uploaded.
 */
export interface MediaReference {
  kind: MediaKind;
}

/**
 * Message delivered by the transport
 */
export interface IncomingMessage {
  chatId: number;
  chatTitle: string;
  senderId: number | null;
  senderName: string;
  text: string;
  timestamp: number; // ms since epoch
  messageId: number;
  media?: MediaReference;
}

/**
 * Chat identity used by group filtering
 */
export interface ChatIdentity {
  chatId: number;
  chatTitle: string;
}

// ===========================================
// Target Types
// ===========================================

/**
 * Configured notification destination
 */
export type NotificationTarget =
  | { kind: 'self' }
  | { kind: 'handle'; handle: string }
  | { kind: 'chatId'; chatId: number }
  | { kind: 'invite'; link: string };

/**
 * Destination the transport can send to directly: the owner's own chat
 * or a numeric chat id.
 */
export type ChatRef = 'self' | number;
