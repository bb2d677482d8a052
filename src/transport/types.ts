/**
 * Types for the message transport
 *
 * The transport owns the connection to the chat network. The monitor
 * only sees an event stream and a handful of send/lookup primitives.
 */

import type { ChatRef, IncomingMessage } from '../types.js';
import type { TransportError } from '../errors.js';

export interface TransportEventTypes {
  connected: [];
  disconnected: [];
  error: [error: TransportError];
}

export interface Transport {
  /** Chat id of the monitored user's private channel */
  readonly controlChatId: number;

  /** Inbound messages. Single consumer; ends when the transport stops. */
  events(): AsyncIterable<IncomingMessage>;

  start(): Promise<void>;
  stop(): Promise<void>;

  /** @throws DispatchError when the chat cannot be written to */
  sendMessage(target: ChatRef, text: string): Promise<void>;

  /** @throws DispatchError when the chat cannot be written to */
  forwardMessage(target: ChatRef, fromChatId: number, messageId: number): Promise<void>;

  /** Look up a public channel or group by handle (without "@") */
  resolveTarget(handle: string): Promise<ChatRef>;

  /** Join a chat through an invite link and return it */
  joinChannel(inviteLink: string): Promise<ChatRef>;
}
