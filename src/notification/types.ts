/**
 * Types for NotificationDispatcher
 */

import type { DispatchError } from '../errors.js';
import type { ChatRef, NotificationTarget } from '../types.js';

export type DispatchResult =
  | { ok: true; target: ChatRef }
  | { ok: false; error: DispatchError };

/**
 * Formatting settings copied out of the config snapshot before dispatch
 */
export interface PayloadOptions {
  sendFullMessage: boolean;
  maxMessageLength: number;
}

/**
 * Everything a dispatch needs, detached from the live config
 */
export interface DispatchPlan {
  target: NotificationTarget;
  payload: PayloadOptions;
  forwardMedia: boolean;
}
