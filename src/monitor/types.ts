/**
 * Types for MonitorService
 */

import type { DispatchError } from '../errors.js';
import type { IncomingMessage } from '../types.js';

export type SuppressReason = 'group' | 'no-match' | 'duplicate';

export interface MonitorEventTypes {
  notified: [keywords: readonly string[], message: IncomingMessage];
  suppressed: [reason: SuppressReason, message: IncomingMessage];
  dispatchFailed: [error: DispatchError, message: IncomingMessage];
  commandHandled: [command: string, reply: string];
  error: [error: Error];
}

export interface MonitorCounters {
  received: number;
  notified: number;
  suppressedGroup: number;
  suppressedNoMatch: number;
  suppressedDuplicate: number;
  dispatchFailed: number;
  commands: number;
}

export interface MonitorStatus {
  isRunning: boolean;
  uptimeMs: number;
  inFlight: number;
  keywords: number;
  target: string;
  dedupEnabled: boolean;
  dedupCacheSize: number;
  counters: MonitorCounters;
}

export interface ShutdownReport {
  completed: number;
  abandoned: number;
}
