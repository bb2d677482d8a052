/**
 * Error types for the keyword monitor
 *
 * Each class maps to one failure domain so callers can decide
 * whether a failure is fatal, reported, or logged and dropped.
 */

export type MonitorErrorCode =
  | 'CONFIG'
  | 'PATTERN'
  | 'TRANSPORT'
  | 'DISPATCH'
  | 'COMMAND_USAGE';

export class MonitorError extends Error {
  public readonly code: MonitorErrorCode;

  constructor(code: MonitorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Malformed environment or config document. Fatal at startup.
 */
export class ConfigError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

/**
 * A keyword that does not compile to a matcher.
 */
export class PatternError extends MonitorError {
  public readonly pattern: string;

  constructor(pattern: string, message: string, options?: { cause?: unknown }) {
    super('PATTERN', message, options);
    this.pattern = pattern;
  }
}

/**
 * Connection or polling failure reported by the transport.
 */
export class TransportError extends MonitorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT', message, options);
  }
}

export type DispatchFailureReason = 'unresolved' | 'permission' | 'join' | 'send';

/**
 * Notification could not be delivered to the configured target.
 */
export class DispatchError extends MonitorError {
  public readonly reason: DispatchFailureReason;

  constructor(reason: DispatchFailureReason, message: string, options?: { cause?: unknown }) {
    super('DISPATCH', message, options);
    this.reason = reason;
  }
}

/**
 * Known command with bad arguments. The message is the usage reply.
 */
export class CommandUsageError extends MonitorError {
  constructor(message: string) {
    super('COMMAND_USAGE', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
