/**
 * Types for CommandProcessor
 *
 * Commands are parsed once into a tagged value, then dispatched through
 * a handler table keyed by command name.
 */

import type { NotificationTarget } from '../types.js';

type NoArgs = Record<string, never>;

export type GroupListAction =
  | { kind: 'list' }
  | { kind: 'add'; entry: string }
  | { kind: 'remove'; selector: string }
  | { kind: 'clear' };

export type DuplicatesAction =
  | { kind: 'show' }
  | { kind: 'enable'; enabled: boolean }
  | { kind: 'hours'; hours: number }
  | { kind: 'sender'; includeSender: boolean }
  | { kind: 'debugStatus' }
  | { kind: 'clearCache' };

export type TargetAction =
  | { kind: 'show' }
  | { kind: 'set'; target: NotificationTarget }
  | { kind: 'test' }
  | { kind: 'check'; target: NotificationTarget };

export interface CommandArgs {
  help: NoArgs;
  keywords: NoArgs;
  add: { pattern: string };
  /** Position (1-based) or keyword text; null when omitted */
  remove: { selector: string | null };
  clear: NoArgs;
  groups: NoArgs;
  whitelist: { action: GroupListAction };
  blacklist: { action: GroupListAction };
  duplicates: { action: DuplicatesAction };
  target: { action: TargetAction };
  status: NoArgs;
}

export type CommandName = keyof CommandArgs;

export type Command = {
  [K in CommandName]: { name: K; args: CommandArgs[K] };
}[CommandName];

export type CommandHandlers = {
  [K in CommandName]: (args: CommandArgs[K]) => string | Promise<string>;
};
