/**
 * Command Parser
 *
 * Turns control-channel text into a Command. Returns null for anything
 * that is not a recognized command; throws CommandUsageError when a
 * recognized command has bad arguments.
 */

import { CommandUsageError } from '../errors.js';
import { MAX_EXPIRY_HOURS } from '../store/schema.js';
import { parseTarget } from '../store/target.js';
import type { GroupListName } from '../store/types.js';
import type {
  Command,
  CommandName,
  DuplicatesAction,
  GroupListAction,
  TargetAction,
} from './types.js';

const COMMAND_NAMES: ReadonlySet<string> = new Set<CommandName>([
  'help',
  'keywords',
  'add',
  'remove',
  'clear',
  'groups',
  'whitelist',
  'blacklist',
  'duplicates',
  'target',
  'status',
]);

function isCommandName(value: string): value is CommandName {
  return COMMAND_NAMES.has(value);
}

export function parseCommand(text: string): Command | null {
  const trimmed = text.trim();
  const match = /^\/([A-Za-z]+)(?:@\w+)?(?:\s+([\s\S]*))?$/.exec(trimmed);
  if (!match) {
    return null;
  }

  const name = match[1].toLowerCase();
  const rest = (match[2] ?? '').trim();

  if (!isCommandName(name)) {
    return null;
  }

  switch (name) {
    case 'help':
    case 'keywords':
    case 'clear':
    case 'groups':
    case 'status':
      return { name, args: {} };

    case 'add':
      if (!rest) {
        throw new CommandUsageError('Please provide a keyword.\n\nExample: /add python');
      }
      return { name, args: { pattern: rest } };

    case 'remove':
      return { name, args: { selector: rest || null } };

    case 'whitelist':
    case 'blacklist':
      return { name, args: { action: parseGroupListAction(name, rest) } };

    case 'duplicates':
      return { name, args: { action: parseDuplicatesAction(rest) } };

    case 'target':
      return { name, args: { action: parseTargetAction(rest) } };
  }
}

function splitAction(rest: string): [string, string] {
  const [action = '', ...remainder] = rest.split(/\s+/);
  return [action.toLowerCase(), remainder.join(' ').trim()];
}

function parseGroupListAction(list: GroupListName, rest: string): GroupListAction {
  const [action, value] = splitAction(rest);

  switch (action) {
    case 'list':
      return { kind: 'list' };
    case 'clear':
      return { kind: 'clear' };
    case 'add':
      if (!value) {
        throw new CommandUsageError(
          `Please provide a group name or chat id.\n\nExample: /${list} add Python Developers`
        );
      }
      return { kind: 'add', entry: value };
    case 'remove':
      if (!value) {
        throw new CommandUsageError(
          `Please provide a number or group name.\n\nExample: /${list} remove 1`
        );
      }
      return { kind: 'remove', selector: value };
    case '':
      throw new CommandUsageError(
        `Please specify an action: add, remove, list, clear\n\nExample: /${list} list`
      );
    default:
      throw new CommandUsageError(
        `Unknown action: ${action}\n\nAvailable actions: add, remove, list, clear`
      );
  }
}

function parseDuplicatesAction(rest: string): DuplicatesAction {
  const [action, value] = splitAction(rest);

  switch (action) {
    case '':
      return { kind: 'show' };
    case 'on':
      return { kind: 'enable', enabled: true };
    case 'off':
      return { kind: 'enable', enabled: false };
    case 'clear':
      return { kind: 'clearCache' };
    case 'debug':
      if (value === '' || value.toLowerCase() === 'status') {
        return { kind: 'debugStatus' };
      }
      throw new CommandUsageError('Usage: /duplicates debug status');
    case 'hours': {
      if (!/^\d+$/.test(value)) {
        throw new CommandUsageError('Please provide a whole number of hours.\n\nExample: /duplicates hours 12');
      }
      const hours = Number(value);
      if (hours < 1 || hours > MAX_EXPIRY_HOURS) {
        throw new CommandUsageError(`Hours must be between 1 and ${MAX_EXPIRY_HOURS} (one week).`);
      }
      return { kind: 'hours', hours };
    }
    case 'sender': {
      const setting = value.toLowerCase();
      if (setting !== 'on' && setting !== 'off') {
        throw new CommandUsageError("Use 'on' or 'off'.\n\nExample: /duplicates sender off");
      }
      return { kind: 'sender', includeSender: setting === 'on' };
    }
    default:
      throw new CommandUsageError(
        `Unknown action: ${action}\n\nAvailable actions: on, off, hours, sender, debug status, clear`
      );
  }
}

function parseTargetAction(rest: string): TargetAction {
  const [action, value] = splitAction(rest);

  switch (action) {
    case '':
      return { kind: 'show' };
    case 'test':
      return { kind: 'test' };
    case 'set':
    case 'check': {
      if (!value) {
        throw new CommandUsageError(
          `Please provide a target.\n\nExample: /target ${action} @my_alerts`
        );
      }
      const target = parseTarget(value);
      if (!target) {
        throw new CommandUsageError(
          `Unrecognized target: ${value}\n\n` +
            'Use me, a chat id (-1001234567890), a public handle (@channel) or an invite link (https://t.me/+abc).'
        );
      }
      return action === 'set' ? { kind: 'set', target } : { kind: 'check', target };
    }
    default:
      throw new CommandUsageError(
        `Unknown action: ${action}\n\nAvailable actions: set <value>, test, check <value>`
      );
  }
}
