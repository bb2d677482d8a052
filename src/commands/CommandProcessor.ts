/**
 * Command Processor
 *
 * Executes control commands from the monitored user's private chat.
 * Each mutating command is a single ConfigStore transaction and its
 * reply is built after the transaction has committed.
 */

import { CommandUsageError, PatternError } from '../errors.js';
import { logger } from '../logger.js';
import { compileKeyword, isRegexKeyword } from '../filter/patterns.js';
import type { DedupCache } from '../dedup/DedupCache.js';
import type { NotificationDispatcher } from '../notification/NotificationDispatcher.js';
import { formatDuration } from '../notification/formatter.js';
import type { ConfigStore } from '../store/ConfigStore.js';
import { describeTarget, formatTarget } from '../store/target.js';
import type { GroupListName } from '../store/types.js';
import type { DispatchResult } from '../notification/types.js';
import { GROUPS_HELP_TEXT, HELP_TEXT } from './help.js';
import { parseCommand } from './parser.js';
import type {
  Command,
  CommandArgs,
  CommandHandlers,
  CommandName,
  DuplicatesAction,
  GroupListAction,
  TargetAction,
} from './types.js';

export interface CommandProcessorOptions {
  store: ConfigStore;
  dedup: Pick<DedupCache, 'stats' | 'clear' | 'size'>;
  dispatcher: Pick<NotificationDispatcher, 'sendTest' | 'check'>;
  startedAt?: number;
  now?: () => number;
}

type RemoveOutcome =
  | { kind: 'removed'; value: string; remaining: number }
  | { kind: 'empty' }
  | { kind: 'notFound' };

export class CommandProcessor {
  private readonly store: ConfigStore;
  private readonly dedup: CommandProcessorOptions['dedup'];
  private readonly dispatcher: CommandProcessorOptions['dispatcher'];
  private readonly now: () => number;
  private readonly startedAt: number;
  private readonly handlers: CommandHandlers;

  constructor(options: CommandProcessorOptions) {
    this.store = options.store;
    this.dedup = options.dedup;
    this.dispatcher = options.dispatcher;
    this.now = options.now ?? Date.now;
    this.startedAt = options.startedAt ?? this.now();

    this.handlers = {
      help: () => HELP_TEXT,
      keywords: () => this.listKeywords(),
      add: (args) => this.addKeyword(args.pattern),
      remove: (args) => this.removeKeyword(args.selector),
      clear: () => this.clearKeywords(),
      groups: () => GROUPS_HELP_TEXT,
      whitelist: (args) => this.manageGroupList('whitelist', args.action),
      blacklist: (args) => this.manageGroupList('blacklist', args.action),
      duplicates: (args) => this.manageDuplicates(args.action),
      target: (args) => this.manageTarget(args.action),
      status: () => this.showStatus(),
    };
  }

  /**
   * Run a control message. Returns the reply, or null when the text
   * is not a recognized command.
   */
  public async handle(text: string): Promise<string | null> {
    let command: Command | null;
    try {
      command = parseCommand(text);
    } catch (error) {
      if (error instanceof CommandUsageError) {
        return error.message;
      }
      throw error;
    }

    if (!command) {
      return null;
    }

    logger.info('Processing command', { command: command.name });

    try {
      return await runHandler(this.handlers, command.name, command.args);
    } catch (error) {
      if (error instanceof CommandUsageError) {
        return error.message;
      }
      throw error;
    }
  }

  // ===========================================
  // Keywords
  // ===========================================

  private listKeywords(): string {
    const { keywords } = this.store.snapshot();

    if (keywords.length === 0) {
      return 'No keywords configured.\n\nUse /add <keyword> to add one.';
    }

    const lines = keywords.map(
      (keyword, i) => `${i + 1}. ${keyword}${isRegexKeyword(keyword) ? ' (pattern)' : ''}`
    );
    return `Current keywords (${keywords.length}):\n\n${lines.join('\n')}\n\nUse /remove <number> to delete one.`;
  }

  private addKeyword(pattern: string): string {
    try {
      compileKeyword(pattern, this.store.snapshot().settings.caseSensitive);
    } catch (error) {
      if (error instanceof PatternError) {
        return `${error.message}\n\nExample: /add (?i)machine learning`;
      }
      throw error;
    }

    const outcome = this.store.mutate((draft) => {
      const existing = draft.keywords.find((k) => k.toLowerCase() === pattern.toLowerCase());
      if (existing !== undefined) {
        return { added: false as const, existing };
      }
      draft.keywords.push(pattern);
      return { added: true as const, count: draft.keywords.length };
    });

    if (!outcome.added) {
      return `Keyword "${outcome.existing}" already exists.`;
    }
    logger.info('Keyword added', { keyword: pattern });
    return `Keyword "${pattern}" added.\n\nKeywords: ${outcome.count}`;
  }

  private removeKeyword(selector: string | null): string {
    const outcome = this.store.mutate((draft): RemoveOutcome => {
      if (draft.keywords.length === 0) {
        return { kind: 'empty' };
      }
      if (selector === null) {
        throw new CommandUsageError(
          'Please provide a number or keyword.\n\nExample: /remove 1 or /remove python'
        );
      }
      return removeEntry(draft.keywords, selector);
    });

    switch (outcome.kind) {
      case 'empty':
        return 'No keywords to remove.';
      case 'notFound':
        return `Keyword "${selector}" not found.`;
      case 'removed':
        logger.info('Keyword removed', { keyword: outcome.value });
        return `Keyword "${outcome.value}" removed.\n\nRemaining keywords: ${outcome.remaining}`;
    }
  }

  private clearKeywords(): string {
    const count = this.store.mutate((draft) => {
      const removed = draft.keywords.length;
      draft.keywords = [];
      return removed;
    });

    if (count === 0) {
      return 'No keywords to clear.';
    }
    logger.info('Keywords cleared', { count });
    return `Removed all ${count} keywords.`;
  }

  // ===========================================
  // Groups
  // ===========================================

  private manageGroupList(list: GroupListName, action: GroupListAction): string {
    const title = list === 'whitelist' ? 'Whitelist' : 'Blacklist';

    switch (action.kind) {
      case 'list': {
        const entries = this.store.snapshot().groups[list];
        if (entries.length === 0) {
          return `${title} is empty.`;
        }
        const lines = entries.map((entry, i) => `${i + 1}. ${entry}`);
        return `${title} (${entries.length}):\n\n${lines.join('\n')}`;
      }

      case 'add': {
        const outcome = this.store.mutate((draft) => {
          const entries = draft.groups[list];
          const existing = entries.find((e) => e.toLowerCase() === action.entry.toLowerCase());
          if (existing !== undefined) {
            return { added: false as const, existing };
          }
          entries.push(action.entry);
          return { added: true as const, count: entries.length };
        });

        if (!outcome.added) {
          return `"${outcome.existing}" is already in the ${list}.`;
        }
        return `Added "${action.entry}" to the ${list}.\n\nEntries: ${outcome.count}`;
      }

      case 'remove': {
        const outcome = this.store.mutate((draft): RemoveOutcome => {
          const entries = draft.groups[list];
          if (entries.length === 0) {
            return { kind: 'empty' };
          }
          return removeEntry(entries, action.selector);
        });

        switch (outcome.kind) {
          case 'empty':
            return `${title} is empty.`;
          case 'notFound':
            return `"${action.selector}" not found in the ${list}.`;
          case 'removed':
            return `Removed "${outcome.value}" from the ${list}.`;
        }
      }

      case 'clear': {
        const count = this.store.mutate((draft) => {
          const removed = draft.groups[list].length;
          draft.groups[list] = [];
          return removed;
        });
        return count === 0 ? `${title} is already empty.` : `${title} cleared (${count} entries removed).`;
      }
    }
  }

  // ===========================================
  // Duplicate detection
  // ===========================================

  private manageDuplicates(action: DuplicatesAction): string {
    switch (action.kind) {
      case 'show': {
        const { duplicates } = this.store.snapshot();
        return [
          'Duplicate detection',
          '',
          `Status: ${duplicates.enabled ? 'enabled' : 'disabled'}`,
          `Expiry: ${duplicates.expiryHours} hours`,
          `Include sender: ${yesNo(duplicates.includeSender)}`,
          `Cached messages: ${this.dedup.size()}`,
          '',
          'Use /duplicates on|off, /duplicates hours <n>, /duplicates sender on|off',
        ].join('\n');
      }

      case 'enable':
        this.store.mutate((draft) => {
          draft.duplicates.enabled = action.enabled;
        });
        return action.enabled ? 'Duplicate detection enabled.' : 'Duplicate detection disabled.';

      case 'hours':
        this.store.mutate((draft) => {
          draft.duplicates.expiryHours = action.hours;
        });
        return `Duplicate expiry set to ${action.hours} hours.`;

      case 'sender':
        this.store.mutate((draft) => {
          draft.duplicates.includeSender = action.includeSender;
        });
        return action.includeSender
          ? 'The sender is now part of duplicate detection.'
          : 'The sender is now ignored by duplicate detection.';

      case 'debugStatus': {
        const stats = this.dedup.stats();
        return [
          'Duplicate cache status',
          '',
          `Enabled: ${yesNo(stats.enabled)}`,
          `Entries: ${stats.size}`,
          `Expiry: ${stats.expiryHours} hours`,
          `Include sender: ${yesNo(stats.includeSender)}`,
          `Oldest entry: ${stats.oldestEntryAgeMs === null ? 'none' : `${formatDuration(stats.oldestEntryAgeMs)} ago`}`,
        ].join('\n');
      }

      case 'clearCache': {
        const count = this.dedup.clear();
        logger.info('Duplicate cache cleared', { count });
        return `Cleared ${count} cached messages.`;
      }
    }
  }

  // ===========================================
  // Notification target
  // ===========================================

  private async manageTarget(action: TargetAction): Promise<string> {
    switch (action.kind) {
      case 'show': {
        const target = this.store.snapshot().notificationTarget;
        return `Notification target: ${describeTarget(target)}\nValue: ${formatTarget(target)}`;
      }

      case 'set':
        this.store.mutate((draft) => {
          draft.notificationTarget = action.target;
        });
        logger.info('Notification target changed', { target: formatTarget(action.target) });
        return `Notification target set to ${describeTarget(action.target)}.\n\nUse /target test to send a test notification.`;

      case 'test': {
        const result = await this.dispatcher.sendTest();
        const target = describeTarget(this.store.snapshot().notificationTarget);
        return result.ok
          ? `Test notification sent to ${target}.`
          : `Test notification to ${target} failed: ${describeFailure(result)}`;
      }

      case 'check': {
        const result = await this.dispatcher.check(action.target);
        const target = describeTarget(action.target);
        return result.ok
          ? `${target} is reachable. Use /target set ${formatTarget(action.target)} to use it.`
          : `Check of ${target} failed: ${describeFailure(result)}`;
      }
    }
  }

  // ===========================================
  // Status
  // ===========================================

  private showStatus(): string {
    const config = this.store.snapshot();

    return [
      'Monitor status',
      '',
      `Uptime: ${formatDuration(this.now() - this.startedAt)}`,
      `Keywords: ${config.keywords.length}`,
      `Target: ${describeTarget(config.notificationTarget)}`,
      `Case sensitive: ${yesNo(config.settings.caseSensitive)}`,
      `Full messages: ${yesNo(config.settings.sendFullMessage)}`,
      `Max message length: ${config.settings.maxMessageLength}`,
      `Forward media: ${yesNo(config.settings.forwardMedia)}`,
      `Whitelist: ${config.groups.whitelist.length} groups`,
      `Blacklist: ${config.groups.blacklist.length} groups`,
      `Duplicate detection: ${config.duplicates.enabled ? `enabled (${config.duplicates.expiryHours}h)` : 'disabled'}`,
      `Duplicate cache: ${this.dedup.size()} entries`,
    ].join('\n');
  }
}

function runHandler<K extends CommandName>(
  handlers: CommandHandlers,
  name: K,
  args: CommandArgs[K]
): string | Promise<string> {
  return handlers[name](args);
}

/**
 * Remove by 1-based position, else by first case-insensitive match.
 * A number that is neither a valid position nor an entry is a usage error.
 */
function removeEntry(entries: string[], selector: string): RemoveOutcome {
  const isNumber = /^\d+$/.test(selector);

  if (isNumber) {
    const index = Number(selector) - 1;
    if (index >= 0 && index < entries.length) {
      const [value] = entries.splice(index, 1);
      return { kind: 'removed', value, remaining: entries.length };
    }
  }

  const index = entries.findIndex((entry) => entry.toLowerCase() === selector.toLowerCase());
  if (index >= 0) {
    const [value] = entries.splice(index, 1);
    return { kind: 'removed', value, remaining: entries.length };
  }

  if (isNumber) {
    throw new CommandUsageError(`Invalid number. Use 1-${entries.length}.`);
  }
  return { kind: 'notFound' };
}

function describeFailure(result: Extract<DispatchResult, { ok: false }>): string {
  return `${result.error.message} (${result.error.reason})`;
}

function yesNo(value: boolean): string {
  return value ? 'yes' : 'no';
}
