/**
 * Monitor Service
 *
 * Consumes the transport's message stream and runs each message as its
 * own task:
 *   control chat  → CommandProcessor → reply
 *   anything else → GroupFilter → KeywordMatcher → DedupCache → NotificationDispatcher
 *
 * One config snapshot is taken per message and everything the dispatch
 * needs is copied out of it before the first await, so a command that
 * commits mid-flight affects only later messages.
 */

import { EventEmitter } from 'eventemitter3';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import type { CommandProcessor } from '../commands/CommandProcessor.js';
import type { DedupCache } from '../dedup/DedupCache.js';
import { hashMessage } from '../dedup/hash.js';
import type { GroupFilter } from '../filter/GroupFilter.js';
import type { KeywordMatcher } from '../filter/KeywordMatcher.js';
import { NotificationDispatcher } from '../notification/NotificationDispatcher.js';
import { formatTarget } from '../store/target.js';
import type { ConfigReader } from '../store/types.js';
import type { Transport } from '../transport/types.js';
import type { IncomingMessage } from '../types.js';
import type {
  MonitorCounters,
  MonitorEventTypes,
  MonitorStatus,
  ShutdownReport,
  SuppressReason,
} from './types.js';

export interface MonitorServiceDeps {
  store: ConfigReader;
  groupFilter: GroupFilter;
  matcher: KeywordMatcher;
  dedup: DedupCache;
  dispatcher: Pick<NotificationDispatcher, 'send'>;
  commands: Pick<CommandProcessor, 'handle'>;
  transport: Pick<Transport, 'controlChatId' | 'sendMessage'>;
  now?: () => number;
}

export class MonitorService extends EventEmitter<MonitorEventTypes> {
  private readonly deps: MonitorServiceDeps;
  private readonly now: () => number;
  private readonly inFlight = new Set<Promise<void>>();
  private iterator: AsyncIterator<IncomingMessage> | null = null;
  private accepting = false;
  private startedAt = 0;
  private counters: MonitorCounters = {
    received: 0,
    notified: 0,
    suppressedGroup: 0,
    suppressedNoMatch: 0,
    suppressedDuplicate: 0,
    dispatchFailed: 0,
    commands: 0,
  };

  constructor(deps: MonitorServiceDeps) {
    super();
    this.deps = deps;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Consume events until the stream ends or stop() is called.
   * Each event is started as an independent task; the loop does not
   * wait for one task before taking the next event.
   */
  public async run(events: AsyncIterable<IncomingMessage>): Promise<void> {
    if (this.iterator) {
      throw new Error('MonitorService is already running');
    }

    const iterator = events[Symbol.asyncIterator]();
    this.iterator = iterator;
    this.accepting = true;
    this.startedAt = this.now();
    logger.info('Keyword monitor is running');

    while (this.accepting) {
      const next = await iterator.next();
      if (next.done || !this.accepting) break;
      this.spawn(next.value);
    }

    this.accepting = false;
    logger.info('Keyword monitor stopped accepting messages');
  }

  /**
   * Stop accepting events and give in-flight tasks up to graceMs to finish.
   * Tasks still running after that are abandoned.
   */
  public async stop(graceMs: number): Promise<ShutdownReport> {
    this.accepting = false;
    if (this.iterator?.return) {
      await this.iterator.return();
    }

    const pending = [...this.inFlight];
    if (pending.length === 0) {
      return { completed: 0, abandoned: 0 };
    }

    logger.info('Waiting for in-flight messages', { count: pending.length, graceMs });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), graceMs);
    });
    const outcome = await Promise.race([
      Promise.allSettled(pending).then(() => 'done' as const),
      timeout,
    ]);
    clearTimeout(timer);

    const abandoned = outcome === 'timeout' ? pending.filter((task) => this.inFlight.has(task)).length : 0;
    if (abandoned > 0) {
      logger.warn('Abandoning in-flight notifications', { abandoned });
    }
    return { completed: pending.length - abandoned, abandoned };
  }

  public status(): MonitorStatus {
    const config = this.deps.store.snapshot();
    return {
      isRunning: this.accepting,
      uptimeMs: this.startedAt === 0 ? 0 : this.now() - this.startedAt,
      inFlight: this.inFlight.size,
      keywords: config.keywords.length,
      target: formatTarget(config.notificationTarget),
      dedupEnabled: config.duplicates.enabled,
      dedupCacheSize: this.deps.dedup.size(),
      counters: { ...this.counters },
    };
  }

  /**
   * Resolves when every task started so far has finished
   */
  public async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private spawn(message: IncomingMessage): void {
    this.counters.received++;

    const task: Promise<void> = this.process(message)
      .catch((error: unknown) => {
        logger.error('Message task failed', { chatId: message.chatId, error: errorMessage(error) });
        this.emit('error', error instanceof Error ? error : new Error(String(error)));
      })
      .finally(() => {
        this.inFlight.delete(task);
      });

    this.inFlight.add(task);
  }

  private async process(message: IncomingMessage): Promise<void> {
    if (message.chatId === this.deps.transport.controlChatId) {
      await this.handleControlMessage(message);
      return;
    }

    const { groupFilter, matcher, dedup, dispatcher } = this.deps;
    const config = this.deps.store.snapshot();

    if (!groupFilter.allow(message, config)) {
      this.suppress('group', message);
      return;
    }

    const keywords = matcher.match(message.text, config);
    if (keywords.length === 0) {
      this.suppress('no-match', message);
      return;
    }

    if (config.duplicates.enabled) {
      const hash = hashMessage(message.text, message.senderId, config.duplicates.includeSender);
      if (dedup.checkAndRecord(hash, config.duplicates)) {
        logger.info('Duplicate message suppressed', {
          chat: message.chatTitle,
          keywords: keywords.join(', '),
        });
        this.suppress('duplicate', message);
        return;
      }
    }

    const result = await dispatcher.send(keywords, message, NotificationDispatcher.planFrom(config));

    if (!result.ok) {
      this.counters.dispatchFailed++;
      logger.error('Notification dispatch failed', {
        reason: result.error.reason,
        error: result.error.message,
        chat: message.chatTitle,
        keywords: keywords.join(', '),
      });
      this.emit('dispatchFailed', result.error, message);
      return;
    }

    this.counters.notified++;
    this.emit('notified', keywords, message);
  }

  /**
   * Control chat: commands only. Other text there is not matched against
   * keywords, so notes to self never trigger alerts.
   */
  private async handleControlMessage(message: IncomingMessage): Promise<void> {
    const reply = await this.deps.commands.handle(message.text);
    if (reply === null) {
      logger.debug('Ignoring non-command text in control chat');
      return;
    }

    this.counters.commands++;

    try {
      await this.deps.transport.sendMessage('self', reply);
    } catch (error) {
      logger.error('Failed to send command reply', { error: errorMessage(error) });
      return;
    }

    this.emit('commandHandled', message.text.trim().split(/\s+/)[0], reply);
  }

  private suppress(reason: SuppressReason, message: IncomingMessage): void {
    switch (reason) {
      case 'group':
        this.counters.suppressedGroup++;
        break;
      case 'no-match':
        this.counters.suppressedNoMatch++;
        break;
      case 'duplicate':
        this.counters.suppressedDuplicate++;
        break;
    }
    this.emit('suppressed', reason, message);
  }
}
