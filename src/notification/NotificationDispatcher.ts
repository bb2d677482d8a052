/**
 * Notification Dispatcher
 *
 * Formats a keyword match and delivers it to the configured target.
 * Handles and invite links are resolved through the transport once and
 * cached under the target's string form, so changing the target starts
 * from a clean resolution. Concurrent first sends to the same invite
 * link share a single join.
 *
 * Failures come back as a DispatchResult; the dispatcher never retries.
 * The pipeline logs and drops them, the /target commands relay them.
 */

import { EventEmitter } from 'eventemitter3';
import { DispatchError, errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { describeTarget, formatTarget } from '../store/target.js';
import type { Config, ConfigReader } from '../store/types.js';
import type { Transport } from '../transport/types.js';
import type { ChatRef, IncomingMessage, NotificationTarget } from '../types.js';
import { formatNotification } from './formatter.js';
import type { DispatchPlan, DispatchResult } from './types.js';

type DispatchTransport = Pick<
  Transport,
  'sendMessage' | 'forwardMessage' | 'resolveTarget' | 'joinChannel'
>;

interface DispatcherEventTypes {
  sent: [keywords: readonly string[], message: IncomingMessage, target: ChatRef];
  failed: [error: DispatchError, target: NotificationTarget];
  resolved: [target: NotificationTarget, ref: ChatRef];
}

export const CHECK_MESSAGE = 'Notification target check: this chat can receive keyword alerts.';

export class NotificationDispatcher extends EventEmitter<DispatcherEventTypes> {
  private readonly transport: DispatchTransport;
  private readonly store: ConfigReader;
  private readonly now: () => number;
  private readonly resolvedTargets = new Map<string, ChatRef>();
  private readonly pendingResolutions = new Map<string, Promise<ChatRef>>();

  constructor(transport: DispatchTransport, store: ConfigReader, now: () => number = Date.now) {
    super();
    this.transport = transport;
    this.store = store;
    this.now = now;
  }

  /**
   * Copy what a dispatch needs out of a config snapshot
   */
  public static planFrom(config: Config): DispatchPlan {
    return {
      target: { ...config.notificationTarget },
      payload: {
        sendFullMessage: config.settings.sendFullMessage,
        maxMessageLength: config.settings.maxMessageLength,
      },
      forwardMedia: config.settings.forwardMedia,
    };
  }

  /**
   * Send a match notification. Media is forwarded ahead of the text.
   */
  public async send(
    keywords: readonly string[],
    message: IncomingMessage,
    plan: DispatchPlan = NotificationDispatcher.planFrom(this.store.snapshot())
  ): Promise<DispatchResult> {
    const text = formatNotification(keywords, message, plan.payload);

    try {
      const ref = await this.resolve(plan.target);

      if (message.media && plan.forwardMedia) {
        await this.transport.forwardMessage(ref, message.chatId, message.messageId);
      }
      await this.transport.sendMessage(ref, text);

      logger.info('Notification sent', {
        keywords: keywords.join(', '),
        chat: message.chatTitle,
        media: message.media?.kind,
      });
      this.emit('sent', keywords, message, ref);
      return { ok: true, target: ref };
    } catch (error) {
      return this.fail(plan.target, error);
    }
  }

  /**
   * Send a synthetic notification to the current target
   */
  public async sendTest(): Promise<DispatchResult> {
    const message: IncomingMessage = {
      chatId: 0,
      chatTitle: 'Keyword Monitor',
      senderId: null,
      senderName: 'Keyword Monitor',
      text: 'This is a test notification.',
      timestamp: this.now(),
      messageId: 0,
    };

    return this.send(['test'], message);
  }

  /**
   * Resolve a target and send a short probe to it. Nothing is persisted.
   */
  public async check(target: NotificationTarget): Promise<DispatchResult> {
    try {
      const ref = await this.resolve(target);
      await this.transport.sendMessage(ref, CHECK_MESSAGE);
      logger.info('Notification target check passed', { target: formatTarget(target) });
      return { ok: true, target: ref };
    } catch (error) {
      return this.fail(target, error);
    }
  }

  /**
   * Resolve a target to something the transport can send to
   */
  public async resolve(target: NotificationTarget): Promise<ChatRef> {
    switch (target.kind) {
      case 'self':
        return 'self';
      case 'chatId':
        return target.chatId;
      case 'handle':
      case 'invite':
        return this.resolveRemote(target);
    }
  }

  private async resolveRemote(
    target: Extract<NotificationTarget, { kind: 'handle' | 'invite' }>
  ): Promise<ChatRef> {
    const key = formatTarget(target);

    const cached = this.resolvedTargets.get(key);
    if (cached !== undefined) {
      return cached;
    }

    let pending = this.pendingResolutions.get(key);
    if (!pending) {
      pending = this.lookup(target).finally(() => {
        this.pendingResolutions.delete(key);
      });
      this.pendingResolutions.set(key, pending);
    }

    const ref = await pending;
    this.resolvedTargets.set(key, ref);
    return ref;
  }

  private async lookup(
    target: Extract<NotificationTarget, { kind: 'handle' | 'invite' }>
  ): Promise<ChatRef> {
    try {
      if (target.kind === 'handle') {
        const ref = await this.transport.resolveTarget(target.handle);
        logger.info('Notification target resolved', { handle: target.handle });
        this.emit('resolved', target, ref);
        return ref;
      }

      const ref = await this.transport.joinChannel(target.link);
      logger.info('Joined notification channel', { link: target.link });
      this.emit('resolved', target, ref);
      return ref;
    } catch (error) {
      if (error instanceof DispatchError) throw error;
      const reason = target.kind === 'handle' ? 'unresolved' : 'join';
      throw new DispatchError(reason, `Cannot reach ${describeTarget(target)}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private fail(target: NotificationTarget, error: unknown): DispatchResult {
    const dispatchError =
      error instanceof DispatchError
        ? error
        : new DispatchError('send', errorMessage(error), { cause: error });

    // A chat that refused us may have been renamed or left; resolve again next time
    this.resolvedTargets.delete(formatTarget(target));

    this.emit('failed', dispatchError, target);
    return { ok: false, error: dispatchError };
  }
}
