/**
 * Telegram Transport
 *
 * Bot API adapter: long-polls for updates, converts them to
 * IncomingMessage events, and sends/forwards on behalf of the monitor.
 * Rate-limited sends (HTTP 429) wait for retry_after and try again;
 * every other failure is mapped to a DispatchError and not retried.
 *
 * The "self" target is the owner's private chat with the bot, which is
 * also the control channel for commands.
 */

import TelegramBot from 'node-telegram-bot-api';
import { EventEmitter } from 'eventemitter3';
import { DispatchError, TransportError, errorMessage } from '../errors.js';
import { logger, maskSecret } from '../logger.js';
import type { ChatRef, IncomingMessage, MediaKind } from '../types.js';
import { EventStream } from './EventStream.js';
import type { Transport, TransportEventTypes } from './types.js';

export interface TelegramTransportConfig {
  botToken: string;
  ownerChatId: number;
  retryAttempts: number;
  retryDelayMs: number;
}

export class TelegramTransport extends EventEmitter<TransportEventTypes> implements Transport {
  public readonly controlChatId: number;
  private readonly bot: TelegramBot;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly stream = new EventStream<IncomingMessage>();
  private isPolling = false;

  constructor(config: TelegramTransportConfig) {
    super();
    this.bot = new TelegramBot(config.botToken, { polling: false });
    this.controlChatId = config.ownerChatId;
    this.retryAttempts = config.retryAttempts;
    this.retryDelayMs = config.retryDelayMs;

    logger.info('Telegram transport initialized', {
      ownerChatId: maskSecret(String(config.ownerChatId)),
    });
  }

  public events(): AsyncIterable<IncomingMessage> {
    return this.stream;
  }

  /**
   * Verify the token and start long polling
   *
   * @throws TransportError if the bot cannot authenticate
   */
  public async start(): Promise<void> {
    try {
      const me = await this.bot.getMe();
      logger.info('Telegram bot verified', { username: me.username });
    } catch (error) {
      throw new TransportError(`Failed to verify Telegram bot: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    this.attachEventHandlers();
    await this.bot.startPolling();
    this.isPolling = true;
    this.emit('connected');
  }

  public async stop(): Promise<void> {
    this.stream.close();

    if (this.isPolling) {
      this.isPolling = false;
      await this.bot.stopPolling();
      this.emit('disconnected');
    }
    this.bot.removeAllListeners();
  }

  public async sendMessage(target: ChatRef, text: string): Promise<void> {
    const chatId = this.toChatId(target);
    await this.withRateLimitRetry('sendMessage', () =>
      this.bot.sendMessage(chatId, text, { disable_web_page_preview: true })
    );
  }

  public async forwardMessage(target: ChatRef, fromChatId: number, messageId: number): Promise<void> {
    const chatId = this.toChatId(target);
    await this.withRateLimitRetry('forwardMessage', () =>
      this.bot.forwardMessage(chatId, fromChatId, messageId)
    );
  }

  public async resolveTarget(handle: string): Promise<ChatRef> {
    try {
      const chat = await this.bot.getChat(`@${handle}`);
      return chat.id;
    } catch (error) {
      throw new DispatchError('unresolved', `Cannot resolve @${handle}: ${describeTelegramError(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * Bot accounts are added to chats by an admin; they cannot redeem invite links.
   */
  public async joinChannel(inviteLink: string): Promise<ChatRef> {
    throw new DispatchError(
      'join',
      `Cannot join ${inviteLink}: bot accounts cannot use invite links. ` +
        'Add the bot to the channel and set its numeric id as target.'
    );
  }

  private attachEventHandlers(): void {
    const onMessage = (msg: TelegramBot.Message): void => {
      const message = toIncomingMessage(msg);
      if (message) {
        this.stream.push(message);
      }
    };

    this.bot.on('message', onMessage);
    this.bot.on('channel_post', onMessage);

    this.bot.on('polling_error', (error: Error) => {
      const transportError = new TransportError(`Polling failed: ${error.message}`, { cause: error });
      logger.error('Transport error', { error: transportError.message });
      this.emit('error', transportError);
    });
  }

  private toChatId(target: ChatRef): number {
    return target === 'self' ? this.controlChatId : target;
  }

  /**
   * Retry only on HTTP 429; map everything else to DispatchError
   */
  private async withRateLimitRetry<T>(operation: string, send: () => Promise<T>): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        return await send();
      } catch (error) {
        lastError = error;

        if (telegramStatusCode(error) !== 429 || attempt === this.retryAttempts) {
          break;
        }

        const waitTime = extractRetryAfter(error) ?? this.retryDelayMs * attempt;
        logger.warn('Telegram rate limit hit, waiting...', { operation, attempt, waitTime });
        await sleep(waitTime);
      }
    }

    throw toDispatchError(operation, lastError);
  }
}

/**
 * Convert a Bot API message. Returns null for updates without text
 * (service messages, bare media without caption).
 */
export function toIncomingMessage(msg: TelegramBot.Message): IncomingMessage | null {
  const text = msg.text ?? msg.caption;
  if (!text) {
    return null;
  }

  const chatTitle =
    msg.chat.title ??
    ([msg.chat.first_name, msg.chat.last_name].filter(Boolean).join(' ') || 'Unknown Chat');

  let senderName = chatTitle;
  if (msg.from) {
    senderName = [msg.from.first_name, msg.from.last_name].filter(Boolean).join(' ');
    if (msg.from.username) {
      senderName += ` (@${msg.from.username})`;
    }
  }

  const media = detectMedia(msg);

  return {
    chatId: msg.chat.id,
    chatTitle,
    senderId: msg.from?.id ?? null,
    senderName,
    text,
    timestamp: msg.date * 1000,
    messageId: msg.message_id,
    ...(media ? { media: { kind: media } } : {}),
  };
}

function detectMedia(msg: TelegramBot.Message): MediaKind | null {
  if (msg.photo) return 'photo';
  if (msg.video) return 'video';
  if (msg.document) return 'document';
  if (msg.sticker) return 'sticker';
  if (msg.voice) return 'voice';
  if (msg.video_note) return 'video_note';
  if (msg.audio) return 'audio';
  return null;
}

function toDispatchError(operation: string, error: unknown): DispatchError {
  if (error instanceof DispatchError) {
    return error;
  }

  const status = telegramStatusCode(error);
  const description = describeTelegramError(error);

  if (status === 403) {
    return new DispatchError('permission', `${operation} denied: ${description}`, { cause: error });
  }
  if (status === 400 && /chat not found/i.test(description)) {
    return new DispatchError('unresolved', `${operation} failed: ${description}`, { cause: error });
  }
  return new DispatchError('send', `${operation} failed: ${description}`, { cause: error });
}

function readPath(value: unknown, keys: string[]): unknown {
  let current: unknown = value;
  for (const key of keys) {
    if (typeof current !== 'object' || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current;
}

export function telegramStatusCode(error: unknown): number | null {
  const status = readPath(error, ['response', 'statusCode']);
  return typeof status === 'number' ? status : null;
}

function describeTelegramError(error: unknown): string {
  const description = readPath(error, ['response', 'body', 'description']);
  return typeof description === 'string' ? description : errorMessage(error);
}

/**
 * retry_after from a 429 response, in milliseconds
 */
function extractRetryAfter(error: unknown): number | null {
  const retryAfter = readPath(error, ['response', 'body', 'parameters', 'retry_after']);
  return typeof retryAfter === 'number' && retryAfter > 0 ? retryAfter * 1000 : null;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
