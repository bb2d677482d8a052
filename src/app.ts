/**
 * Application
 *
 * Wires the monitor together:
 * Transport → MonitorService → (GroupFilter → KeywordMatcher → DedupCache → NotificationDispatcher)
 *                            ↘ CommandProcessor → ConfigStore
 */

import { logger } from './logger.js';
import type { EnvConfig } from './config.js';
import { errorMessage } from './errors.js';
import { CommandProcessor } from './commands/index.js';
import { DedupCache } from './dedup/index.js';
import { GroupFilter, KeywordMatcher } from './filter/index.js';
import { MonitorService, type MonitorStatus } from './monitor/index.js';
import { NotificationDispatcher } from './notification/index.js';
import { StatusServer } from './status/index.js';
import { ConfigStore, JsonConfigRepository, formatTarget } from './store/index.js';
import { TelegramTransport } from './transport/index.js';

export class App {
  private readonly config: EnvConfig;
  private readonly store: ConfigStore;
  private readonly transport: TelegramTransport;
  private readonly dedup: DedupCache;
  private readonly dispatcher: NotificationDispatcher;
  private readonly monitor: MonitorService;
  private readonly statusServer: StatusServer;
  private runLoop: Promise<void> | null = null;
  private isRunning = false;

  private constructor(config: EnvConfig, store: ConfigStore) {
    this.config = config;
    this.store = store;
    const startedAt = Date.now();

    // Initialize Transport
    this.transport = new TelegramTransport({
      botToken: config.telegram.botToken,
      ownerChatId: config.telegram.ownerChatId,
      retryAttempts: config.telegram.retryAttempts,
      retryDelayMs: 1000,
    });

    // Initialize pipeline components
    this.dedup = new DedupCache(store, {
      sweepIntervalMs: config.monitor.dedupSweepIntervalMs,
    });
    this.dispatcher = new NotificationDispatcher(this.transport, store);

    const commands = new CommandProcessor({
      store,
      dedup: this.dedup,
      dispatcher: this.dispatcher,
      startedAt,
    });

    this.monitor = new MonitorService({
      store,
      groupFilter: new GroupFilter(store),
      matcher: new KeywordMatcher(store),
      dedup: this.dedup,
      dispatcher: this.dispatcher,
      commands,
      transport: this.transport,
    });

    // Initialize Status Server
    this.statusServer = new StatusServer(config.statusServer, () => this.getStatus());

    this.setupEventHandlers();
  }

  /**
   * Load the config document and build the application.
   *
   * @throws ConfigError if the document is missing or invalid
   */
  public static async create(config: EnvConfig): Promise<App> {
    const store = await ConfigStore.open(new JsonConfigRepository(config.monitor.configPath));
    return new App(config, store);
  }

  private setupEventHandlers(): void {
    this.transport.on('connected', () => {
      logger.info('Telegram transport connected');
    });

    this.transport.on('disconnected', () => {
      logger.warn('Telegram transport disconnected');
    });

    this.store.on('changed', (next, previous) => {
      logger.info('Configuration changed', {
        keywords: next.keywords.length,
        target: formatTarget(next.notificationTarget),
        targetChanged: next.notificationTarget !== previous.notificationTarget,
      });
    });

    this.monitor.on('suppressed', (reason, message) => {
      if (reason !== 'duplicate') {
        logger.debug('Message skipped', { reason, chatId: message.chatId });
      }
    });

    this.monitor.on('commandHandled', (command) => {
      logger.info('Command processed', { command });
    });
  }

  /**
   * Start the application
   */
  public async start(): Promise<void> {
    const snapshot = this.store.snapshot();
    logger.info('Starting keyword monitor', {
      keywords: snapshot.keywords.length,
      target: formatTarget(snapshot.notificationTarget),
      statusServer: this.config.statusServer.enabled,
    });

    await this.transport.start();
    this.dedup.start();
    await this.statusServer.start();

    this.runLoop = this.monitor.run(this.transport.events()).catch((error: unknown) => {
      logger.error('Monitor loop failed', { error: errorMessage(error) });
    });

    this.isRunning = true;
    logger.info('Keyword monitor started successfully');
  }

  /**
   * Stop the application gracefully
   */
  public async stop(reason: string = 'Manual shutdown'): Promise<void> {
    if (!this.isRunning) return;
    this.isRunning = false;

    logger.info('Stopping keyword monitor', { reason });

    const report = await this.monitor.stop(this.config.monitor.shutdownGraceMs);
    await this.transport.stop();
    await this.runLoop;

    this.dedup.stop();
    await this.store.flush();
    await this.statusServer.stop();

    logger.info('Keyword monitor stopped', { ...report });
  }

  public getStatus(): MonitorStatus {
    return this.monitor.status();
  }
}
