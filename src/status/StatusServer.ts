/**
 * Status Server
 *
 * Read-only HTTP endpoint for health checks and pipeline counters.
 */

import Fastify, { type FastifyInstance, type LightMyRequestResponse } from 'fastify';
import { logger } from '../logger.js';
import type { MonitorStatus } from '../monitor/types.js';

export interface StatusServerConfig {
  enabled: boolean;
  port: number;
  host: string;
}

export class StatusServer {
  private readonly server: FastifyInstance;
  private readonly config: StatusServerConfig;
  private readonly getStatus: () => MonitorStatus;
  private readonly startTime: number = Date.now();
  private isListening = false;

  private get uptime(): number {
    return Date.now() - this.startTime;
  }

  constructor(config: StatusServerConfig, getStatus: () => MonitorStatus) {
    this.config = config;
    this.getStatus = getStatus;
    this.server = Fastify({ logger: false });
    this.registerRoutes();
  }

  async start(): Promise<void> {
    if (!this.config.enabled) {
      logger.info('Status server is disabled');
      return;
    }

    try {
      await this.server.listen({
        port: this.config.port,
        host: this.config.host,
      });
      this.isListening = true;
      logger.info('Status server started', {
        url: `http://${this.config.host}:${this.config.port}`,
      });
    } catch (error) {
      logger.error('Failed to start status server', {
        error: error instanceof Error ? error.message : String(error),
      });
      throw error;
    }
  }

  async stop(): Promise<void> {
    await this.server.close();
    if (this.isListening) {
      this.isListening = false;
      logger.info('Status server stopped');
    }
  }

  /**
   * In-process request, no socket involved
   */
  inject(url: string): Promise<LightMyRequestResponse> {
    return this.server.inject({ method: 'GET', url });
  }

  private registerRoutes(): void {
    // Health check
    this.server.get('/api/health', async () => {
      return { status: 'ok', uptime: this.uptime };
    });

    // Pipeline status
    this.server.get('/api/status', async () => {
      return this.getStatus();
    });
  }
}
