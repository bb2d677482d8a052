/**
 * Config Store
 *
 * Single source of truth for keywords, group rules, dedup settings and
 * the notification target. Readers get the current frozen snapshot;
 * writers run a synchronous transaction against a draft copy, and the
 * validated result replaces the snapshot in one assignment. Readers
 * therefore see either the old or the new value, never a mix.
 *
 * Every committed change is written back through the repository.
 * Writes are chained so they land in commit order; a failed write is
 * logged and the in-memory value stays authoritative.
 */

import { EventEmitter } from 'eventemitter3';
import { errorMessage } from '../errors.js';
import { logger } from '../logger.js';
import { parseConfigDocument, serializeConfig } from './schema.js';
import { freezeConfig, toDraft } from './snapshot.js';
import type { Config, ConfigDraft, ConfigReader, ConfigRepository } from './types.js';

interface ConfigStoreEventTypes {
  changed: [next: Config, previous: Config];
  persisted: [config: Config];
  persistFailed: [error: Error];
}

export class ConfigStore extends EventEmitter<ConfigStoreEventTypes> implements ConfigReader {
  private current: Config;
  private readonly repository: ConfigRepository | null;
  private persistChain: Promise<void> = Promise.resolve();

  constructor(initial: Config, repository: ConfigRepository | null = null) {
    super();
    this.current = freezeConfig(toDraft(initial));
    this.repository = repository;
  }

  /**
   * Load the document through the repository and build a store around it
   */
  public static async open(repository: ConfigRepository): Promise<ConfigStore> {
    const initial = await repository.load();
    logger.info('Config loaded', {
      keywords: initial.keywords.length,
      whitelist: initial.groups.whitelist.length,
      blacklist: initial.groups.blacklist.length,
      dedup: initial.duplicates.enabled,
    });
    return new ConfigStore(initial, repository);
  }

  /**
   * Current configuration. The returned value is frozen.
   */
  public snapshot(): Config {
    return this.current;
  }

  /**
   * Apply a transaction. The recipe edits a private draft; if it throws,
   * or the draft fails validation, nothing is published. A recipe that
   * leaves the draft unchanged publishes nothing and writes nothing.
   *
   * The recipe must be synchronous: the commit happens when it returns.
   */
  public mutate<R>(recipe: (draft: ConfigDraft) => R): R {
    const previous = this.current;
    const draft = toDraft(previous);
    const result = recipe(draft);

    const document = serializeConfig(draft);
    if (JSON.stringify(document) === JSON.stringify(serializeConfig(previous))) {
      return result;
    }

    const next = freezeConfig(parseConfigDocument(document));
    this.current = next;

    logger.debug('Config updated', {
      keywords: next.keywords.length,
      target: document.notification_target,
    });
    this.emit('changed', next, previous);
    this.schedulePersist(next);

    return result;
  }

  /**
   * Resolves once every scheduled write has settled
   */
  public flush(): Promise<void> {
    return this.persistChain;
  }

  private schedulePersist(config: Config): void {
    const repository = this.repository;
    if (!repository) return;

    this.persistChain = this.persistChain
      .then(() => repository.save(config))
      .then(() => {
        this.emit('persisted', config);
      })
      .catch((error: unknown) => {
        logger.warn('Failed to persist config', { error: errorMessage(error) });
        this.emit('persistFailed', error instanceof Error ? error : new Error(String(error)));
      });
  }
}
