/**
 * Dedup Cache
 *
 * Time-windowed set of message digests. An entry older than the
 * configured expiry is treated as absent: it is discarded on lookup and
 * removed by the periodic sweep.
 *
 * Lookup and insert happen in one synchronous call, so two tasks racing
 * on the same digest cannot both see "not present".
 */

import { logger } from '../logger.js';
import type { ConfigReader, DuplicateSettings } from '../store/types.js';

const HOUR_MS = 60 * 60 * 1000;

export interface DedupCacheOptions {
  /** Period of the background sweep */
  sweepIntervalMs: number;

  /** Size above which a sweep runs before recording a new entry */
  maxEntriesBeforeSweep?: number;

  /** Clock, injectable for tests */
  now?: () => number;
}

export interface DedupStats {
  enabled: boolean;
  size: number;
  expiryHours: number;
  includeSender: boolean;
  oldestEntryAgeMs: number | null;
}

export class DedupCache {
  private readonly store: ConfigReader;
  private readonly entries = new Map<string, number>();
  private readonly sweepIntervalMs: number;
  private readonly maxEntriesBeforeSweep: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(store: ConfigReader, options: DedupCacheOptions) {
    this.store = store;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.maxEntriesBeforeSweep = options.maxEntriesBeforeSweep ?? 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns true when the digest was already seen inside the expiry window.
   * Otherwise records it and returns false. Disabled: always false, no state.
   */
  public checkAndRecord(
    hash: string,
    settings: DuplicateSettings = this.settings()
  ): boolean {
    if (!settings.enabled) {
      return false;
    }

    const now = this.now();
    const expiryMs = settings.expiryHours * HOUR_MS;

    const createdAt = this.entries.get(hash);
    if (createdAt !== undefined) {
      if (now - createdAt < expiryMs) {
        return true;
      }
      this.entries.delete(hash);
    }

    if (this.entries.size >= this.maxEntriesBeforeSweep) {
      this.sweep(settings);
    }

    this.entries.set(hash, now);
    return false;
  }

  /**
   * Remove expired entries. Returns the number removed.
   */
  public sweep(settings: DuplicateSettings = this.settings()): number {
    const cutoff = this.now() - settings.expiryHours * HOUR_MS;
    let removed = 0;

    for (const [hash, createdAt] of this.entries) {
      if (createdAt <= cutoff) {
        this.entries.delete(hash);
        removed++;
      }
    }

    if (removed > 0) {
      logger.info('Cleaned up expired message hashes', { removed, remaining: this.entries.size });
    }
    return removed;
  }

  public clear(): number {
    const count = this.entries.size;
    this.entries.clear();
    return count;
  }

  public size(): number {
    return this.entries.size;
  }

  public stats(): DedupStats {
    const settings = this.settings();
    let oldest: number | null = null;
    for (const createdAt of this.entries.values()) {
      if (oldest === null || createdAt < oldest) {
        oldest = createdAt;
      }
    }

    return {
      enabled: settings.enabled,
      size: this.entries.size,
      expiryHours: settings.expiryHours,
      includeSender: settings.includeSender,
      oldestEntryAgeMs: oldest === null ? null : this.now() - oldest,
    };
  }

  /**
   * Start the periodic sweep. The timer does not keep the process alive.
   */
  public start(): void {
    if (this.sweepTimer) return;

    this.sweepTimer = setInterval(() => {
      this.sweep();
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  public stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  private settings(): DuplicateSettings {
    return this.store.snapshot().duplicates;
  }
}
