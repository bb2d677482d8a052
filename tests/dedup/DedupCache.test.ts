/**
 * Tests for DedupCache
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { DedupCache } from '../../src/dedup/DedupCache.js';
import { ConfigStore } from '../../src/store/ConfigStore.js';
import { makeConfig } from '../helpers.js';

const HOUR = 60 * 60 * 1000;

describe('DedupCache', () => {
  let now: number;
  let store: ConfigStore;
  let cache: DedupCache;

  beforeEach(() => {
    now = 1_700_000_000_000;
    store = new ConfigStore(makeConfig());
    cache = new DedupCache(store, { sweepIntervalMs: 1000, now: () => now });
  });

  it('should report a digest as new once, then as duplicate', () => {
    expect(cache.checkAndRecord('abc')).toBe(false);
    expect(cache.checkAndRecord('abc')).toBe(true);
    expect(cache.size()).toBe(1);
  });

  it('should still report a duplicate just inside the window', () => {
    cache.checkAndRecord('abc');
    now += 24 * HOUR - 1;

    expect(cache.checkAndRecord('abc')).toBe(true);
  });

  it('should treat an expired entry as new and restart its window', () => {
    cache.checkAndRecord('abc');
    now += 25 * HOUR;

    expect(cache.checkAndRecord('abc')).toBe(false);
    expect(cache.checkAndRecord('abc')).toBe(true);
    expect(cache.stats().oldestEntryAgeMs).toBe(0);
  });

  it('should never report duplicates or record when disabled', () => {
    store.mutate((draft) => {
      draft.duplicates.enabled = false;
    });

    expect(cache.checkAndRecord('abc')).toBe(false);
    expect(cache.checkAndRecord('abc')).toBe(false);
    expect(cache.size()).toBe(0);
  });

  it('should apply a changed expiry to existing entries', () => {
    cache.checkAndRecord('abc');
    now += 2 * HOUR;

    store.mutate((draft) => {
      draft.duplicates.expiryHours = 1;
    });

    expect(cache.checkAndRecord('abc')).toBe(false);
  });

  it('should sweep only expired entries', () => {
    cache.checkAndRecord('old');
    now += 12 * HOUR;
    cache.checkAndRecord('recent');
    now += 12 * HOUR;

    expect(cache.sweep()).toBe(1);
    expect(cache.size()).toBe(1);
    expect(cache.checkAndRecord('recent')).toBe(true);
  });

  it('should sweep before recording once the size limit is reached', () => {
    const small = new DedupCache(store, {
      sweepIntervalMs: 1000,
      maxEntriesBeforeSweep: 2,
      now: () => now,
    });
    small.checkAndRecord('a');
    small.checkAndRecord('b');
    now += 25 * HOUR;

    small.checkAndRecord('c');

    expect(small.size()).toBe(1);
  });

  it('should clear all entries and return the count', () => {
    cache.checkAndRecord('a');
    cache.checkAndRecord('b');

    expect(cache.clear()).toBe(2);
    expect(cache.size()).toBe(0);
  });

  it('should report stats from the current settings', () => {
    cache.checkAndRecord('a');
    now += 5000;
    cache.checkAndRecord('b');

    expect(cache.stats()).toEqual({
      enabled: true,
      size: 2,
      expiryHours: 24,
      includeSender: true,
      oldestEntryAgeMs: 5000,
    });
  });

  it('should report no oldest entry when empty', () => {
    expect(cache.stats().oldestEntryAgeMs).toBeNull();
  });

  describe('periodic sweep', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should sweep on every interval until stopped', () => {
      const sweep = vi.spyOn(cache, 'sweep');

      cache.start();
      vi.advanceTimersByTime(1000);
      expect(sweep).toHaveBeenCalledTimes(1);

      vi.advanceTimersByTime(2000);
      expect(sweep).toHaveBeenCalledTimes(3);

      cache.stop();
      vi.advanceTimersByTime(5000);
      expect(sweep).toHaveBeenCalledTimes(3);
    });
  });
});
