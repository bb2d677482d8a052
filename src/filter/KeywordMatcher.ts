/**
 * Keyword Matcher
 *
 * Tests message text against the current keyword list and returns
 * every matching label in keyword order.
 *
 * Compiled matchers are cached by pattern text. The cache belongs to one
 * (keyword list, case setting) pair and is rebuilt as soon as either
 * changes; published keyword lists are frozen, so an identity check is
 * enough to detect a change.
 */

import { logger } from '../logger.js';
import type { Config, ConfigReader } from '../store/types.js';
import { compileKeyword, type CompiledKeyword } from './patterns.js';

export class KeywordMatcher {
  private readonly store: ConfigReader;
  private cache = new Map<string, CompiledKeyword>();
  private compiled: CompiledKeyword[] = [];
  private cachedKeywords: readonly string[] | null = null;
  private cachedCaseSensitive = false;

  constructor(store: ConfigReader) {
    this.store = store;
  }

  public match(text: string, config: Config = this.store.snapshot()): string[] {
    if (!text) {
      return [];
    }

    return this.matchersFor(config)
      .filter((keyword) => keyword.regex.test(text))
      .map((keyword) => keyword.label);
  }

  /**
   * Number of compiled matchers currently cached
   */
  public cacheSize(): number {
    return this.cache.size;
  }

  private matchersFor(config: Config): CompiledKeyword[] {
    const { keywords } = config;
    const { caseSensitive } = config.settings;

    if (keywords === this.cachedKeywords && caseSensitive === this.cachedCaseSensitive) {
      return this.compiled;
    }

    const previous = caseSensitive === this.cachedCaseSensitive ? this.cache : new Map<string, CompiledKeyword>();
    const cache = new Map<string, CompiledKeyword>();

    for (const pattern of keywords) {
      // Config validation guarantees every stored keyword compiles
      cache.set(pattern, previous.get(pattern) ?? compileKeyword(pattern, caseSensitive));
    }

    this.cache = cache;
    this.compiled = keywords.flatMap((pattern) => cache.get(pattern) ?? []);
    this.cachedKeywords = keywords;
    this.cachedCaseSensitive = caseSensitive;

    logger.debug('Keyword matchers rebuilt', { keywords: keywords.length, caseSensitive });
    return this.compiled;
  }
}
