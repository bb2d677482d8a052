/**
 * Types for ConfigStore
 */

import type { NotificationTarget } from '../types.js';

export interface MonitorSettings {
  caseSensitive: boolean;
  sendFullMessage: boolean;
  maxMessageLength: number;
  forwardMedia: boolean;
}

export interface DuplicateSettings {
  enabled: boolean;
  expiryHours: number;
  includeSender: boolean;
}

/**
 * Mutable copy handed to a ConfigStore transaction
 */
export interface ConfigDraft {
  keywords: string[];
  groups: {
    whitelist: string[];
    blacklist: string[];
  };
  settings: MonitorSettings;
  duplicates: DuplicateSettings;
  notificationTarget: NotificationTarget;
}

type DeepReadonly<T> = T extends (infer U)[]
  ? readonly DeepReadonly<U>[]
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

/**
 * Published configuration. Values are frozen and never change in place.
 */
export type Config = DeepReadonly<ConfigDraft>;

export type GroupListName = 'whitelist' | 'blacklist';

/**
 * Read side of the store, enough for the pipeline components
 */
export interface ConfigReader {
  snapshot(): Config;
}

/**
 * Loads and persists the config document
 */
export interface ConfigRepository {
  load(): Promise<Config>;
  save(config: Config): Promise<void>;
}
