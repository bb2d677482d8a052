import type { Config, ConfigDraft } from './types.js';

/**
 * Freeze a draft in place and return it as a published Config
 */
export function freezeConfig(draft: ConfigDraft): Config {
  Object.freeze(draft.keywords);
  Object.freeze(draft.groups.whitelist);
  Object.freeze(draft.groups.blacklist);
  Object.freeze(draft.groups);
  Object.freeze(draft.settings);
  Object.freeze(draft.duplicates);
  Object.freeze(draft.notificationTarget);
  return Object.freeze(draft);
}

/**
 * Deep copy a published Config into a mutable draft
 */
export function toDraft(config: Config): ConfigDraft {
  return {
    keywords: [...config.keywords],
    groups: {
      whitelist: [...config.groups.whitelist],
      blacklist: [...config.groups.blacklist],
    },
    settings: { ...config.settings },
    duplicates: { ...config.duplicates },
    notificationTarget: { ...config.notificationTarget },
  };
}
