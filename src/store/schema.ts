/**
 * Config document schema
 *
 * The on-disk document uses snake_case keys. Only `keywords` is required;
 * everything else falls back to defaults. `duplicate_detection` is accepted
 * as an older name for `duplicates`.
 */

import { z } from 'zod';
import { ConfigError, PatternError } from '../errors.js';
import { compileKeyword } from '../filter/patterns.js';
import { formatTarget, parseTarget } from './target.js';
import type { Config, ConfigDraft } from './types.js';

/** Upper bound accepted by /duplicates hours */
export const MAX_EXPIRY_HOURS = 168;

const groupEntry = z.union([z.string().min(1), z.number().int()]).transform(String);

const duplicatesSchema = z.object({
  enabled: z.boolean().default(true),
  expiry_hours: z.number().int().min(1).default(24),
  include_sender: z.boolean().default(true),
});

const documentSchema = z.object({
  keywords: z.array(z.string().min(1)),
  settings: z
    .object({
      case_sensitive: z.boolean().default(false),
      send_full_message: z.boolean().default(true),
      max_message_length: z.number().int().positive().default(500),
      forward_media: z.boolean().default(true),
    })
    .default({}),
  groups: z
    .object({
      whitelist: z.array(groupEntry).default([]),
      blacklist: z.array(groupEntry).default([]),
    })
    .default({}),
  duplicates: duplicatesSchema.optional(),
  duplicate_detection: duplicatesSchema.optional(),
  notification_target: z.string().default('me'),
});

const DOCUMENT_KEYS: ReadonlySet<string> = new Set(documentSchema.keyof().options);

/**
 * Top-level sections this service does not own, kept so a save writes them back
 */
export function extraSections(raw: unknown): Record<string, unknown> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }
  return Object.fromEntries(Object.entries(raw).filter(([key]) => !DOCUMENT_KEYS.has(key)));
}

/**
 * Shape written back to disk
 */
export interface ConfigDocument {
  keywords: string[];
  settings: {
    case_sensitive: boolean;
    send_full_message: boolean;
    max_message_length: number;
    forward_media: boolean;
  };
  groups: {
    whitelist: string[];
    blacklist: string[];
  };
  duplicates: {
    enabled: boolean;
    expiry_hours: number;
    include_sender: boolean;
  };
  notification_target: string;
}

/**
 * Validate a parsed JSON value and convert it to a Config draft.
 *
 * @throws ConfigError describing the first problem found
 */
export function parseConfigDocument(raw: unknown): ConfigDraft {
  const result = documentSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid config document: ${issues}`);
  }

  const doc = result.data;
  const notificationTarget = parseTarget(doc.notification_target);
  if (!notificationTarget) {
    throw new ConfigError(`Invalid notification_target: "${doc.notification_target}"`);
  }

  const duplicates = doc.duplicates ?? doc.duplicate_detection ?? duplicatesSchema.parse({});

  const draft: ConfigDraft = {
    keywords: doc.keywords,
    groups: {
      whitelist: doc.groups.whitelist,
      blacklist: doc.groups.blacklist,
    },
    settings: {
      caseSensitive: doc.settings.case_sensitive,
      sendFullMessage: doc.settings.send_full_message,
      maxMessageLength: doc.settings.max_message_length,
      forwardMedia: doc.settings.forward_media,
    },
    duplicates: {
      enabled: duplicates.enabled,
      expiryHours: duplicates.expiry_hours,
      includeSender: duplicates.include_sender,
    },
    notificationTarget,
  };

  validateKeywords(draft.keywords, draft.settings.caseSensitive);
  return draft;
}

export function serializeConfig(config: Config): ConfigDocument {
  return {
    keywords: [...config.keywords],
    settings: {
      case_sensitive: config.settings.caseSensitive,
      send_full_message: config.settings.sendFullMessage,
      max_message_length: config.settings.maxMessageLength,
      forward_media: config.settings.forwardMedia,
    },
    groups: {
      whitelist: [...config.groups.whitelist],
      blacklist: [...config.groups.blacklist],
    },
    duplicates: {
      enabled: config.duplicates.enabled,
      expiry_hours: config.duplicates.expiryHours,
      include_sender: config.duplicates.includeSender,
    },
    notification_target: formatTarget(config.notificationTarget),
  };
}

/**
 * Keywords must compile and be unique ignoring case
 */
function validateKeywords(keywords: readonly string[], caseSensitive: boolean): void {
  const seen = new Set<string>();
  for (const keyword of keywords) {
    const key = keyword.toLowerCase();
    if (seen.has(key)) {
      throw new ConfigError(`Duplicate keyword in config: "${keyword}"`);
    }
    seen.add(key);

    try {
      compileKeyword(keyword, caseSensitive);
    } catch (error) {
      if (error instanceof PatternError) {
        throw new ConfigError(error.message, { cause: error });
      }
      throw error;
    }
  }
}
