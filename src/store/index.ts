export { ConfigStore } from './ConfigStore.js';
export { JsonConfigRepository } from './JsonConfigRepository.js';
export { parseConfigDocument, serializeConfig, MAX_EXPIRY_HOURS } from './schema.js';
export type { ConfigDocument } from './schema.js';
export { parseTarget, formatTarget, describeTarget } from './target.js';
export { freezeConfig, toDraft } from './snapshot.js';
export type {
  Config,
  ConfigDraft,
  ConfigReader,
  ConfigRepository,
  MonitorSettings,
  DuplicateSettings,
  GroupListName,
} from './types.js';
