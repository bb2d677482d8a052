export { DedupCache } from './DedupCache.js';
export type { DedupCacheOptions, DedupStats } from './DedupCache.js';
export { hashMessage } from './hash.js';
