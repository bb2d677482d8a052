export { GroupFilter, entryMatches } from './GroupFilter.js';
export { KeywordMatcher } from './KeywordMatcher.js';
export { compileKeyword, isRegexKeyword } from './patterns.js';
export type { CompiledKeyword, KeywordKind } from './patterns.js';
