/**
 * Keyword Patterns
 *
 * A keyword is either a literal substring or a regular expression.
 * It is treated as a regular expression when it starts with an inline
 * case directive or contains a group or character class.
 *
 *   (?i)machine learning   regex, always case-insensitive
 *   (?-i)NASA              regex, always case-sensitive
 *   java(script)?          regex, follows the global case setting
 *   python                 literal, follows the global case setting
 */

import { PatternError, errorMessage } from '../errors.js';

const CASE_DIRECTIVE = /^\(\?(-?)i\)/;

export type KeywordKind = 'literal' | 'regex';

export interface CompiledKeyword {
  label: string;
  kind: KeywordKind;
  regex: RegExp;
}

export function isRegexKeyword(pattern: string): boolean {
  return CASE_DIRECTIVE.test(pattern) || pattern.includes('(') || pattern.includes('[');
}

/**
 * Compile a keyword into a matcher.
 * A case directive in the pattern wins over the global setting.
 *
 * @throws PatternError if the pattern is empty or not a valid expression
 */
export function compileKeyword(pattern: string, caseSensitive: boolean): CompiledKeyword {
  if (pattern.trim().length === 0) {
    throw new PatternError(pattern, 'Keyword must not be empty');
  }

  if (!isRegexKeyword(pattern)) {
    return {
      label: pattern,
      kind: 'literal',
      regex: new RegExp(escapeRegExp(pattern), caseSensitive ? '' : 'i'),
    };
  }

  let source = pattern;
  let ignoreCase = !caseSensitive;

  const directive = CASE_DIRECTIVE.exec(pattern);
  if (directive) {
    ignoreCase = directive[1] !== '-';
    source = pattern.slice(directive[0].length);
    if (source.length === 0) {
      throw new PatternError(pattern, `Pattern "${pattern}" has a case directive but no expression`);
    }
  }

  try {
    return {
      label: pattern,
      kind: 'regex',
      regex: new RegExp(source, ignoreCase ? 'i' : ''),
    };
  } catch (error) {
    throw new PatternError(pattern, `Invalid regular expression "${pattern}": ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
