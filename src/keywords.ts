/**
 * Keyword Table
 *
 * Keywords are lexed as identifiers. The parser classifies an identifier
 * token once through this table instead of comparing raw strings at each
 * call site.
 */

import type { Token } from './token-types.js';
import { TOKEN_TYPES } from './token-types.js';

export const KEYWORDS = {
  // Declarations
  LET: 'let',
  VAR: 'var',
  FUN: 'fun',
  IMPORT: 'import',
  FROM: 'from',
  EVENT: 'event',

  // Access modifiers
  PRIV: 'priv',
  PUB: 'pub',
  ACCESS: 'access',
  ALL: 'all',
  ACCOUNT: 'account',
  CONTRACT: 'contract',
  SELF: 'self',
  SET: 'set',

  // Statements and expressions
  RETURN: 'return',
  CREATE: 'create',
  DESTROY: 'destroy',
  TRUE: 'true',
  FALSE: 'false',
  NIL: 'nil',
} as const;

export type Keyword = (typeof KEYWORDS)[keyof typeof KEYWORDS];

const KEYWORD_TABLE: ReadonlyMap<string, Keyword> = new Map(
  Object.values(KEYWORDS).map((keyword): [string, Keyword] => [
    keyword,
    keyword,
  ])
);

export function lookupKeyword(text: string): Keyword | null {
  return KEYWORD_TABLE.get(text) ?? null;
}

/**
 * Keyword carried by a token, or null for non-identifier tokens and
 * plain identifiers.
 */
export function keywordOf(token: Token): Keyword | null {
  if (token.type !== TOKEN_TYPES.IDENTIFIER) return null;
  return lookupKeyword(token.value);
}
