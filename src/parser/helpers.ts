/**
 * Parser Helpers
 * Lookup tables and small conversions shared by the parser extensions
 * @internal This module contains internal parser utilities
 */

import type {
  Access,
  Identifier,
  Keyword,
  Token,
  TokenType,
  TransferOperation,
} from '../types.js';
import {
  ACCESS,
  KEYWORDS,
  TOKEN_TYPES,
  TRANSFER_OPERATIONS,
  keywordOf,
} from '../types.js';

// ============================================================
// LOOKUP TABLES
// ============================================================

/** @internal Keywords accepted inside `access(...)` */
export const ACCESS_BY_KEYWORD: ReadonlyMap<Keyword, Access> = new Map<
  Keyword,
  Access
>([
  [KEYWORDS.ALL, ACCESS.PUBLIC],
  [KEYWORDS.ACCOUNT, ACCESS.ACCOUNT],
  [KEYWORDS.CONTRACT, ACCESS.CONTRACT],
  [KEYWORDS.SELF, ACCESS.PRIVATE],
]);

/** @internal */
export const TRANSFER_BY_TOKEN: Partial<Record<TokenType, TransferOperation>> =
  {
    [TOKEN_TYPES.EQUAL]: TRANSFER_OPERATIONS.COPY,
    [TOKEN_TYPES.LEFT_ARROW]: TRANSFER_OPERATIONS.MOVE,
    [TOKEN_TYPES.LEFT_ARROW_EXCLAMATION]: TRANSFER_OPERATIONS.MOVE_FORCED,
  };

// ============================================================
// PREDICATES
// ============================================================

/**
 * Check for one of the access modifier keywords
 * @internal
 */
export function isAccessKeyword(token: Token): boolean {
  const keyword = keywordOf(token);
  return (
    keyword === KEYWORDS.PRIV ||
    keyword === KEYWORDS.PUB ||
    keyword === KEYWORDS.ACCESS
  );
}

// ============================================================
// CONVERSIONS
// ============================================================

/** @internal */
export function tokenToIdentifier(token: Token): Identifier {
  return { name: token.value, span: token.span };
}
