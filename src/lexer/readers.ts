/**
 * Token Readers
 * Functions to read specific token types from source
 */

import type { Token, TokenType } from '../types.js';
import { TOKEN_TYPES, createError } from '../types.js';
import {
  isBinaryDigit,
  isDigit,
  isHexDigit,
  isIdentifierChar,
  isOctalDigit,
  makeToken,
} from './helpers.js';
import {
  advance,
  advanceBy,
  currentLocation,
  isAtEnd,
  type LexerState,
  lookingAt,
  peek,
} from './state.js';

/**
 * Read a string literal. The token keeps the raw text, quotes and escape
 * sequences included; decoding happens in the parser.
 */
export function readString(state: LexerState): Token {
  const start = currentLocation(state);
  const startPos = state.pos;
  advance(state); // consume opening "

  while (peek(state) !== '"') {
    if (isAtEnd(state) || peek(state) === '\n') {
      throw createError('STRATA-L001', {}, start);
    }
    if (peek(state) === '\\') {
      advance(state); // consume backslash
      if (isAtEnd(state) || peek(state) === '\n') continue;
    }
    advance(state);
  }

  advance(state); // consume closing "

  return makeToken(
    TOKEN_TYPES.STRING,
    state.source.slice(startPos, state.pos),
    start,
    currentLocation(state)
  );
}

interface IntegerPrefix {
  readonly type: TokenType;
  readonly kind: string;
  readonly isValidDigit: (ch: string) => boolean;
}

const INTEGER_PREFIXES: Record<string, IntegerPrefix> = {
  x: {
    type: TOKEN_TYPES.HEXADECIMAL,
    kind: 'hexadecimal',
    isValidDigit: isHexDigit,
  },
  o: { type: TOKEN_TYPES.OCTAL, kind: 'octal', isValidDigit: isOctalDigit },
  b: { type: TOKEN_TYPES.BINARY, kind: 'binary', isValidDigit: isBinaryDigit },
};

/**
 * Read an integer literal: decimal, or 0x/0o/0b prefixed.
 * Underscores are accepted as digit separators.
 */
export function readNumber(state: LexerState): Token {
  const start = currentLocation(state);
  const startPos = state.pos;

  const prefix = peek(state) === '0' ? INTEGER_PREFIXES[peek(state, 1)] : undefined;
  if (prefix) {
    advance(state); // consume 0
    advance(state); // consume prefix letter

    while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
      const ch = peek(state);
      if (ch !== '_' && !prefix.isValidDigit(ch)) {
        throw createError(
          'STRATA-L004',
          { digit: ch, kind: prefix.kind },
          currentLocation(state)
        );
      }
      advance(state);
    }

    return makeToken(
      prefix.type,
      state.source.slice(startPos, state.pos),
      start,
      currentLocation(state)
    );
  }

  while (!isAtEnd(state) && (isDigit(peek(state)) || peek(state) === '_')) {
    advance(state);
  }

  return makeToken(
    TOKEN_TYPES.DECIMAL,
    state.source.slice(startPos, state.pos),
    start,
    currentLocation(state)
  );
}

export function readIdentifier(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && isIdentifierChar(peek(state))) {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.IDENTIFIER, value, start, currentLocation(state));
}

/** Read a `//` comment up to (not including) the end of the line */
export function readLineComment(state: LexerState): Token {
  const start = currentLocation(state);
  let value = '';

  while (!isAtEnd(state) && peek(state) !== '\n') {
    value += advance(state);
  }

  return makeToken(TOKEN_TYPES.COMMENT, value, start, currentLocation(state));
}

/** Read a `/* ... *\/` comment; block comments nest */
export function readBlockComment(state: LexerState): Token {
  const start = currentLocation(state);
  const startPos = state.pos;
  advanceBy(state, 2);

  let depth = 1;
  while (depth > 0) {
    if (isAtEnd(state)) {
      throw createError('STRATA-L003', {}, start);
    }
    if (lookingAt(state, '/*')) {
      advanceBy(state, 2);
      depth++;
    } else if (lookingAt(state, '*/')) {
      advanceBy(state, 2);
      depth--;
    } else {
      advance(state);
    }
  }

  return makeToken(
    TOKEN_TYPES.COMMENT,
    state.source.slice(startPos, state.pos),
    start,
    currentLocation(state)
  );
}
