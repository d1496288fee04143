/**
 * Tokenizer
 * Main tokenization logic
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES, createError } from '../types.js';
import {
  advanceAndMakeToken,
  isDigit,
  isIdentifierStart,
  isWhitespace,
  makeToken,
} from './helpers.js';
import {
  SINGLE_CHAR_OPERATORS,
  THREE_CHAR_OPERATORS,
  TWO_CHAR_OPERATORS,
} from './operators.js';
import {
  readBlockComment,
  readIdentifier,
  readLineComment,
  readNumber,
  readString,
} from './readers.js';
import {
  advance,
  createLexerState,
  currentLocation,
  isAtEnd,
  type LexerState,
  lookingAt,
  peek,
  peekChars,
} from './state.js';

function skipWhitespace(state: LexerState): void {
  while (!isAtEnd(state) && isWhitespace(peek(state))) {
    advance(state);
  }
}

/** Next token; comments are skipped unless the state keeps them */
export function nextToken(state: LexerState): Token {
  let token = scanToken(state);
  while (token.type === TOKEN_TYPES.COMMENT && !state.includeComments) {
    token = scanToken(state);
  }
  return token;
}

function scanToken(state: LexerState): Token {
  skipWhitespace(state);

  if (isAtEnd(state)) {
    const loc = currentLocation(state);
    return makeToken(TOKEN_TYPES.EOF, '', loc, loc);
  }

  const start = currentLocation(state);
  const ch = peek(state);

  // Comments
  if (lookingAt(state, '//')) {
    return readLineComment(state);
  }
  if (lookingAt(state, '/*')) {
    return readBlockComment(state);
  }

  if (ch === '"') {
    return readString(state);
  }

  if (isDigit(ch)) {
    return readNumber(state);
  }

  // Identifier or keyword
  if (isIdentifierStart(ch)) {
    return readIdentifier(state);
  }

  // Operators, longest match first
  const threeChar = peekChars(state, 3);
  const threeCharType = THREE_CHAR_OPERATORS[threeChar];
  if (threeCharType) {
    return advanceAndMakeToken(state, 3, threeCharType, threeChar, start);
  }

  const twoChar = peekChars(state, 2);
  const twoCharType = TWO_CHAR_OPERATORS[twoChar];
  if (twoCharType) {
    return advanceAndMakeToken(state, 2, twoCharType, twoChar, start);
  }

  const singleCharType = SINGLE_CHAR_OPERATORS[ch];
  if (singleCharType) {
    return advanceAndMakeToken(state, 1, singleCharType, ch, start);
  }

  throw createError('STRATA-L002', { char: ch }, start);
}

export interface TokenizeOptions {
  includeComments?: boolean | undefined;
}

export function tokenize(source: string, options?: TokenizeOptions): Token[] {
  const state = createLexerState(source, options);
  const tokens: Token[] = [];
  let token: Token;

  do {
    token = nextToken(state);
    tokens.push(token);
  } while (token.type !== TOKEN_TYPES.EOF);

  return tokens;
}
