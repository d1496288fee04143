/**
 * Parser State
 * Core state management and token navigation utilities
 */

import type { Diagnostic, StrataError, Token, TokenType } from '../types.js';
import { ParseError, TOKEN_TYPES, createError, describeTokenType } from '../types.js';

// ============================================================
// PARSER STATE
// ============================================================

export interface ParserState {
  readonly tokens: Token[];
  pos: number;
  /** Accept identifiers as import locations after `from` */
  readonly identifierLocations: boolean;
  /** Soft diagnostics collected while decoding literals */
  readonly diagnostics: Diagnostic[];
}

export interface ParserStateOptions {
  identifierLocations?: boolean | undefined;
}

/**
 * Create the cursor for one parse. Comment tokens carry no syntax and are
 * dropped here, so the grammar never sees them.
 */
export function createParserState(
  tokens: Token[],
  options: ParserStateOptions = {}
): ParserState {
  return {
    tokens: tokens.filter((token) => token.type !== TOKEN_TYPES.COMMENT),
    pos: 0,
    identifierLocations: options.identifierLocations ?? false,
    diagnostics: [],
  };
}

// ============================================================
// TOKEN NAVIGATION
// ============================================================

/** @internal */
export function current(state: ParserState): Token {
  const token = state.tokens[state.pos];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function peek(state: ParserState, offset = 0): Token {
  const idx = state.pos + offset;
  const token = state.tokens[idx];
  if (token) return token;
  const last = state.tokens[state.tokens.length - 1];
  if (last) return last;
  throw new Error('No tokens available');
}

/** @internal */
export function isAtEnd(state: ParserState): boolean {
  return current(state).type === TOKEN_TYPES.EOF;
}

/** @internal */
export function check(state: ParserState, ...types: TokenType[]): boolean {
  return types.includes(current(state).type);
}

/** @internal */
export function advance(state: ParserState): Token {
  const token = current(state);
  if (!isAtEnd(state)) state.pos++;
  return token;
}

/**
 * Consume a token of the given type or throw STRATA-P004.
 * @internal
 */
export function expect(state: ParserState, type: TokenType): Token {
  if (check(state, type)) return advance(state);
  const token = current(state);
  const context = {
    expected: describeTokenType(type),
    actual: describeToken(token),
  };
  const error = createError('STRATA-P004', context, token.span.start);
  const hint = generateHint(type, token);
  if (!hint) throw error;
  throw new ParseError(
    'STRATA-P004',
    error.toData().message,
    token.span.start,
    context,
    hint
  );
}

/** @internal */
export function report(state: ParserState, diagnostics: Diagnostic[]): void {
  state.diagnostics.push(...diagnostics);
}

// ============================================================
// ERRORS
// ============================================================

/**
 * Describe a token for error messages: identifiers and literals include
 * their text, punctuation is named by its symbol.
 * @internal
 */
export function describeToken(token: Token): string {
  switch (token.type) {
    case TOKEN_TYPES.IDENTIFIER:
    case TOKEN_TYPES.STRING:
      return `${describeTokenType(token.type)} ${JSON.stringify(token.value.replace(/^"|"$/g, ''))}`;
    case TOKEN_TYPES.DECIMAL:
    case TOKEN_TYPES.HEXADECIMAL:
    case TOKEN_TYPES.BINARY:
    case TOKEN_TYPES.OCTAL:
      return `${describeTokenType(token.type)} ${token.value}`;
    default:
      return describeTokenType(token.type);
  }
}

/**
 * Create a registry error positioned at the start of a token.
 * @internal
 */
export function errorAt(
  token: Token,
  errorId: string,
  context: Record<string, unknown> = {}
): StrataError {
  return createError(errorId, context, token.span.start);
}

/**
 * Generate contextual hints for common parse errors.
 * @internal
 */
function generateHint(expectedType: TokenType, actualToken: Token): string | null {
  const actual = actualToken.type;

  // Hint for unclosed brackets/braces/parens
  if (expectedType === TOKEN_TYPES.RPAREN && actual === TOKEN_TYPES.EOF) {
    return 'Check for unclosed parenthesis';
  }
  if (expectedType === TOKEN_TYPES.RBRACE && actual === TOKEN_TYPES.EOF) {
    return 'Check for unclosed brace';
  }
  if (expectedType === TOKEN_TYPES.RBRACKET && actual === TOKEN_TYPES.EOF) {
    return 'Check for unclosed bracket';
  }

  // Hint for using : where a transfer is expected
  if (expectedType === TOKEN_TYPES.COLON && actual === TOKEN_TYPES.EQUAL) {
    return "Parameters need a type annotation, as in 'name: Type'";
  }

  return null;
}
