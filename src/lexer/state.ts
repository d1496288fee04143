/**
 * Lexer State
 * Cursor over Strata source text. Lines and columns are 1-based; a newline
 * moves to column 1 of the next line.
 */

import type { SourceLocation } from '../types.js';

export interface LexerState {
  readonly source: string;
  /** Emit `//` and `/* *\/` comments as COMMENT tokens instead of skipping them */
  readonly includeComments: boolean;
  pos: number;
  line: number;
  column: number;
}

export interface LexerStateOptions {
  includeComments?: boolean | undefined;
}

export function createLexerState(
  source: string,
  options: LexerStateOptions = {}
): LexerState {
  return {
    source,
    includeComments: options.includeComments ?? false,
    pos: 0,
    line: 1,
    column: 1,
  };
}

export function currentLocation(state: LexerState): SourceLocation {
  return { line: state.line, column: state.column, offset: state.pos };
}

/** Character at `offset` past the cursor, '' beyond the end */
export function peek(state: LexerState, offset = 0): string {
  return state.source[state.pos + offset] ?? '';
}

/** Up to `length` characters from the cursor */
export function peekChars(state: LexerState, length: number): string {
  return state.source.slice(state.pos, state.pos + length);
}

/** True when the source continues with `text` at the cursor */
export function lookingAt(state: LexerState, text: string): boolean {
  return state.source.startsWith(text, state.pos);
}

export function advance(state: LexerState): string {
  const ch = state.source[state.pos] ?? '';
  state.pos++;
  if (ch === '\n') {
    state.line++;
    state.column = 1;
  } else {
    state.column++;
  }
  return ch;
}

/** Consume `count` characters and return them */
export function advanceBy(state: LexerState, count: number): string {
  let consumed = '';
  for (let i = 0; i < count; i++) consumed += advance(state);
  return consumed;
}

export function isAtEnd(state: LexerState): boolean {
  return state.pos >= state.source.length;
}
