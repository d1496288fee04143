/**
 * Lexer Module
 * Converts source text into tokens
 */

export { LexerError } from '../error-classes.js';
export {
  createLexerState,
  type LexerState,
  type LexerStateOptions,
} from './state.js';
export { nextToken, tokenize, type TokenizeOptions } from './tokenizer.js';
