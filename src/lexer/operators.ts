/**
 * Operator Lookup Tables
 */

import type { TokenType } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

/** Three-character operator lookup table */
export const THREE_CHAR_OPERATORS: Record<string, TokenType> = {
  '<-!': TOKEN_TYPES.LEFT_ARROW_EXCLAMATION,
};

/** Two-character operator lookup table */
export const TWO_CHAR_OPERATORS: Record<string, TokenType> = {
  '<-': TOKEN_TYPES.LEFT_ARROW,
  '==': TOKEN_TYPES.EQUAL_EQUAL,
  '!=': TOKEN_TYPES.NOT_EQUAL,
  '<=': TOKEN_TYPES.LESS_EQUAL,
  '>=': TOKEN_TYPES.GREATER_EQUAL,
  '&&': TOKEN_TYPES.AND,
  '||': TOKEN_TYPES.OR,
  '??': TOKEN_TYPES.DOUBLE_QUESTION,
};

/** Single-character operator lookup table */
export const SINGLE_CHAR_OPERATORS: Record<string, TokenType> = {
  '=': TOKEN_TYPES.EQUAL,
  '<': TOKEN_TYPES.LESS,
  '>': TOKEN_TYPES.GREATER,
  '+': TOKEN_TYPES.PLUS,
  '-': TOKEN_TYPES.MINUS,
  '*': TOKEN_TYPES.STAR,
  '/': TOKEN_TYPES.SLASH,
  '%': TOKEN_TYPES.PERCENT,
  '!': TOKEN_TYPES.BANG,
  '?': TOKEN_TYPES.QUESTION,
  '@': TOKEN_TYPES.AT,
  '&': TOKEN_TYPES.AMPERSAND,
  ',': TOKEN_TYPES.COMMA,
  ':': TOKEN_TYPES.COLON,
  ';': TOKEN_TYPES.SEMICOLON,
  '.': TOKEN_TYPES.DOT,
  '(': TOKEN_TYPES.LPAREN,
  ')': TOKEN_TYPES.RPAREN,
  '{': TOKEN_TYPES.LBRACE,
  '}': TOKEN_TYPES.RBRACE,
  '[': TOKEN_TYPES.LBRACKET,
  ']': TOKEN_TYPES.RBRACKET,
};
