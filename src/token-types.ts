import type { SourceSpan } from './source-location.js';

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  // Literals
  STRING: 'STRING',
  DECIMAL: 'DECIMAL',
  HEXADECIMAL: 'HEXADECIMAL', // 0x...
  BINARY: 'BINARY', // 0b...
  OCTAL: 'OCTAL', // 0o...

  // Identifiers (keywords are identifiers, see keywords.ts)
  IDENTIFIER: 'IDENTIFIER',

  // Transfer operators
  EQUAL: 'EQUAL', // =
  LEFT_ARROW: 'LEFT_ARROW', // <-
  LEFT_ARROW_EXCLAMATION: 'LEFT_ARROW_EXCLAMATION', // <-!

  // Comparison operators
  EQUAL_EQUAL: 'EQUAL_EQUAL', // ==
  NOT_EQUAL: 'NOT_EQUAL', // !=
  LESS: 'LESS', // <
  LESS_EQUAL: 'LESS_EQUAL', // <=
  GREATER: 'GREATER', // >
  GREATER_EQUAL: 'GREATER_EQUAL', // >=

  // Arithmetic operators
  PLUS: 'PLUS', // +
  MINUS: 'MINUS', // -
  STAR: 'STAR', // *
  SLASH: 'SLASH', // /
  PERCENT: 'PERCENT', // %

  // Logical operators
  AND: 'AND', // &&
  OR: 'OR', // ||
  BANG: 'BANG', // !
  DOUBLE_QUESTION: 'DOUBLE_QUESTION', // ??

  // Punctuation
  COMMA: 'COMMA', // ,
  COLON: 'COLON', // :
  SEMICOLON: 'SEMICOLON', // ;
  DOT: 'DOT', // .
  QUESTION: 'QUESTION', // ?
  AT: 'AT', // @
  AMPERSAND: 'AMPERSAND', // &

  // Delimiters
  LPAREN: 'LPAREN', // (
  RPAREN: 'RPAREN', // )
  LBRACE: 'LBRACE', // {
  RBRACE: 'RBRACE', // }
  LBRACKET: 'LBRACKET', // [
  RBRACKET: 'RBRACKET', // ]

  // Special
  COMMENT: 'COMMENT',
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  /** Raw source text of the token */
  readonly value: string;
  readonly span: SourceSpan;
}

/** Human-readable token names used in error messages */
const TOKEN_DESCRIPTIONS: Record<TokenType, string> = {
  STRING: 'string',
  DECIMAL: 'decimal integer',
  HEXADECIMAL: 'hexadecimal integer',
  BINARY: 'binary integer',
  OCTAL: 'octal integer',
  IDENTIFIER: 'identifier',
  EQUAL: "'='",
  LEFT_ARROW: "'<-'",
  LEFT_ARROW_EXCLAMATION: "'<-!'",
  EQUAL_EQUAL: "'=='",
  NOT_EQUAL: "'!='",
  LESS: "'<'",
  LESS_EQUAL: "'<='",
  GREATER: "'>'",
  GREATER_EQUAL: "'>='",
  PLUS: "'+'",
  MINUS: "'-'",
  STAR: "'*'",
  SLASH: "'/'",
  PERCENT: "'%'",
  AND: "'&&'",
  OR: "'||'",
  BANG: "'!'",
  DOUBLE_QUESTION: "'??'",
  COMMA: "','",
  COLON: "':'",
  SEMICOLON: "';'",
  DOT: "'.'",
  QUESTION: "'?'",
  AT: "'@'",
  AMPERSAND: "'&'",
  LPAREN: "'('",
  RPAREN: "')'",
  LBRACE: "'{'",
  RBRACE: "'}'",
  LBRACKET: "'['",
  RBRACKET: "']'",
  COMMENT: 'comment',
  EOF: 'end of input',
};

export function describeTokenType(type: TokenType): string {
  return TOKEN_DESCRIPTIONS[type];
}
