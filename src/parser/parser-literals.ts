/**
 * Parser Extension: Literal Parsing
 * Integer and string literals
 */

import { Parser } from './parser.js';
import type {
  Diagnostic,
  IntegerBase,
  IntegerExpressionNode,
  SourceLocation,
  SourceSpan,
  StringExpressionNode,
  TokenType,
} from '../types.js';
import { TOKEN_TYPES, createDiagnostic, makeSpan } from '../types.js';
import { isHexDigit } from '../lexer/helpers.js';
import { advance, describeToken, errorAt, report } from './state.js';

declare module './parser.js' {
  interface Parser {
    parseIntegerExpression(): IntegerExpressionNode;
    parseStringExpression(): StringExpressionNode;
  }
}

// ============================================================
// INTEGER LITERALS
// ============================================================

interface IntegerFormat {
  readonly base: IntegerBase;
  readonly kind: string;
  readonly prefix: string;
}

const INTEGER_FORMATS: Partial<Record<TokenType, IntegerFormat>> = {
  [TOKEN_TYPES.DECIMAL]: { base: 10, kind: 'decimal', prefix: '' },
  [TOKEN_TYPES.HEXADECIMAL]: { base: 16, kind: 'hexadecimal', prefix: '0x' },
  [TOKEN_TYPES.OCTAL]: { base: 8, kind: 'octal', prefix: '0o' },
  [TOKEN_TYPES.BINARY]: { base: 2, kind: 'binary', prefix: '0b' },
};

/**
 * Parse an integer literal token into an arbitrary-precision value.
 * `0x_` and friends, which have a prefix but no digits, are rejected.
 */
Parser.prototype.parseIntegerExpression = function (
  this: Parser
): IntegerExpressionNode {
  const token = advance(this.state);
  const format = INTEGER_FORMATS[token.type];
  if (format === undefined) {
    throw errorAt(token, 'STRATA-I001', {
      detail: `integer literal from ${describeToken(token)}`,
    });
  }

  const digits = token.value.slice(format.prefix.length).replace(/_/g, '');
  if (digits === '') {
    throw errorAt(token, 'STRATA-P016', {
      kind: format.kind,
      literal: token.value,
    });
  }

  return {
    type: 'IntegerExpression',
    value: BigInt(`${format.prefix}${digits}`),
    base: format.base,
    literal: token.value,
    span: token.span,
  };
};

// ============================================================
// STRING LITERALS
// ============================================================

Parser.prototype.parseStringExpression = function (
  this: Parser
): StringExpressionNode {
  const token = advance(this.state);
  const { value, diagnostics } = decodeStringLiteral(token.value, token.span);
  report(this.state, diagnostics);
  return { type: 'StringExpression', value, span: token.span };
};

export interface DecodedString {
  readonly value: string;
  readonly diagnostics: Diagnostic[];
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '0': '\0',
  n: '\n',
  r: '\r',
  t: '\t',
  '"': '"',
  "'": "'",
  '\\': '\\',
};

const MAX_UNICODE_DIGITS = 8;
const MAX_CODE_POINT = 0x10ffff;

/**
 * Decode the raw text of a string token, quotes included.
 *
 * Malformed escapes never abort decoding: each one yields a warning
 * diagnostic positioned on the escape sequence, and decoding resumes after
 * it. String tokens never span lines, so positions inside the literal are
 * derived from the token start by column arithmetic.
 *
 * @example
 * decodeStringLiteral('"a\\tb"', span).value // 'a\tb'
 */
export function decodeStringLiteral(
  literal: string,
  span: SourceSpan
): DecodedString {
  const diagnostics: Diagnostic[] = [];

  const locate = (index: number): SourceLocation => ({
    line: span.start.line,
    column: span.start.column + index,
    offset: span.start.offset + index,
  });
  const warn = (
    errorId: string,
    context: Record<string, unknown>,
    from: number,
    to: number
  ): void => {
    diagnostics.push(
      createDiagnostic(errorId, context, makeSpan(locate(from), locate(to)))
    );
  };

  let start = 0;
  let end = literal.length;

  if (literal.startsWith('"')) {
    start = 1;
  } else {
    warn('STRATA-W005', { position: 'opening' }, 0, 0);
  }

  if (end > start && literal.endsWith('"')) {
    end -= 1;
  } else {
    warn('STRATA-W005', { position: 'closing' }, end, end);
  }

  let value = '';
  let i = start;

  while (i < end) {
    const ch = literal.charAt(i);
    if (ch !== '\\') {
      value += ch;
      i++;
      continue;
    }

    const escapeStart = i;
    i++; // backslash

    if (i >= end) {
      warn('STRATA-W001', {}, escapeStart, i);
      break;
    }

    const escape = literal.charAt(i);
    i++;

    const simple = SIMPLE_ESCAPES[escape];
    if (simple !== undefined) {
      value += simple;
      continue;
    }

    if (escape !== 'u') {
      warn('STRATA-W002', { character: escape }, escapeStart, i);
      value += escape;
      continue;
    }

    if (i >= end || literal.charAt(i) !== '{') {
      warn('STRATA-W003', {}, escapeStart, i);
      continue;
    }
    i++; // {

    const digitsStart = i;
    while (
      i < end &&
      i - digitsStart < MAX_UNICODE_DIGITS &&
      isHexDigit(literal.charAt(i))
    ) {
      i++;
    }
    const digits = literal.slice(digitsStart, i);

    if (i >= end) {
      warn('STRATA-W003', {}, escapeStart, i);
      continue;
    }

    if (literal.charAt(i) !== '}') {
      // Offending character is left for the main loop
      warn(
        'STRATA-W004',
        { sequence: literal.slice(escapeStart, i + 1) },
        escapeStart,
        i
      );
      continue;
    }
    i++; // }

    const codePoint = digits === '' ? NaN : parseInt(digits, 16);
    if (Number.isNaN(codePoint) || codePoint > MAX_CODE_POINT) {
      warn(
        'STRATA-W004',
        { sequence: literal.slice(escapeStart, i) },
        escapeStart,
        i
      );
      continue;
    }

    value += String.fromCodePoint(codePoint);
  }

  return { value, diagnostics };
}
