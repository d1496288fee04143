/**
 * Parser Extension: Expression Parsing
 * Binding-power expression parser, primaries and postfix operations
 */

import { Parser } from './parser.js';
import type {
  ArgumentNode,
  BinaryOperation,
  ExpressionNode,
  Identifier,
  TokenType,
  UnaryOperation,
} from '../types.js';
import { KEYWORDS, TOKEN_TYPES, keywordOf, makeSpan } from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  errorAt,
  expect,
  peek,
} from './state.js';
import { tokenToIdentifier } from './helpers.js';

declare module './parser.js' {
  interface Parser {
    parseExpression(minBindingPower: number): ExpressionNode;
    parsePrefixExpression(): ExpressionNode;
    parsePrimary(): ExpressionNode;
    parseArrayExpression(): ExpressionNode;
    parsePostfix(left: ExpressionNode): ExpressionNode;
    parseArguments(): ArgumentNode[];
    parseArgument(): ArgumentNode;
  }
}

// ============================================================
// BINDING POWERS
// ============================================================

/** Binding power that lets every operator bind */
export const LOWEST_BINDING_POWER = 0;

const PREFIX_BINDING_POWER = 80;
const POSTFIX_BINDING_POWER = 90;

interface InfixOperator {
  readonly operation: BinaryOperation;
  readonly bindingPower: number;
  readonly rightAssociative?: boolean;
}

const INFIX_OPERATORS: Partial<Record<TokenType, InfixOperator>> = {
  [TOKEN_TYPES.DOUBLE_QUESTION]: {
    operation: '??',
    bindingPower: 10,
    rightAssociative: true,
  },
  [TOKEN_TYPES.OR]: { operation: '||', bindingPower: 20 },
  [TOKEN_TYPES.AND]: { operation: '&&', bindingPower: 30 },
  [TOKEN_TYPES.EQUAL_EQUAL]: { operation: '==', bindingPower: 40 },
  [TOKEN_TYPES.NOT_EQUAL]: { operation: '!=', bindingPower: 40 },
  [TOKEN_TYPES.LESS]: { operation: '<', bindingPower: 50 },
  [TOKEN_TYPES.LESS_EQUAL]: { operation: '<=', bindingPower: 50 },
  [TOKEN_TYPES.GREATER]: { operation: '>', bindingPower: 50 },
  [TOKEN_TYPES.GREATER_EQUAL]: { operation: '>=', bindingPower: 50 },
  [TOKEN_TYPES.PLUS]: { operation: '+', bindingPower: 60 },
  [TOKEN_TYPES.MINUS]: { operation: '-', bindingPower: 60 },
  [TOKEN_TYPES.STAR]: { operation: '*', bindingPower: 70 },
  [TOKEN_TYPES.SLASH]: { operation: '/', bindingPower: 70 },
  [TOKEN_TYPES.PERCENT]: { operation: '%', bindingPower: 70 },
};

const PREFIX_OPERATORS: Partial<Record<TokenType, UnaryOperation>> = {
  [TOKEN_TYPES.MINUS]: '-',
  [TOKEN_TYPES.BANG]: '!',
  [TOKEN_TYPES.LEFT_ARROW]: '<-',
};

const POSTFIX_START: readonly TokenType[] = [
  TOKEN_TYPES.LPAREN,
  TOKEN_TYPES.DOT,
  TOKEN_TYPES.LBRACKET,
];

// ============================================================
// EXPRESSIONS
// ============================================================

/**
 * Parse an expression whose operators all bind tighter than
 * `minBindingPower`. Stops, without consuming, at the first token that is
 * not such an operator.
 *
 * @example
 * // `1 + 2 * 3` parses as `1 + (2 * 3)`
 * parser.parseExpression(LOWEST_BINDING_POWER)
 */
Parser.prototype.parseExpression = function (
  this: Parser,
  minBindingPower: number
): ExpressionNode {
  let left = this.parsePrefixExpression();

  while (true) {
    const token = current(this.state);

    if (POSTFIX_START.includes(token.type)) {
      if (POSTFIX_BINDING_POWER <= minBindingPower) break;
      left = this.parsePostfix(left);
      continue;
    }

    const infix = INFIX_OPERATORS[token.type];
    if (infix === undefined || infix.bindingPower <= minBindingPower) break;
    advance(this.state);

    const right = this.parseExpression(
      infix.rightAssociative ? infix.bindingPower - 1 : infix.bindingPower
    );
    left = {
      type: 'BinaryExpression',
      operation: infix.operation,
      left,
      right,
      span: makeSpan(left.span.start, right.span.end),
    };
  }

  return left;
};

Parser.prototype.parsePrefixExpression = function (
  this: Parser
): ExpressionNode {
  const token = current(this.state);
  const operation = PREFIX_OPERATORS[token.type];
  if (operation === undefined) {
    return this.parsePrimary();
  }

  advance(this.state);
  const expression = this.parseExpression(PREFIX_BINDING_POWER);
  return {
    type: 'UnaryExpression',
    operation,
    expression,
    span: makeSpan(token.span.start, expression.span.end),
  };
};

// ============================================================
// PRIMARIES
// ============================================================

Parser.prototype.parsePrimary = function (this: Parser): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.DECIMAL:
    case TOKEN_TYPES.HEXADECIMAL:
    case TOKEN_TYPES.OCTAL:
    case TOKEN_TYPES.BINARY:
      return this.parseIntegerExpression();

    case TOKEN_TYPES.STRING:
      return this.parseStringExpression();

    case TOKEN_TYPES.LBRACKET:
      return this.parseArrayExpression();

    // Grouping yields the inner node, widened to cover the parentheses
    case TOKEN_TYPES.LPAREN: {
      const open = advance(this.state);
      const inner = this.parseExpression(LOWEST_BINDING_POWER);
      const close = expect(this.state, TOKEN_TYPES.RPAREN);
      return { ...inner, span: makeSpan(open.span.start, close.span.end) };
    }

    case TOKEN_TYPES.IDENTIFIER:
      break;

    default:
      throw errorAt(token, 'STRATA-P010', { actual: describeToken(token) });
  }

  switch (keywordOf(token)) {
    case KEYWORDS.TRUE:
    case KEYWORDS.FALSE:
      advance(this.state);
      return {
        type: 'BoolExpression',
        value: keywordOf(token) === KEYWORDS.TRUE,
        span: token.span,
      };

    case KEYWORDS.NIL:
      advance(this.state);
      return { type: 'NilExpression', span: token.span };

    case KEYWORDS.CREATE: {
      advance(this.state);
      const invocation = this.parseExpression(PREFIX_BINDING_POWER);
      if (invocation.type !== 'InvocationExpression') {
        throw errorAt(token, 'STRATA-P015');
      }
      return {
        type: 'CreateExpression',
        invocation,
        span: makeSpan(token.span.start, invocation.span.end),
      };
    }

    case KEYWORDS.DESTROY: {
      advance(this.state);
      const expression = this.parseExpression(PREFIX_BINDING_POWER);
      return {
        type: 'DestroyExpression',
        expression,
        span: makeSpan(token.span.start, expression.span.end),
      };
    }

    default:
      advance(this.state);
      return {
        type: 'IdentifierExpression',
        identifier: tokenToIdentifier(token),
        span: token.span,
      };
  }
};

/** `[a, b, c]`, trailing comma allowed */
Parser.prototype.parseArrayExpression = function (
  this: Parser
): ExpressionNode {
  const open = advance(this.state);
  const values: ExpressionNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RBRACKET)) {
    values.push(this.parseExpression(LOWEST_BINDING_POWER));
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  const close = expect(this.state, TOKEN_TYPES.RBRACKET);
  return {
    type: 'ArrayExpression',
    values,
    span: makeSpan(open.span.start, close.span.end),
  };
};

// ============================================================
// POSTFIX OPERATIONS
// ============================================================

/** Invocation, member access or indexing applied to `left` */
Parser.prototype.parsePostfix = function (
  this: Parser,
  left: ExpressionNode
): ExpressionNode {
  const token = current(this.state);

  switch (token.type) {
    case TOKEN_TYPES.LPAREN: {
      const args = this.parseArguments();
      const close = expect(this.state, TOKEN_TYPES.RPAREN);
      return {
        type: 'InvocationExpression',
        invokedExpression: left,
        arguments: args,
        span: makeSpan(left.span.start, close.span.end),
      };
    }

    case TOKEN_TYPES.DOT: {
      advance(this.state);
      const identifier = tokenToIdentifier(
        expect(this.state, TOKEN_TYPES.IDENTIFIER)
      );
      return {
        type: 'MemberExpression',
        expression: left,
        identifier,
        span: makeSpan(left.span.start, identifier.span.end),
      };
    }

    case TOKEN_TYPES.LBRACKET: {
      advance(this.state);
      const indexingExpression = this.parseExpression(LOWEST_BINDING_POWER);
      const close = expect(this.state, TOKEN_TYPES.RBRACKET);
      return {
        type: 'IndexExpression',
        targetExpression: left,
        indexingExpression,
        span: makeSpan(left.span.start, close.span.end),
      };
    }

    default:
      throw errorAt(token, 'STRATA-I001', {
        detail: `postfix operation at ${describeToken(token)}`,
      });
  }
};

/**
 * Parse `(` and the argument list, leaving `)` for the caller.
 * Trailing comma allowed.
 */
Parser.prototype.parseArguments = function (this: Parser): ArgumentNode[] {
  advance(this.state); // consume (
  const args: ArgumentNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    args.push(this.parseArgument());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  return args;
};

/** `label: expression` or `expression` */
Parser.prototype.parseArgument = function (this: Parser): ArgumentNode {
  let label: Identifier | null = null;

  if (
    check(this.state, TOKEN_TYPES.IDENTIFIER) &&
    peek(this.state, 1).type === TOKEN_TYPES.COLON
  ) {
    label = tokenToIdentifier(advance(this.state));
    advance(this.state); // consume :
  }

  const expression = this.parseExpression(LOWEST_BINDING_POWER);
  return {
    type: 'Argument',
    label,
    expression,
    span: makeSpan(label?.span.start ?? expression.span.start, expression.span.end),
  };
};
