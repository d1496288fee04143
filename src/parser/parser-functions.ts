/**
 * Parser Extension: Function Parsing
 * Parameter lists, function declarations and function bodies
 */

import { Parser } from './parser.js';
import type {
  Access,
  FunctionBlockNode,
  FunctionDeclarationNode,
  Identifier,
  ParameterListNode,
  ParameterNode,
  SourceLocation,
  StatementNode,
  TypeAnnotationNode,
} from '../types.js';
import { ACCESS, KEYWORDS, TOKEN_TYPES, keywordOf, makeSpan } from '../types.js';
import { advance, check, current, errorAt, expect } from './state.js';
import { isAccessKeyword, tokenToIdentifier } from './helpers.js';
import { LOWEST_BINDING_POWER } from './parser-expr.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseParameterList(): ParameterListNode;
    parseParameter(): ParameterNode;
    parseFunctionDeclaration(
      access: Access,
      accessStart: SourceLocation | null
    ): FunctionDeclarationNode;
    parseFunctionBlock(): FunctionBlockNode;
    parseStatement(): StatementNode;
  }
}

// ============================================================
// PARAMETERS
// ============================================================

/**
 * `( a: A, label b: B )`, trailing comma allowed.
 * The span covers both parentheses.
 */
Parser.prototype.parseParameterList = function (
  this: Parser
): ParameterListNode {
  const open = expect(this.state, TOKEN_TYPES.LPAREN);
  const parameters: ParameterNode[] = [];

  while (!check(this.state, TOKEN_TYPES.RPAREN)) {
    parameters.push(this.parseParameter());
    if (!check(this.state, TOKEN_TYPES.COMMA)) break;
    advance(this.state);
  }

  const close = expect(this.state, TOKEN_TYPES.RPAREN);
  return {
    type: 'ParameterList',
    parameters,
    span: makeSpan(open.span.start, close.span.end),
  };
};

/**
 * ```
 * parameter : identifier identifier? ':' typeAnnotation
 * ```
 * With two identifiers, the first is the argument label.
 */
Parser.prototype.parseParameter = function (this: Parser): ParameterNode {
  const first = tokenToIdentifier(expect(this.state, TOKEN_TYPES.IDENTIFIER));

  let label: Identifier | null = null;
  let identifier = first;
  if (check(this.state, TOKEN_TYPES.IDENTIFIER)) {
    label = first;
    identifier = tokenToIdentifier(advance(this.state));
  }

  expect(this.state, TOKEN_TYPES.COLON);
  const typeAnnotation = this.parseTypeAnnotation();

  return {
    type: 'Parameter',
    label,
    identifier,
    typeAnnotation,
    span: makeSpan(first.span.start, typeAnnotation.span.end),
  };
};

// ============================================================
// FUNCTION DECLARATIONS
// ============================================================

/**
 * ```
 * functionDeclaration :
 *     'fun' identifier parameterList ( ':' typeAnnotation )? functionBlock?
 * ```
 */
Parser.prototype.parseFunctionDeclaration = function (
  this: Parser,
  access: Access,
  accessStart: SourceLocation | null
): FunctionDeclarationNode {
  const keywordToken = advance(this.state);
  const start = accessStart ?? keywordToken.span.start;

  const identifier = this.parseDeclarationIdentifier('function');
  const parameterList = this.parseParameterList();
  let end = parameterList.span.end;

  let returnTypeAnnotation: TypeAnnotationNode | null = null;
  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state);
    returnTypeAnnotation = this.parseTypeAnnotation();
    end = returnTypeAnnotation.span.end;
  }

  let functionBlock: FunctionBlockNode | null = null;
  if (check(this.state, TOKEN_TYPES.LBRACE)) {
    functionBlock = this.parseFunctionBlock();
    end = functionBlock.span.end;
  }

  return {
    type: 'FunctionDeclaration',
    access,
    identifier,
    parameterList,
    returnTypeAnnotation,
    functionBlock,
    span: makeSpan(start, end),
  };
};

/** `{ statement* }` with optional `;` between statements */
Parser.prototype.parseFunctionBlock = function (
  this: Parser
): FunctionBlockNode {
  const open = expect(this.state, TOKEN_TYPES.LBRACE);
  const statements: StatementNode[] = [];

  while (true) {
    if (check(this.state, TOKEN_TYPES.SEMICOLON)) {
      advance(this.state);
      continue;
    }
    if (check(this.state, TOKEN_TYPES.RBRACE, TOKEN_TYPES.EOF)) break;
    statements.push(this.parseStatement());
  }

  const close = expect(this.state, TOKEN_TYPES.RBRACE);
  return {
    type: 'FunctionBlock',
    statements,
    span: makeSpan(open.span.start, close.span.end),
  };
};

// ============================================================
// STATEMENTS
// ============================================================

/**
 * Statement inside a function body: `return`, a nested `let`/`var`/`fun`
 * declaration, or an expression. Access modifiers are not allowed here.
 */
Parser.prototype.parseStatement = function (this: Parser): StatementNode {
  const token = current(this.state);

  if (isAccessKeyword(token)) {
    throw errorAt(token, 'STRATA-P001');
  }

  switch (keywordOf(token)) {
    case KEYWORDS.RETURN: {
      advance(this.state);
      if (
        check(
          this.state,
          TOKEN_TYPES.SEMICOLON,
          TOKEN_TYPES.RBRACE,
          TOKEN_TYPES.EOF
        )
      ) {
        return { type: 'ReturnStatement', expression: null, span: token.span };
      }
      const expression = this.parseExpression(LOWEST_BINDING_POWER);
      return {
        type: 'ReturnStatement',
        expression,
        span: makeSpan(token.span.start, expression.span.end),
      };
    }

    case KEYWORDS.LET:
    case KEYWORDS.VAR:
      return this.parseVariableDeclaration(ACCESS.NOT_SPECIFIED, null);

    case KEYWORDS.FUN:
      return this.parseFunctionDeclaration(ACCESS.NOT_SPECIFIED, null);

    default: {
      const expression = this.parseExpression(LOWEST_BINDING_POWER);
      return {
        type: 'ExpressionStatement',
        expression,
        span: expression.span,
      };
    }
  }
};
