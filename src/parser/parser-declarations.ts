/**
 * Parser Extension: Declaration Parsing
 * Declaration list, access modifiers, variable and event declarations
 */

import { Parser } from './parser.js';
import type {
  Access,
  CompositeDeclarationNode,
  DeclarationNode,
  Identifier,
  SecondTransferNode,
  SourceLocation,
  SpecialFunctionDeclarationNode,
  TokenType,
  Transfer,
  TypeAnnotationNode,
  VariableDeclarationNode,
} from '../types.js';
import { ACCESS, KEYWORDS, TOKEN_TYPES, keywordOf, makeSpan } from '../types.js';
import {
  advance,
  check,
  current,
  describeToken,
  errorAt,
  expect,
} from './state.js';
import {
  ACCESS_BY_KEYWORD,
  TRANSFER_BY_TOKEN,
  isAccessKeyword,
  tokenToIdentifier,
} from './helpers.js';
import { LOWEST_BINDING_POWER } from './parser-expr.js';

// Declaration merging to add methods to Parser interface
declare module './parser.js' {
  interface Parser {
    parseProgram(): DeclarationNode[];
    parseDeclarations(endTokenType: TokenType): DeclarationNode[];
    parseDeclaration(): DeclarationNode | null;
    parseAccess(): Access;
    parseDeclarationIdentifier(declarationKind: string): Identifier;
    parseVariableDeclaration(
      access: Access,
      accessStart: SourceLocation | null
    ): VariableDeclarationNode;
    parseTransfer(): Transfer | null;
    parseEventDeclaration(
      access: Access,
      accessStart: SourceLocation | null
    ): CompositeDeclarationNode;
  }
}

// ============================================================
// DECLARATION LIST
// ============================================================

/**
 * Parse a whole token stream. Anything left once the declaration list
 * stops is an error: top-level code consists of declarations only.
 */
Parser.prototype.parseProgram = function (this: Parser): DeclarationNode[] {
  const declarations = this.parseDeclarations(TOKEN_TYPES.EOF);

  const token = current(this.state);
  if (token.type !== TOKEN_TYPES.EOF) {
    throw errorAt(token, 'STRATA-P012', { actual: describeToken(token) });
  }

  return declarations;
};

/**
 * Parse declarations until `endTokenType`, end of input, or a token that
 * does not start a declaration. Semicolons between declarations are
 * skipped. The stopping token is not consumed.
 */
Parser.prototype.parseDeclarations = function (
  this: Parser,
  endTokenType: TokenType
): DeclarationNode[] {
  const declarations: DeclarationNode[] = [];

  while (true) {
    const token = current(this.state);

    if (token.type === TOKEN_TYPES.SEMICOLON) {
      advance(this.state);
      continue;
    }

    if (token.type === endTokenType || token.type === TOKEN_TYPES.EOF) {
      return declarations;
    }

    const declaration = this.parseDeclaration();
    if (declaration === null) {
      return declarations;
    }

    declarations.push(declaration);
  }
};

/**
 * Parse one declaration, including at most one access modifier in front of
 * it. Returns null, consuming nothing, when the current token does not
 * start a declaration.
 */
Parser.prototype.parseDeclaration = function (
  this: Parser
): DeclarationNode | null {
  let access: Access = ACCESS.NOT_SPECIFIED;
  let accessStart: SourceLocation | null = null;

  while (true) {
    const token = current(this.state);

    switch (keywordOf(token)) {
      case KEYWORDS.LET:
      case KEYWORDS.VAR:
        return this.parseVariableDeclaration(access, accessStart);

      case KEYWORDS.FUN:
        return this.parseFunctionDeclaration(access, accessStart);

      case KEYWORDS.IMPORT:
        return this.parseImportDeclaration();

      case KEYWORDS.EVENT:
        return this.parseEventDeclaration(access, accessStart);
    }

    if (!isAccessKeyword(token)) {
      if (accessStart !== null) {
        throw errorAt(token, 'STRATA-P014', { actual: describeToken(token) });
      }
      return null;
    }

    if (accessStart !== null) {
      throw errorAt(token, 'STRATA-P001');
    }

    accessStart = token.span.start;
    access = this.parseAccess();
  }
};

// ============================================================
// ACCESS MODIFIERS
// ============================================================

/**
 * Parse an access modifier.
 *
 * ```
 * access : 'priv'
 *        | 'pub' ( '(' 'set' ')' )?
 *        | 'access' '(' ( 'all' | 'account' | 'contract' | 'self' ) ')'
 * ```
 */
Parser.prototype.parseAccess = function (this: Parser): Access {
  const token = current(this.state);

  switch (keywordOf(token)) {
    case KEYWORDS.PRIV:
      advance(this.state);
      return ACCESS.PRIVATE;

    case KEYWORDS.PUB: {
      advance(this.state);
      if (!check(this.state, TOKEN_TYPES.LPAREN)) {
        return ACCESS.PUBLIC;
      }
      advance(this.state);

      const setToken = current(this.state);
      if (keywordOf(setToken) !== KEYWORDS.SET) {
        throw errorAt(setToken, 'STRATA-P002', {
          actual: describeToken(setToken),
        });
      }
      advance(this.state);

      expect(this.state, TOKEN_TYPES.RPAREN);
      return ACCESS.PUBLIC_SETTABLE;
    }

    case KEYWORDS.ACCESS: {
      advance(this.state);
      expect(this.state, TOKEN_TYPES.LPAREN);

      const keywordToken = current(this.state);
      const keyword = keywordOf(keywordToken);
      const access = keyword === null ? undefined : ACCESS_BY_KEYWORD.get(keyword);
      if (access === undefined) {
        throw errorAt(keywordToken, 'STRATA-P003', {
          actual: describeToken(keywordToken),
        });
      }
      advance(this.state);

      expect(this.state, TOKEN_TYPES.RPAREN);
      return access;
    }

    default:
      throw errorAt(token, 'STRATA-I001', {
        detail: `access modifier parsed at ${describeToken(token)}`,
      });
  }
};

// ============================================================
// VARIABLE DECLARATIONS
// ============================================================

/** Name following a declaration keyword */
Parser.prototype.parseDeclarationIdentifier = function (
  this: Parser,
  declarationKind: string
): Identifier {
  const token = current(this.state);
  if (token.type !== TOKEN_TYPES.IDENTIFIER) {
    throw errorAt(token, 'STRATA-P005', {
      declarationKind,
      actual: describeToken(token),
    });
  }
  advance(this.state);
  return tokenToIdentifier(token);
};

/**
 * Parse a variable declaration.
 *
 * ```
 * variableDeclaration :
 *     ( 'let' | 'var' ) identifier ( ':' typeAnnotation )?
 *     transfer expression
 *     ( transfer expression )?
 * ```
 *
 * The optional second pair is kept as written.
 */
Parser.prototype.parseVariableDeclaration = function (
  this: Parser,
  access: Access,
  accessStart: SourceLocation | null
): VariableDeclarationNode {
  const keywordToken = advance(this.state);
  const start = accessStart ?? keywordToken.span.start;
  const isConstant = keywordOf(keywordToken) === KEYWORDS.LET;

  const identifier = this.parseDeclarationIdentifier('variable');

  let typeAnnotation: TypeAnnotationNode | null = null;
  if (check(this.state, TOKEN_TYPES.COLON)) {
    advance(this.state);
    typeAnnotation = this.parseTypeAnnotation();
  }

  const transfer = this.parseTransfer();
  if (transfer === null) {
    const token = current(this.state);
    throw errorAt(token, 'STRATA-P006', { actual: describeToken(token) });
  }

  const value = this.parseExpression(LOWEST_BINDING_POWER);
  let end = value.span.end;

  let second: SecondTransferNode | null = null;
  const secondTransfer = this.parseTransfer();
  if (secondTransfer !== null) {
    const secondValue = this.parseExpression(LOWEST_BINDING_POWER);
    second = { transfer: secondTransfer, value: secondValue };
    end = secondValue.span.end;
  }

  return {
    type: 'VariableDeclaration',
    access,
    isConstant,
    identifier,
    typeAnnotation,
    transfer,
    value,
    second,
    span: makeSpan(start, end),
  };
};

/**
 * Parse a transfer operator: `=`, `<-` or `<-!`.
 * Returns null without consuming anything on any other token.
 */
Parser.prototype.parseTransfer = function (this: Parser): Transfer | null {
  const token = current(this.state);
  const operation = TRANSFER_BY_TOKEN[token.type];
  if (operation === undefined) {
    return null;
  }

  advance(this.state);
  return { operation, span: token.span };
};

// ============================================================
// EVENT DECLARATIONS
// ============================================================

/**
 * Parse an event declaration.
 *
 * ```
 * eventDeclaration : 'event' identifier parameterList
 * ```
 *
 * An event is a composite of kind Event whose only member is an
 * initializer taking the declared parameters.
 */
Parser.prototype.parseEventDeclaration = function (
  this: Parser,
  access: Access,
  accessStart: SourceLocation | null
): CompositeDeclarationNode {
  const keywordToken = advance(this.state);
  const start = accessStart ?? keywordToken.span.start;

  const identifier = this.parseDeclarationIdentifier('event');
  const parameterList = this.parseParameterList();

  const initializer: SpecialFunctionDeclarationNode = {
    type: 'SpecialFunctionDeclaration',
    declarationKind: 'Initializer',
    parameterList,
    functionBlock: null,
    span: parameterList.span,
  };

  return {
    type: 'CompositeDeclaration',
    access,
    compositeKind: 'Event',
    identifier,
    members: { specialFunctions: [initializer] },
    span: makeSpan(start, parameterList.span.end),
  };
};
