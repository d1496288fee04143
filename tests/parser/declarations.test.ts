/**
 * Parser Tests: Declarations
 * Declaration list, access modifiers, transfers and variable declarations
 */

import { describe, expect, it } from 'vitest';
import { ACCESS, Parser, tokenize } from '../../src/index.js';
import {
  declarations,
  failure,
  single,
  span,
  variable,
} from '../helpers/parse.js';

describe('Parser: declaration list', () => {
  it('returns no declarations for empty input', () => {
    expect(declarations('')).toEqual([]);
  });

  it('returns declarations in source order', () => {
    const result = declarations('let a = 1; let b = 2');
    expect(result.map((d) => d.type)).toEqual([
      'VariableDeclaration',
      'VariableDeclaration',
    ]);
    expect(result[1]?.span).toEqual(span(11, 20));
  });

  it('skips separating semicolons', () => {
    expect(declarations(';;let a = 1;;')).toHaveLength(1);
  });

  it('spans declarations on later lines', () => {
    const [, second] = declarations('let a = 1\nvar b = 2');
    expect(second?.span).toEqual({
      start: { line: 2, column: 1, offset: 10 },
      end: { line: 2, column: 10, offset: 19 },
    });
  });

  it('rejects tokens that do not start a declaration', () => {
    const err = failure('let a = 1 foo');
    expect(err.errorId).toBe('STRATA-P012');
    expect(err.message).toBe(
      'unexpected token at top level: got identifier "foo" at 1:11'
    );
  });

  it('ignores comments between declarations', () => {
    expect(declarations('let a = 1 // one\n/* two */ let b = 2')).toHaveLength(2);
  });
});

describe('Parser: variable declarations', () => {
  it('ends the span after a parenthesized value', () => {
    const declaration = variable('let x = (1)');
    expect(declaration.value.span).toEqual(span(8, 11));
    expect(declaration.span).toEqual(span(0, 11));
  });

  it('ends the span after a parenthesized second value', () => {
    const declaration = variable('let a <- b <- (c)');
    expect(declaration.second?.value).toEqual({
      type: 'IdentifierExpression',
      identifier: { name: 'c', span: span(15, 16) },
      span: span(14, 17),
    });
    expect(declaration.span).toEqual(span(0, 17));
  });

  it('parses a constant with a type annotation', () => {
    expect(single('let x: Int = 1')).toEqual({
      type: 'VariableDeclaration',
      access: ACCESS.NOT_SPECIFIED,
      isConstant: true,
      identifier: { name: 'x', span: span(4, 5) },
      typeAnnotation: {
        type: 'TypeAnnotation',
        isResource: false,
        annotatedType: {
          type: 'NominalType',
          identifier: { name: 'Int', span: span(7, 10) },
          nestedIdentifiers: [],
          span: span(7, 10),
        },
        span: span(7, 10),
      },
      transfer: { operation: 'Copy', span: span(11, 12) },
      value: {
        type: 'IntegerExpression',
        value: 1n,
        base: 10,
        literal: '1',
        span: span(13, 14),
      },
      second: null,
      span: span(0, 14),
    });
  });

  it('parses a variable moved from a created resource', () => {
    expect(single('var y <- create R()')).toEqual({
      type: 'VariableDeclaration',
      access: ACCESS.NOT_SPECIFIED,
      isConstant: false,
      identifier: { name: 'y', span: span(4, 5) },
      typeAnnotation: null,
      transfer: { operation: 'Move', span: span(6, 8) },
      value: {
        type: 'CreateExpression',
        invocation: {
          type: 'InvocationExpression',
          invokedExpression: {
            type: 'IdentifierExpression',
            identifier: { name: 'R', span: span(16, 17) },
            span: span(16, 17),
          },
          arguments: [],
          span: span(16, 19),
        },
        span: span(9, 19),
      },
      second: null,
      span: span(0, 19),
    });
  });

  it('starts the span at the access modifier', () => {
    const declaration = variable('pub(set) var z = 1');
    expect(declaration.access).toBe(ACCESS.PUBLIC_SETTABLE);
    expect(declaration.identifier).toEqual({ name: 'z', span: span(13, 14) });
    expect(declaration.span).toEqual(span(0, 18));
  });

  it('parses a forced move', () => {
    expect(variable('let a <-! b').transfer).toEqual({
      operation: 'MoveForced',
      span: span(6, 9),
    });
  });

  it('keeps a second transfer and value', () => {
    const declaration = variable('let a <- b <- c');
    expect(declaration.transfer).toEqual({ operation: 'Move', span: span(6, 8) });
    expect(declaration.value).toMatchObject({
      type: 'IdentifierExpression',
      identifier: { name: 'b' },
    });
    expect(declaration.second).toEqual({
      transfer: { operation: 'Move', span: span(11, 13) },
      value: {
        type: 'IdentifierExpression',
        identifier: { name: 'c', span: span(14, 15) },
        span: span(14, 15),
      },
    });
    expect(declaration.span).toEqual(span(0, 15));
  });

  it('requires an identifier', () => {
    const err = failure('let = 1');
    expect(err.errorId).toBe('STRATA-P005');
    expect(err.message).toBe(
      "expected identifier after start of variable declaration, got '=' at 1:5"
    );
  });

  it('requires a transfer', () => {
    const err = failure('let x 1');
    expect(err.errorId).toBe('STRATA-P006');
    expect(err.message).toBe('expected transfer, got decimal integer 1 at 1:7');
  });

  it('requires a transfer before end of input', () => {
    expect(failure('let x').message).toBe(
      'expected transfer, got end of input at 1:6'
    );
  });
});

describe('Parser: access modifiers', () => {
  it.each([
    ['priv let x = 1', ACCESS.PRIVATE],
    ['pub let x = 1', ACCESS.PUBLIC],
    ['pub(set) let x = 1', ACCESS.PUBLIC_SETTABLE],
    ['access(all) let x = 1', ACCESS.PUBLIC],
    ['access(account) let x = 1', ACCESS.ACCOUNT],
    ['access(contract) let x = 1', ACCESS.CONTRACT],
    ['access(self) let x = 1', ACCESS.PRIVATE],
  ])('%s has access %s', (source, access) => {
    const declaration = variable(source);
    expect(declaration.access).toBe(access);
    expect(declaration.span.start.offset).toBe(0);
  });

  it('rejects a second access modifier', () => {
    const err = failure('pub priv let x = 1');
    expect(err.errorId).toBe('STRATA-P001');
    expect(err.message).toBe('unexpected access modifier at 1:5');
  });

  it('requires set inside pub parentheses', () => {
    const err = failure('pub(get) var x = 1');
    expect(err.errorId).toBe('STRATA-P002');
    expect(err.message).toBe(
      'expected keyword "set", got identifier "get" at 1:5'
    );
  });

  it('reports end of input inside pub parentheses', () => {
    expect(failure('pub(').message).toBe(
      'expected keyword "set", got end of input at 1:5'
    );
  });

  it('requires the closing parenthesis after set', () => {
    const err = failure('pub(set var x = 1');
    expect(err.errorId).toBe('STRATA-P004');
    expect(err.message).toBe('expected \')\', got identifier "var" at 1:9');
  });

  it('rejects unknown access keywords', () => {
    const err = failure('access(public) let x = 1');
    expect(err.errorId).toBe('STRATA-P003');
    expect(err.message).toBe(
      'expected keyword "all", "account", "contract", or "self", got identifier "public" at 1:8'
    );
  });

  it('requires parentheses after access', () => {
    expect(failure('access all').message).toBe(
      'expected \'(\', got identifier "all" at 1:8'
    );
  });

  it('requires a declaration after an access modifier', () => {
    const err = failure('pub 1');
    expect(err.errorId).toBe('STRATA-P014');
    expect(err.message).toBe(
      'expected declaration after access modifier, got decimal integer 1 at 1:5'
    );
  });
});

describe('Parser: transfers', () => {
  it.each([
    ['=', 'Copy', 1],
    ['<-', 'Move', 2],
    ['<-!', 'MoveForced', 3],
  ])('%s is %s', (source, operation, length) => {
    const parser = new Parser(tokenize(`${source} x`));
    expect(parser.parseTransfer()).toEqual({
      operation,
      span: span(0, length),
    });
    expect(parser.state.pos).toBe(1);
  });

  it('returns null without consuming other tokens', () => {
    const parser = new Parser(tokenize('x = 1'));
    expect(parser.parseTransfer()).toBeNull();
    expect(parser.state.pos).toBe(0);
  });
});

describe('Parser: parseDeclaration', () => {
  it('returns null without consuming a non-declaration', () => {
    const parser = new Parser(tokenize('foo'));
    expect(parser.parseDeclaration()).toBeNull();
    expect(parser.state.pos).toBe(0);
  });

  it('stops the list at the end token', () => {
    const parser = new Parser(tokenize('let a = 1 } let b = 2'));
    expect(parser.parseDeclarations('RBRACE')).toHaveLength(1);
    expect(parser.state.pos).toBe(4);
  });
});
