/**
 * Test Helpers: Parsing
 * Narrowing accessors and span builders shared by parser tests
 */

import { parseDeclarations } from '../../src/index.js';
import type {
  CompositeDeclarationNode,
  DeclarationNode,
  ExpressionNode,
  FunctionDeclarationNode,
  ImportDeclarationNode,
  ParserOptions,
  SourceSpan,
  StrataError,
  VariableDeclarationNode,
} from '../../src/index.js';

/**
 * Span on the first line, from offset `start` to `end`.
 * Columns are 1-based, so column = offset + 1.
 */
export function span(start: number, end: number): SourceSpan {
  return {
    start: { line: 1, column: start + 1, offset: start },
    end: { line: 1, column: end + 1, offset: end },
  };
}

/** Parse source that must succeed and return its declarations */
export function declarations(
  source: string,
  options?: ParserOptions
): DeclarationNode[] {
  const result = parseDeclarations(source, options);
  if (!result.success) {
    throw new Error(`Unexpected parse failure: ${result.error.message}`);
  }
  return result.declarations;
}

/** Parse source holding exactly one declaration */
export function single(
  source: string,
  options?: ParserOptions
): DeclarationNode {
  const [declaration, ...rest] = declarations(source, options);
  if (!declaration || rest.length > 0) {
    throw new Error(`Expected one declaration in: ${source}`);
  }
  return declaration;
}

/** Parse source that must fail and return the error */
export function failure(source: string, options?: ParserOptions): StrataError {
  const result = parseDeclarations(source, options);
  if (result.success) {
    throw new Error(`Expected parse failure for: ${source}`);
  }
  return result.error;
}

export function variable(source: string): VariableDeclarationNode {
  const declaration = single(source);
  if (declaration.type !== 'VariableDeclaration') {
    throw new Error(`Expected VariableDeclaration, got ${declaration.type}`);
  }
  return declaration;
}

/** Value expression of `let x = <source>` */
export function expression(source: string): ExpressionNode {
  return variable(`let x = ${source}`).value;
}

export function importDeclaration(
  source: string,
  options?: ParserOptions
): ImportDeclarationNode {
  const declaration = single(source, options);
  if (declaration.type !== 'ImportDeclaration') {
    throw new Error(`Expected ImportDeclaration, got ${declaration.type}`);
  }
  return declaration;
}

export function composite(source: string): CompositeDeclarationNode {
  const declaration = single(source);
  if (declaration.type !== 'CompositeDeclaration') {
    throw new Error(`Expected CompositeDeclaration, got ${declaration.type}`);
  }
  return declaration;
}

export function fun(source: string): FunctionDeclarationNode {
  const declaration = single(source);
  if (declaration.type !== 'FunctionDeclaration') {
    throw new Error(`Expected FunctionDeclaration, got ${declaration.type}`);
  }
  return declaration;
}

/** Run `fn` and return what it throws */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('Expected function to throw');
}
