/**
 * Strata Parser
 * Main entry point and re-exports
 */

import { tokenize } from '../lexer/index.js';
import type {
  DeclarationNode,
  DeclarationParseResult,
  Diagnostic,
  ParserOptions,
} from '../types.js';
import { StrataError } from '../types.js';
import { Parser } from './parser.js';

// Import extension modules to register prototype methods on Parser.
// These must be imported AFTER parser.js to ensure the class is defined.
import './parser-declarations.js';
import './parser-imports.js';
import './parser-functions.js';
import './parser-expr.js';
import './parser-types.js';
import './parser-literals.js';

// ============================================================
// MAIN ENTRY POINTS
// ============================================================

/**
 * Parse Strata source into its declarations.
 *
 * Throws the first LexerError, ParseError or InternalError. Soft
 * diagnostics are dropped; use {@link parseDeclarations} to receive them.
 *
 * @example
 * ```typescript
 * const [declaration] = parse('let x = 1');
 * ```
 */
export function parse(
  source: string,
  options?: ParserOptions
): DeclarationNode[] {
  return new Parser(tokenize(source), options).parse();
}

/**
 * Parse Strata source, reporting failure as a value.
 *
 * A failed parse carries the first fatal error and no declarations.
 * Errors that are not StrataErrors are bugs and propagate.
 *
 * @example
 * ```typescript
 * const result = parseDeclarations(source);
 * if (!result.success) {
 *   console.error(result.error.message);
 * }
 * ```
 */
export function parseDeclarations(
  source: string,
  options?: ParserOptions
): DeclarationParseResult {
  let diagnostics: Diagnostic[] = [];

  try {
    const parser = new Parser(tokenize(source), options);
    diagnostics = parser.diagnostics;
    const declarations = parser.parse();
    return { success: true, declarations, diagnostics };
  } catch (error) {
    if (error instanceof StrataError) {
      return { success: false, error, diagnostics };
    }
    throw error;
  }
}

// ============================================================
// RE-EXPORTS
// ============================================================

// State (for advanced usage)
export { createParserState, type ParserState } from './state.js';

// Parser class (for advanced usage)
export { Parser } from './parser.js';

// Literal decoders (for tooling)
export { decodeStringLiteral, type DecodedString } from './parser-literals.js';
export { decodeHexadecimalLocation } from './parser-imports.js';
export { LOWEST_BINDING_POWER } from './parser-expr.js';
