/**
 * Strata Types
 * Central re-export point for source locations, tokens, AST nodes and errors
 */

export * from './source-location.js';
export * from './token-types.js';
export * from './keywords.js';
export * from './ast-nodes.js';
export * from './error-registry.js';
export * from './error-classes.js';

// ============================================================
// PARSE RESULT
// ============================================================

import type { DeclarationNode } from './ast-nodes.js';
import type { Diagnostic, StrataError } from './error-classes.js';

/**
 * Outcome of parsing a declaration sequence.
 *
 * A failed parse carries only the first fatal error: declarations parsed
 * before the failure are not returned.
 */
export type DeclarationParseResult =
  | {
      readonly success: true;
      readonly declarations: DeclarationNode[];
      readonly diagnostics: Diagnostic[];
    }
  | {
      readonly success: false;
      readonly error: StrataError;
      readonly diagnostics: Diagnostic[];
    };

/** Options accepted by the parse entry points */
export interface ParserOptions {
  /**
   * Accept an identifier as the location after `from`
   * (`import a from Foo`). Disabled by default. A lone identifier
   * (`import Foo`) is always its own location.
   */
  identifierLocations?: boolean | undefined;
}
