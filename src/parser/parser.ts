/**
 * Parser Class - Core
 *
 * Defines the Parser class structure. Methods are added via prototype
 * extension from separate modules, using TypeScript declaration merging
 * for type safety.
 */

import type {
  DeclarationNode,
  Diagnostic,
  ParserOptions,
  Token,
} from '../types.js';
import { type ParserState, createParserState } from './state.js';

/**
 * Parser class that converts tokens into declaration nodes.
 *
 * Methods are organized across multiple files:
 * - parser-declarations.ts: Declaration list, access modifiers, variables, events
 * - parser-imports.ts: Import declarations and locations
 * - parser-functions.ts: Parameter lists, function declarations and bodies
 * - parser-expr.ts: Expressions by binding power
 * - parser-types.ts: Type annotations
 * - parser-literals.ts: Integer and string literals
 *
 * One instance parses one token stream; create a new Parser per source.
 *
 * @example
 * ```typescript
 * const parser = new Parser(tokenize(source));
 * const declarations = parser.parse();
 * ```
 */
export class Parser {
  /** Cursor, options and collected diagnostics */
  state: ParserState;

  constructor(tokens: Token[], options?: ParserOptions) {
    this.state = createParserState(tokens, {
      identifierLocations: options?.identifierLocations ?? false,
    });
  }

  /**
   * Parse all tokens as a sequence of declarations.
   * Throws the first fatal error.
   */
  parse(): DeclarationNode[] {
    return this.parseProgram();
  }

  /**
   * Get soft diagnostics recorded so far.
   */
  get diagnostics(): Diagnostic[] {
    return this.state.diagnostics;
  }
}
