/**
 * Strata Error Classes and Factory
 * Structured error types with registry-based error codes
 */

import type { SourceLocation, SourceSpan } from './source-location.js';
import { formatLocation } from './source-location.js';
import type { ErrorCategory } from './error-registry.js';
import { ERROR_REGISTRY, renderMessage } from './error-registry.js';

// ============================================================
// ERROR DATA
// ============================================================

/** Structured error data for host applications */
export interface StrataErrorData {
  readonly errorId: string;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  /** Suggested fix, rendered after the location */
  readonly hint?: string | undefined;
}

/** Look up an error ID and verify it belongs to the expected category */
function requireCategory(errorId: string, category: ErrorCategory): void {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }
  if (definition.category !== category) {
    throw new TypeError(`Expected ${category} error ID, got: ${errorId}`);
  }
}

// ============================================================
// BASE ERROR CLASS
// ============================================================

/**
 * Base error class for all fatal Strata errors.
 * Provides structured data for host applications to format as needed.
 */
export class StrataError extends Error {
  readonly errorId: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
  readonly hint?: string | undefined;
  private readonly baseMessage: string;

  constructor(data: StrataErrorData) {
    if (!ERROR_REGISTRY.has(data.errorId)) {
      throw new TypeError(`Unknown error ID: ${data.errorId}`);
    }

    const locationStr = data.location
      ? ` at ${formatLocation(data.location)}`
      : '';
    const hintStr = data.hint ? `. Hint: ${data.hint}` : '';
    super(`${data.message}${locationStr}${hintStr}`);
    this.name = 'StrataError';
    this.errorId = data.errorId;
    this.location = data.location;
    this.context = data.context;
    this.hint = data.hint;
    this.baseMessage = data.message;
  }

  /** Get structured error data for custom formatting */
  toData(): StrataErrorData {
    return {
      errorId: this.errorId,
      message: this.baseMessage,
      location: this.location,
      context: this.context,
      ...(this.hint ? { hint: this.hint } : {}),
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: StrataErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

// ============================================================
// SPECIALIZED ERROR CLASSES
// ============================================================

/** Malformed source text found while tokenizing */
export class LexerError extends StrataError {
  // Lexer errors always have a location
  override readonly location: SourceLocation;

  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'lexer');
    super({ errorId, message, location, context });
    this.name = 'LexerError';
    this.location = location;
  }
}

/** Grammar violations */
export class ParseError extends StrataError {
  constructor(
    errorId: string,
    message: string,
    location: SourceLocation,
    context?: Record<string, unknown>,
    hint?: string
  ) {
    requireCategory(errorId, 'parse');
    super({ errorId, message, location, context, hint });
    this.name = 'ParseError';
  }
}

/**
 * Broken contract of a trusted collaborator, such as the lexer handing the
 * parser a hexadecimal literal it cannot decode. Signals a bug rather than a
 * user syntax error.
 */
export class InternalError extends StrataError {
  constructor(
    errorId: string,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    requireCategory(errorId, 'internal');
    super({ errorId, message, location, context });
    this.name = 'InternalError';
  }
}

// ============================================================
// ERROR FACTORY
// ============================================================

/**
 * Create a fatal error from the registry, rendering its message template.
 *
 * The concrete class follows the definition's category.
 *
 * @throws TypeError if errorId is unknown or names a literal diagnostic
 *
 * @example
 * createError('STRATA-P004', { expected: "')'", actual: 'end of input' }, location)
 * // ParseError: "expected ')', got end of input at 1:9"
 */
export function createError(
  errorId: string,
  context: Record<string, unknown>,
  location: SourceLocation
): StrataError {
  const definition = ERROR_REGISTRY.get(errorId);
  if (!definition) {
    throw new TypeError(`Unknown error ID: ${errorId}`);
  }

  const message = renderMessage(definition.messageTemplate, context);

  switch (definition.category) {
    case 'lexer':
      return new LexerError(errorId, message, location, context);
    case 'parse':
      return new ParseError(errorId, message, location, context);
    case 'internal':
      return new InternalError(errorId, message, location, context);
    case 'literal':
      throw new TypeError(`Error ID ${errorId} is a diagnostic, not an error`);
  }
}

// ============================================================
// SOFT DIAGNOSTICS
// ============================================================

/** Recoverable issue recorded without aborting the parse */
export interface Diagnostic {
  readonly errorId: string;
  readonly severity: 'error' | 'warning';
  readonly message: string;
  readonly span: SourceSpan;
}

/**
 * Create a diagnostic from a literal-category registry entry.
 *
 * @throws TypeError if errorId is unknown or not a literal diagnostic
 */
export function createDiagnostic(
  errorId: string,
  context: Record<string, unknown>,
  span: SourceSpan
): Diagnostic {
  requireCategory(errorId, 'literal');
  const definition = ERROR_REGISTRY.get(errorId);
  return {
    errorId,
    severity: definition?.severity ?? 'error',
    message: renderMessage(definition?.messageTemplate ?? '', context),
    span,
  };
}
