/**
 * Error Registry
 * Central error definition registry with template rendering.
 */

// ============================================================
// ERROR CATEGORIES AND SEVERITY
// ============================================================

/**
 * Error category determining error ID prefix.
 * - lexer (L): malformed source text, fatal
 * - parse (P): grammar violation, fatal
 * - internal (I): a trusted collaborator broke its contract, fatal
 * - literal (W): recoverable literal decoding issue, reported as a diagnostic
 */
export type ErrorCategory = 'lexer' | 'parse' | 'internal' | 'literal';

/** Error severity level */
export type ErrorSeverity = 'error' | 'warning';

/** Error registry entry containing all metadata for a single error condition */
export interface ErrorDefinition {
  /** Format: STRATA-{category letter}{3-digit} (e.g., STRATA-P001) */
  readonly errorId: string;
  readonly category: ErrorCategory;
  /** Severity level (defaults to 'error' when omitted) */
  readonly severity?: ErrorSeverity | undefined;
  /** Human-readable description (max 50 characters) */
  readonly description: string;
  /** Message template with {placeholder} syntax */
  readonly messageTemplate: string;
  /** What causes this error */
  readonly cause?: string | undefined;
}

// ============================================================
// ERROR REGISTRY
// ============================================================

/**
 * Registry of error definitions with O(1) lookup.
 * Immutable after initialization.
 */
export interface ErrorRegistry {
  get(errorId: string): ErrorDefinition | undefined;
  has(errorId: string): boolean;
  readonly size: number;
  entries(): IterableIterator<[string, ErrorDefinition]>;
}

class ErrorRegistryImpl implements ErrorRegistry {
  private readonly byId: ReadonlyMap<string, ErrorDefinition>;

  constructor(definitions: ErrorDefinition[]) {
    const idMap = new Map<string, ErrorDefinition>();

    for (const def of definitions) {
      if (idMap.has(def.errorId)) {
        throw new TypeError(`Duplicate error ID: ${def.errorId}`);
      }
      idMap.set(def.errorId, def);
    }

    this.byId = idMap;
  }

  get(errorId: string): ErrorDefinition | undefined {
    return this.byId.get(errorId);
  }

  has(errorId: string): boolean {
    return this.byId.has(errorId);
  }

  get size(): number {
    return this.byId.size;
  }

  entries(): IterableIterator<[string, ErrorDefinition]> {
    return this.byId.entries();
  }
}

const ERROR_DEFINITIONS: ErrorDefinition[] = [
  // Lexer Errors (STRATA-L0xx)
  {
    errorId: 'STRATA-L001',
    category: 'lexer',
    description: 'Unterminated string literal',
    messageTemplate: 'Unterminated string literal',
    cause:
      'String opened with a quote but not closed before the end of the line or file.',
  },
  {
    errorId: 'STRATA-L002',
    category: 'lexer',
    description: 'Invalid character',
    messageTemplate: 'Unexpected character: {char}',
    cause: 'Character is not part of Strata syntax.',
  },
  {
    errorId: 'STRATA-L003',
    category: 'lexer',
    description: 'Unterminated block comment',
    messageTemplate: 'Unterminated block comment',
    cause: 'A /* comment was opened but never closed with */.',
  },
  {
    errorId: 'STRATA-L004',
    category: 'lexer',
    description: 'Invalid digit in integer literal',
    messageTemplate: 'Invalid digit {digit} in {kind} literal',
    cause:
      'Prefixed integer literal contains a letter or digit outside its base.',
  },

  // Parse Errors (STRATA-P0xx)
  {
    errorId: 'STRATA-P001',
    category: 'parse',
    description: 'Duplicate access modifier',
    messageTemplate: 'unexpected access modifier',
    cause: 'Only one access modifier may prefix a declaration.',
  },
  {
    errorId: 'STRATA-P002',
    category: 'parse',
    description: 'Invalid pub modifier argument',
    messageTemplate: 'expected keyword "set", got {actual}',
    cause: 'pub(...) only accepts the keyword set.',
  },
  {
    errorId: 'STRATA-P003',
    category: 'parse',
    description: 'Invalid access modifier argument',
    messageTemplate:
      'expected keyword "all", "account", "contract", or "self", got {actual}',
    cause: 'access(...) only accepts all, account, contract, or self.',
  },
  {
    errorId: 'STRATA-P004',
    category: 'parse',
    description: 'Unexpected token',
    messageTemplate: 'expected {expected}, got {actual}',
  },
  {
    errorId: 'STRATA-P005',
    category: 'parse',
    description: 'Missing declaration name',
    messageTemplate:
      'expected identifier after start of {declarationKind} declaration, got {actual}',
  },
  {
    errorId: 'STRATA-P006',
    category: 'parse',
    description: 'Missing transfer operator',
    messageTemplate: 'expected transfer, got {actual}',
    cause: 'Variable declarations require =, <-, or <-! before the value.',
  },
  {
    errorId: 'STRATA-P007',
    category: 'parse',
    description: 'Unexpected token in import',
    messageTemplate:
      'unexpected token in import declaration: got {actual}, expected {expected}',
  },
  {
    errorId: 'STRATA-P008',
    category: 'parse',
    description: 'Unexpected end of import',
    messageTemplate: 'unexpected end in import declaration: expected {expected}',
  },
  {
    errorId: 'STRATA-P009',
    category: 'parse',
    description: 'Unexpected identifier in import',
    messageTemplate:
      'unexpected identifier in import declaration: got {actual}, expected keyword "from"',
  },
  {
    errorId: 'STRATA-P010',
    category: 'parse',
    description: 'Unexpected token in expression',
    messageTemplate: 'unexpected token in expression: got {actual}',
  },
  {
    errorId: 'STRATA-P011',
    category: 'parse',
    description: 'Unexpected token in type',
    messageTemplate: 'unexpected token in type: got {actual}',
  },
  {
    errorId: 'STRATA-P012',
    category: 'parse',
    description: 'Unexpected token at top level',
    messageTemplate: 'unexpected token at top level: got {actual}',
    cause: 'The token does not start a declaration.',
  },
  {
    errorId: 'STRATA-P013',
    category: 'parse',
    description: 'Identifier import location disabled',
    messageTemplate:
      'identifier import locations are not enabled: got {actual}',
    cause:
      'Importing from an identifier location requires the identifierLocations option.',
  },
  {
    errorId: 'STRATA-P014',
    category: 'parse',
    description: 'Dangling access modifier',
    messageTemplate: 'expected declaration after access modifier, got {actual}',
    cause: 'An access modifier must be followed by a declaration keyword.',
  },
  {
    errorId: 'STRATA-P015',
    category: 'parse',
    description: 'Create without invocation',
    messageTemplate: 'expected invocation after keyword "create"',
  },
  {
    errorId: 'STRATA-P016',
    category: 'parse',
    description: 'Integer literal without digits',
    messageTemplate: 'missing digits in {kind} integer literal {literal}',
  },

  // Internal Errors (STRATA-I0xx)
  {
    errorId: 'STRATA-I001',
    category: 'internal',
    description: 'Unreachable code',
    messageTemplate: 'unreachable code reached: {detail}',
  },
  {
    errorId: 'STRATA-I002',
    category: 'internal',
    description: 'Malformed hexadecimal literal',
    messageTemplate: 'invalid hexadecimal literal {literal}',
    cause: 'The lexer produced a hexadecimal token with non-hex digits.',
  },

  // Literal Diagnostics (STRATA-W0xx)
  {
    errorId: 'STRATA-W001',
    category: 'literal',
    severity: 'warning',
    description: 'Incomplete escape sequence',
    messageTemplate: 'incomplete escape sequence',
  },
  {
    errorId: 'STRATA-W002',
    category: 'literal',
    severity: 'warning',
    description: 'Invalid escape character',
    messageTemplate: 'invalid escape character {character}',
  },
  {
    errorId: 'STRATA-W003',
    category: 'literal',
    severity: 'warning',
    description: 'Incomplete unicode escape',
    messageTemplate: 'incomplete unicode escape sequence',
  },
  {
    errorId: 'STRATA-W004',
    category: 'literal',
    severity: 'warning',
    description: 'Invalid unicode escape',
    messageTemplate: 'invalid unicode escape sequence {sequence}',
  },
  {
    errorId: 'STRATA-W005',
    category: 'literal',
    severity: 'warning',
    description: 'Missing quote in string literal',
    messageTemplate: 'missing {position} quote in string literal',
  },
];

export const ERROR_REGISTRY: ErrorRegistry = new ErrorRegistryImpl(
  ERROR_DEFINITIONS
);

// ============================================================
// TEMPLATE RENDERING
// ============================================================

/**
 * Render a message template by replacing {placeholder}s with context values.
 *
 * Missing values render as the empty string. An unclosed brace returns the
 * template unchanged.
 *
 * @example
 * renderMessage('expected {expected}, got {actual}', { expected: "')'", actual: 'end of input' })
 * // "expected ')', got end of input"
 */
export function renderMessage(
  template: string,
  context: Record<string, unknown>
): string {
  let result = '';
  let i = 0;

  while (i < template.length) {
    const char = template.charAt(i);

    if (char === '{') {
      const end = template.indexOf('}', i + 1);
      if (end === -1) {
        return template;
      }

      const value = context[template.slice(i + 1, end)];
      if (value !== undefined) {
        result += String(value);
      }

      i = end + 1;
      continue;
    }

    result += char;
    i++;
  }

  return result;
}
