/**
 * CLI Shared Utilities
 * Common formatting functions for CLI tools
 */

import type { Diagnostic, Location } from './types.js';
import {
  InternalError,
  LexerError,
  ParseError,
  StrataError,
  formatLocation,
} from './types.js';

/** Package version string */
export const VERSION = '0.1.0';

/**
 * Format error for stderr output
 *
 * @example
 * formatError(err) // 'Parse error at 1:7: expected transfer, got end of input (STRATA-P006)'
 */
export function formatError(err: Error): string {
  if (err instanceof StrataError) {
    const { message, location, hint } = err.toData();
    const where = location ? ` at ${formatLocation(location)}` : '';
    const suggestion = hint ? ` Hint: ${hint}` : '';
    return `${errorKind(err)}${where}: ${message} (${err.errorId})${suggestion}`;
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

function errorKind(err: StrataError): string {
  if (err instanceof LexerError) return 'Lexer error';
  if (err instanceof ParseError) return 'Parse error';
  if (err instanceof InternalError) return 'Internal error';
  return 'Error';
}

/**
 * Format a soft diagnostic
 * Pattern: file:line:col: severity: message (id)
 */
export function formatDiagnostic(file: string, diagnostic: Diagnostic): string {
  const { line, column } = diagnostic.span.start;
  return `${file}:${line}:${column}: ${diagnostic.severity}: ${diagnostic.message} (${diagnostic.errorId})`;
}

/** `0x`-prefixed lowercase hex, two digits per byte */
export function formatAddress(address: Uint8Array): string {
  return `0x${Array.from(address, (byte) => byte.toString(16).padStart(2, '0')).join('')}`;
}

/** Source-like rendering of an import location */
export function formatImportLocation(location: Location): string {
  switch (location.type) {
    case 'StringLocation':
      return JSON.stringify(location.value);
    case 'AddressLocation':
      return formatAddress(location.address);
    case 'IdentifierLocation':
      return location.identifier;
  }
}

/**
 * Convert AST values into data JSON and YAML can represent:
 * bigints become decimal strings, byte arrays become hex strings.
 */
export function toPlainData(value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return formatAddress(value);
  if (Array.isArray(value)) return value.map(toPlainData);
  if (typeof value === 'object' && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, toPlainData(entry)])
    );
  }
  return value;
}
