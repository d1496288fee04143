#!/usr/bin/env node
/**
 * CLI Parse Entry Point
 *
 * Implements argument parsing for strata-parse.
 * Parses a Strata source file and prints its declarations.
 */

import { readFileSync, statSync } from 'node:fs';
import { resolve } from 'node:path';
import * as yaml from 'yaml';
import type { Access, DeclarationNode, ParameterListNode } from './types.js';
import { ACCESS, TOKEN_TYPES, formatLocation } from './types.js';
import { tokenize } from './lexer/index.js';
import { parseDeclarations } from './parser/index.js';
import {
  type OutputFormat,
  type ParseConfig,
  createDefaultConfig,
  isOutputFormat,
  loadConfig,
} from './config.js';
import {
  VERSION,
  formatDiagnostic,
  formatError,
  formatImportLocation,
  toPlainData,
} from './cli-shared.js';

/**
 * Parsed command-line arguments for strata-parse
 */
export type ParsedParseArgs =
  | {
      mode: 'parse';
      file: string;
      /** Undefined when --format was not given */
      format: OutputFormat | undefined;
      identifierLocations: boolean;
      verbose: boolean;
    }
  | { mode: 'help' }
  | { mode: 'version' };

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE: 1,
  FILE_NOT_FOUND: 2,
  PARSE_FAILURE: 3,
} as const;

const HELP_TEXT = `strata-parse - Parse Strata declarations

Usage: strata-parse [options] <file>

Options:
  --format <fmt>            Output format: json (default), yaml, or text
  --identifier-locations    Accept identifiers after 'from' as import locations
  --verbose                 Report token and declaration counts on stderr
  -h, --help                Show this help message
  -v, --version             Show version number`;

/**
 * Parse command-line arguments for strata-parse
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseParseArgs(argv: string[]): ParsedParseArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const identifierLocations = argv.includes('--identifier-locations');
  const verbose = argv.includes('--verbose');

  let format: OutputFormat | undefined;
  const formatIndex = argv.indexOf('--format');
  if (formatIndex !== -1) {
    const formatValue = argv[formatIndex + 1];
    if (isOutputFormat(formatValue)) {
      format = formatValue;
    } else if (!formatValue || formatValue.startsWith('-')) {
      throw new Error('--format requires argument: json, yaml, or text');
    } else {
      throw new Error(
        `Invalid format: ${formatValue}. Expected json, yaml, or text`
      );
    }
  }

  const knownFlags = new Set([
    '--help',
    '-h',
    '--version',
    '-v',
    '--format',
    '--identifier-locations',
    '--verbose',
  ]);

  let file: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;

    if (arg.startsWith('-')) {
      if (!knownFlags.has(arg)) {
        throw new Error(`Unknown option: ${arg}`);
      }
      if (arg === '--format') {
        i++; // Skip the format value
      }
      continue;
    }

    // First non-flag argument is the file
    if (file === undefined) {
      file = arg;
    }
  }

  if (!file) {
    throw new Error('Missing file argument');
  }

  return { mode: 'parse', file, format, identifierLocations, verbose };
}

// ============================================================
// OUTPUT FORMATTING
// ============================================================

function formatParameters(parameterList: ParameterListNode): string {
  return parameterList.parameters.map((p) => p.identifier.name).join(', ');
}

/**
 * One-line summary of a declaration
 * Pattern: line:col: declaration (access)
 */
export function summarizeDeclaration(declaration: DeclarationNode): string {
  const where = formatLocation(declaration.span.start);

  switch (declaration.type) {
    case 'VariableDeclaration': {
      const keyword = declaration.isConstant ? 'let' : 'var';
      return `${where}: ${keyword} ${declaration.identifier.name}${formatAccess(declaration.access)}`;
    }
    case 'FunctionDeclaration':
      return `${where}: fun ${declaration.identifier.name}(${formatParameters(declaration.parameterList)})${formatAccess(declaration.access)}`;
    case 'CompositeDeclaration': {
      const initializer = declaration.members.specialFunctions[0];
      const parameters = initializer
        ? formatParameters(initializer.parameterList)
        : '';
      return `${where}: event ${declaration.identifier.name}(${parameters})${formatAccess(declaration.access)}`;
    }
    case 'ImportDeclaration': {
      const location = formatImportLocation(declaration.location);
      if (declaration.identifiers.length === 0) {
        return `${where}: import ${location}`;
      }
      const names = declaration.identifiers.map((id) => id.name).join(', ');
      return `${where}: import ${names} from ${location}`;
    }
  }
}

function formatAccess(access: Access): string {
  return access === ACCESS.NOT_SPECIFIED ? '' : ` (${access})`;
}

/**
 * Render declarations in the requested output format
 */
export function formatDeclarations(
  declarations: DeclarationNode[],
  format: OutputFormat
): string {
  switch (format) {
    case 'json':
      return JSON.stringify(toPlainData(declarations), null, 2);
    case 'yaml':
      return yaml.stringify(toPlainData(declarations)).trimEnd();
    case 'text':
      return declarations.map(summarizeDeclaration).join('\n');
  }
}

// ============================================================
// RUNNER
// ============================================================

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Output channels and working directory of one CLI run */
export interface CliIO {
  readonly cwd: string;
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
}

/**
 * Run strata-parse against argv and return the exit code.
 * All output goes through `io`.
 */
export function runParse(argv: string[], io: CliIO): number {
  let args: ParsedParseArgs;
  try {
    args = parseParseArgs(argv);
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}`);
    return EXIT_CODES.USAGE;
  }

  if (args.mode === 'help') {
    io.stdout(HELP_TEXT);
    return EXIT_CODES.SUCCESS;
  }

  if (args.mode === 'version') {
    io.stdout(VERSION);
    return EXIT_CODES.SUCCESS;
  }

  // Flags override the configuration file
  let defaults: ParseConfig;
  try {
    defaults = loadConfig(io.cwd) ?? createDefaultConfig();
  } catch (err) {
    io.stderr(`Error: ${errorMessage(err)}`);
    return EXIT_CODES.USAGE;
  }

  const path = resolve(io.cwd, args.file);
  let source: string;
  try {
    if (statSync(path).isDirectory()) {
      io.stderr(`Error: Path is a directory: ${args.file}`);
      return EXIT_CODES.FILE_NOT_FOUND;
    }
    source = readFileSync(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      io.stderr(`Error: File not found: ${args.file}`);
    } else {
      io.stderr(`Error: Cannot read file: ${args.file}`);
    }
    return EXIT_CODES.FILE_NOT_FOUND;
  }

  const result = parseDeclarations(source, {
    identifierLocations: args.identifierLocations || defaults.identifierLocations,
  });

  for (const diagnostic of result.diagnostics) {
    io.stderr(formatDiagnostic(args.file, diagnostic));
  }

  if (!result.success) {
    io.stderr(`${args.file}: ${formatError(result.error)}`);
    return EXIT_CODES.PARSE_FAILURE;
  }

  if (args.verbose) {
    const tokenCount = tokenize(source).filter(
      (token) => token.type !== TOKEN_TYPES.EOF
    ).length;
    io.stderr(
      `Parsed ${result.declarations.length} declarations from ${tokenCount} tokens`
    );
  }

  const output = formatDeclarations(
    result.declarations,
    args.format ?? defaults.format
  );
  if (output !== '') {
    io.stdout(output);
  }
  return EXIT_CODES.SUCCESS;
}

// ============================================================
// MAIN ENTRY POINT
// ============================================================

function main(): void {
  process.exitCode = runParse(process.argv.slice(2), {
    cwd: process.cwd(),
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
}

// Only run main if this is the entry point (not imported)
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main();
}
