/**
 * Configuration Loader for strata-parse
 * Loads and validates .strata-parse.json configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

// ============================================================
// TYPES
// ============================================================

export type OutputFormat = 'json' | 'yaml' | 'text';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'yaml', 'text'];

export interface ParseConfig {
  /** Accept identifiers as import locations after `from` */
  readonly identifierLocations: boolean;
  readonly format: OutputFormat;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.strata-parse.json';

const KNOWN_KEYS = new Set(['identifierLocations', 'format']);

export function createDefaultConfig(): ParseConfig {
  return { identifierLocations: false, format: 'json' };
}

// ============================================================
// VALIDATION
// ============================================================

export function isOutputFormat(value: unknown): value is OutputFormat {
  return value === 'json' || value === 'yaml' || value === 'text';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate configuration structure and values.
 * Throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): asserts data is {
  identifierLocations?: boolean;
  format?: OutputFormat;
} {
  if (!isRecord(data)) {
    throw new Error('Invalid configuration: must be an object');
  }

  for (const key of Object.keys(data)) {
    if (!KNOWN_KEYS.has(key)) {
      throw new Error(`Invalid configuration: unknown option ${key}`);
    }
  }

  if (
    'identifierLocations' in data &&
    typeof data['identifierLocations'] !== 'boolean'
  ) {
    throw new Error(
      'Invalid configuration: identifierLocations must be a boolean'
    );
  }

  if ('format' in data && !isOutputFormat(data['format'])) {
    throw new Error(
      `Invalid configuration: format has invalid value "${String(data['format'])}" (must be 'json', 'yaml', or 'text')`
    );
  }
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .strata-parse.json in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns Configuration merged over defaults, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" on unreadable or invalid files
 */
export function loadConfig(cwd: string): ParseConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = JSON.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid JSON (${err instanceof Error ? err.message : String(err)})`
    );
  }

  validateConfig(parsedData);

  const defaults = createDefaultConfig();
  return {
    identifierLocations:
      parsedData.identifierLocations ?? defaults.identifierLocations,
    format: parsedData.format ?? defaults.format,
  };
}
