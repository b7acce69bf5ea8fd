/**
 * Pool Policy Configuration
 * Defaults for the node pool and the loader for arbor.config.yaml / .json.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import { createError } from '../error-classes.js';

// ============================================================
// TYPES
// ============================================================

export interface IntRangePolicy {
  readonly min: number;
  readonly max: number;
}

export interface EntryCapPolicy {
  readonly maxEntries: number;
}

export interface TextPolicy extends EntryCapPolicy {
  /** Longest value still pooled, inclusive */
  readonly maxLength: number;
}

/** Which values each pool category caches */
export interface PoolPolicy {
  readonly int: IntRangePolicy;
  readonly bool: EntryCapPolicy;
  readonly string: TextPolicy;
  readonly identifier: TextPolicy;
}

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file names, in lookup order */
export const CONFIG_FILE_NAMES = ['arbor.config.yaml', 'arbor.config.json'] as const;

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultPoolPolicy(): PoolPolicy {
  return {
    int: { min: -128, max: 127 },
    bool: { maxEntries: 2 },
    string: { maxLength: 50, maxEntries: 1000 },
    identifier: { maxLength: 30, maxEntries: 500 },
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(
  data: Record<string, unknown>,
  name: string
): Record<string, unknown> | undefined {
  const section = data[name];
  if (section === undefined) {
    return undefined;
  }
  if (!isRecord(section)) {
    throw createError('ARBOR-C002', {
      field: name,
      reason: 'must be an object',
    });
  }
  return section;
}

function readInteger(
  section: Record<string, unknown>,
  path: string,
  key: string,
  fallback: number,
  minimum: number | null
): number {
  const value = section[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw createError('ARBOR-C002', {
      field: `${path}.${key}`,
      reason: 'must be an integer',
    });
  }
  if (minimum !== null && value < minimum) {
    throw createError('ARBOR-C002', {
      field: `${path}.${key}`,
      reason: `must be at least ${minimum}`,
    });
  }
  return value;
}

function rejectUnknownKeys(
  section: Record<string, unknown>,
  path: string,
  known: readonly string[]
): void {
  for (const key of Object.keys(section)) {
    if (!known.includes(key)) {
      throw createError('ARBOR-C002', {
        field: path === '' ? key : `${path}.${key}`,
        reason: 'is not a known setting',
      });
    }
  }
}

function mergeText(
  data: Record<string, unknown>,
  name: 'string' | 'identifier',
  defaults: TextPolicy
): TextPolicy {
  const section = readSection(data, name);
  if (section === undefined) {
    return defaults;
  }
  rejectUnknownKeys(section, name, ['maxLength', 'maxEntries']);
  return {
    maxLength: readInteger(section, name, 'maxLength', defaults.maxLength, 0),
    maxEntries: readInteger(section, name, 'maxEntries', defaults.maxEntries, 0),
  };
}

/**
 * Validate parsed file content and merge it over the defaults.
 * Every section and key is optional.
 *
 * @throws ConfigError ARBOR-C002 for a malformed or unknown setting
 */
export function resolvePoolPolicy(data: unknown): PoolPolicy {
  if (!isRecord(data)) {
    throw createError('ARBOR-C001', { reason: 'must be an object' });
  }

  const defaults = createDefaultPoolPolicy();
  rejectUnknownKeys(data, '', ['int', 'bool', 'string', 'identifier']);

  let int = defaults.int;
  const intSection = readSection(data, 'int');
  if (intSection !== undefined) {
    rejectUnknownKeys(intSection, 'int', ['min', 'max']);
    int = {
      min: readInteger(intSection, 'int', 'min', defaults.int.min, null),
      max: readInteger(intSection, 'int', 'max', defaults.int.max, null),
    };
    if (int.min > int.max) {
      throw createError('ARBOR-C002', {
        field: 'int.min',
        reason: 'must not exceed int.max',
      });
    }
  }

  let bool = defaults.bool;
  const boolSection = readSection(data, 'bool');
  if (boolSection !== undefined) {
    rejectUnknownKeys(boolSection, 'bool', ['maxEntries']);
    bool = {
      maxEntries: readInteger(
        boolSection,
        'bool',
        'maxEntries',
        defaults.bool.maxEntries,
        0
      ),
    };
  }

  return {
    int,
    bool,
    string: mergeText(data, 'string', defaults.string),
    identifier: mergeText(data, 'identifier', defaults.identifier),
  };
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Load the pool policy from the specified directory.
 * arbor.config.yaml wins over arbor.config.json when both exist.
 *
 * @returns the merged policy, or null if neither file exists
 * @throws ConfigError ARBOR-C001 if the file cannot be read or parsed
 * @throws ConfigError ARBOR-C002 if a setting is invalid
 */
export function loadPoolPolicy(cwd: string): PoolPolicy | null {
  const fileName = CONFIG_FILE_NAMES.find((name) => existsSync(join(cwd, name)));
  if (fileName === undefined) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(join(cwd, fileName), 'utf-8');
  } catch (err) {
    throw createError('ARBOR-C001', {
      reason: `failed to read file (${describeError(err)})`,
    });
  }

  let parsedData: unknown;
  try {
    parsedData = fileName.endsWith('.json')
      ? JSON.parse(fileContent)
      : yaml.parse(fileContent);
  } catch (err) {
    throw createError('ARBOR-C001', {
      reason: `invalid ${fileName.endsWith('.json') ? 'JSON' : 'YAML'} (${describeError(err)})`,
    });
  }

  // An empty YAML document parses to null
  if (parsedData === null || parsedData === undefined) {
    return createDefaultPoolPolicy();
  }

  return resolvePoolPolicy(parsedData);
}
