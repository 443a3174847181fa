/**
 * Config file reader with Zod validation.
 *
 * Reads `.data-schema-kit.json`, parses it through the Zod schema and
 * returns a fully populated config. Missing file = all defaults.
 *
 * @module config/reader
 */

import { readFile } from 'fs/promises';
import { DataConfigSchema, DEFAULT_DATA_CONFIG } from './schema.js';
import type { DataConfig } from './types.js';
import { DataError } from '../errors.js';

/** Default path for the config file. */
export const DEFAULT_CONFIG_PATH = '.data-schema-kit.json';

/**
 * Error thrown when config reading or validation fails.
 */
export class DataConfigError extends DataError {
  override name = 'DataConfigError';

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/**
 * Read and validate the config from disk.
 *
 * - Missing file (ENOENT): returns defaults.
 * - Invalid JSON: throws with "Invalid JSON".
 * - Schema violation: throws with one `path: message` line per issue.
 *
 * @throws {DataConfigError} On invalid JSON or validation failure
 */
export async function readDataConfig(
  configPath: string = DEFAULT_CONFIG_PATH,
): Promise<DataConfig> {
  let content: string;

  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return DEFAULT_DATA_CONFIG;
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new DataConfigError(`Invalid JSON in config file: ${configPath}`);
  }

  const result = validateDataConfig(raw);
  if (!result.valid) {
    throw new DataConfigError(
      `Config validation failed:\n${result.errors.join('\n')}`,
      result.field,
    );
  }

  return result.config;
}

/**
 * Validate raw input against the config schema (no I/O).
 */
export function validateDataConfig(
  raw: unknown,
): { valid: true; config: DataConfig } | { valid: false; errors: string[]; field?: string } {
  const result = DataConfigSchema.safeParse(raw);

  if (result.success) {
    return { valid: true, config: result.data };
  }

  const errors = result.error.issues.map((issue) => {
    const path = issue.path.join('.');
    return `${path}: ${issue.message}`;
  });

  return { valid: false, errors, field: result.error.issues[0]?.path.join('.') };
}
