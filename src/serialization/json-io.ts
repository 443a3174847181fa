/**
 * JSON file I/O and envelope validation for serialized forms.
 *
 * Every parse goes through a Zod schema; failures become a
 * SerializationError naming the first failing field.
 *
 * @module serialization/json-io
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { z } from 'zod';
import { SerializationError } from '../errors.js';
import { DEFAULT_DATA_CONFIG } from '../config/schema.js';
import type { DataConfig } from '../config/types.js';

/**
 * Validate raw input against an envelope schema.
 *
 * @param schema - Zod schema of the envelope
 * @param raw - Parsed JSON value
 * @param context - What is being parsed, for the error message
 * @throws {SerializationError} listing every issue, with the first issue's path as `field`
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  context: string,
): z.output<S> {
  const result = schema.safeParse(raw);

  if (!result.success) {
    const errors = result.error.issues.map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new SerializationError(
      `Invalid ${context}:\n${errors.join('\n')}`,
      result.error.issues[0]?.path.join('.'),
      result.error,
    );
  }

  return result.data;
}

/**
 * Read and parse a JSON file.
 *
 * @throws {SerializationError} if the file content is not valid JSON
 */
export async function readJsonFile(path: string): Promise<unknown> {
  const content = await readFile(path, 'utf-8');

  try {
    return JSON.parse(content) as unknown;
  } catch (err) {
    throw new SerializationError(`Invalid JSON in file: ${path}`, undefined, err);
  }
}

/**
 * Write a value as JSON, creating parent directories as needed.
 * Indentation follows `serialization.indent` of the given config.
 */
export async function writeJsonFile(
  path: string,
  value: unknown,
  config: DataConfig = DEFAULT_DATA_CONFIG,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  const indent = config.serialization.indent;
  await writeFile(path, JSON.stringify(value, null, indent > 0 ? indent : undefined) + '\n', 'utf-8');
}
