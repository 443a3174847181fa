/**
 * Zod schema for the data-schema-kit configuration.
 *
 * Every field has a `.default()` so that `DataConfigSchema.parse({})`
 * returns a complete config.
 *
 * @module config/schema
 */

import { z } from 'zod';
import type { DataConfig } from './types.js';

const SequenceConfigSchema = z.object({
  immutable_bounds: z.boolean().default(true),
});

const RecordsConfigSchema = z.object({
  default_filename: z
    .string()
    .min(1)
    .regex(/^[^/\\]+$/, 'must be a file name without path separators')
    .default('records.json'),
});

const SerializationConfigSchema = z.object({
  indent: z.number().int().min(0).max(8).default(2),
});

/**
 * Complete config schema with defaults on every field.
 *
 * ```typescript
 * const config = DataConfigSchema.parse({ serialization: { indent: 0 } });
 * ```
 */
export const DataConfigSchema = z.object({
  sequences: SequenceConfigSchema.default(() => ({
    immutable_bounds: true,
  })),
  records: RecordsConfigSchema.default(() => ({
    default_filename: 'records.json',
  })),
  serialization: SerializationConfigSchema.default(() => ({
    indent: 2,
  })),
});

/** Default config produced by parsing an empty object. */
export const DEFAULT_DATA_CONFIG: DataConfig = DataConfigSchema.parse({});
