/**
 * Record kinds: the declared shape of every record in a DataRecords
 * collection.
 *
 * A kind is built from a Zod object schema. Non-optional keys are the
 * required fields, optional keys the optional ones. An optional field is
 * either absent (no own property) or present, and present-with-null is
 * distinct from absent.
 *
 * @module records/record-kind
 */

import { z } from 'zod';
import { MissingFieldError, SerializationError } from '../errors.js';
import { DiscriminatorRegistry } from '../registry/discriminator-registry.js';
import { parseWithSchema } from '../serialization/json-io.js';

/** Any record: a plain object of fields. */
export type AnyRecord = Record<string, unknown>;

export interface RecordKind<R extends object = AnyRecord> {
  /** Discriminator embedded in serialized collections */
  readonly name: string;
  /** Validates a parsed record's field types */
  readonly schema: z.ZodType<R, z.ZodTypeDef, unknown>;
  /** Fields that must be present when parsing */
  readonly required: readonly string[];
  /** Fields copied only when present */
  readonly optional: readonly string[];
  /** Fields never serialized, even when present */
  readonly excluded: readonly string[];
}

/** Record type of a kind. */
export type RecordOf<K> = K extends RecordKind<infer R> ? R : never;

export interface RecordKindOptions {
  excluded?: readonly string[];
}

/**
 * Define a record kind from a Zod object schema.
 *
 * ```typescript
 * const ClipRecordKind = defineRecordKind('ClipRecord', z.object({
 *   clip_path: z.string(),
 *   start: z.number(),
 *   note: z.string().optional(),
 * }));
 * ```
 */
export function defineRecordKind<T extends z.ZodRawShape>(
  name: string,
  schema: z.ZodObject<T>,
  options: RecordKindOptions = {},
): RecordKind<z.infer<z.ZodObject<T>>> {
  const required: string[] = [];
  const optional: string[] = [];

  for (const [field, fieldSchema] of Object.entries(schema.shape)) {
    if (fieldSchema.isOptional()) {
      optional.push(field);
    } else {
      required.push(field);
    }
  }

  return {
    name,
    schema,
    required,
    optional,
    excluded: options.excluded ?? [],
  };
}

/**
 * Whether the record holds `field` as an own, defined property.
 */
export function hasField(record: object, field: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, field) &&
    Reflect.get(record, field) !== undefined;
}

function isRecordObject(value: unknown): value is AnyRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Parse a record of the given kind. Required fields are copied
 * unconditionally, optional fields only when present in the input; other
 * input fields are dropped.
 *
 * @throws {MissingFieldError} if a required field is absent
 * @throws {SerializationError} if a field fails the kind's schema
 */
export function parseRecord<R extends object>(kind: RecordKind<R>, raw: unknown): R {
  if (!isRecordObject(raw)) {
    throw new SerializationError(`Invalid ${kind.name} record: expected an object`);
  }

  const fields: AnyRecord = {};
  for (const field of kind.required) {
    if (!hasField(raw, field)) {
      throw new MissingFieldError(field, kind.name);
    }
    fields[field] = raw[field];
  }
  for (const field of kind.optional) {
    if (hasField(raw, field)) {
      fields[field] = raw[field];
    }
  }

  return parseWithSchema(kind.schema, fields, `${kind.name} record`);
}

/**
 * Serialize every present, non-excluded field of a record.
 */
export function serializeRecord<R extends object>(kind: RecordKind<R>, record: R): AnyRecord {
  const excluded = new Set(kind.excluded);
  const out: AnyRecord = {};
  for (const [field, value] of Object.entries(record)) {
    if (!excluded.has(field) && value !== undefined) {
      out[field] = value;
    }
  }
  return out;
}

// ============================================================================
// Registry
// ============================================================================

export type RecordKindRegistry = DiscriminatorRegistry<RecordKind>;

export function createRecordKindRegistry(...kinds: RecordKind[]): RecordKindRegistry {
  const registry = new DiscriminatorRegistry<RecordKind>('record kind');
  for (const kind of kinds) {
    registry.register(kind, kind.name);
  }
  return registry;
}
