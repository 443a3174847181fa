/**
 * Attribute schema operations.
 *
 * Each operation is an exhaustive match over the variant tag. Schemas grow
 * monotonically: categories and ranges only widen through
 * `addAttributeToSchema` and `mergeAttributeSchema`.
 *
 * @module attributes/attribute-schema
 */

import { randomUUID } from 'crypto';
import { TypeMismatchError } from '../errors.js';
import { parseWithSchema } from '../serialization/json-io.js';
import { DEFAULT_ATTRIBUTE_VARIANTS, type AttributeVariantRegistry } from './attribute.js';
import {
  SerializedSchemaEntrySchema,
  type Attribute,
  type AttributeSchema,
  type AttributeSchemaFor,
  type AttributeType,
  type NumericRange,
  type SerializedSchemaEntry,
} from './types.js';

/**
 * Initial payload for a new schema. Fields that do not apply to the
 * variant are ignored.
 */
export interface AttributeSchemaOptions {
  uuid?: string;
  categories?: Iterable<string>;
  range?: NumericRange | null;
}

/**
 * Create an empty (or pre-populated) schema for the given variant.
 */
export function createAttributeSchema<T extends AttributeType>(
  type: T,
  name: string,
  options?: AttributeSchemaOptions,
): AttributeSchemaFor<T>;
export function createAttributeSchema(
  type: AttributeType,
  name: string,
  options: AttributeSchemaOptions = {},
): AttributeSchema {
  const uuid = options.uuid ?? randomUUID();

  switch (type) {
    case 'categorical':
      return { type, name, uuid, categories: new Set(options.categories ?? []) };
    case 'numeric':
      return { type, name, uuid, range: options.range ? [options.range[0], options.range[1]] : null };
    case 'boolean':
      return { type, name, uuid };
    default: {
      const _exhaustive: never = type;
      throw new Error(`Unknown attribute type: ${String(_exhaustive)}`);
    }
  }
}

/**
 * Deep copy of a schema; the copy keeps the uuid.
 */
export function cloneAttributeSchema<S extends AttributeSchema>(schema: S): S;
export function cloneAttributeSchema(schema: AttributeSchema): AttributeSchema {
  switch (schema.type) {
    case 'categorical':
      return { ...schema, categories: new Set(schema.categories) };
    case 'numeric':
      return { ...schema };
    case 'boolean':
      return { ...schema };
  }
}

/**
 * Whether the value satisfies the schema's constraint.
 * A numeric schema whose range is still unset accepts nothing.
 */
export function isValidValue(schema: AttributeSchema, value: unknown): boolean {
  switch (schema.type) {
    case 'categorical':
      return typeof value === 'string' && schema.categories.has(value);
    case 'numeric':
      return (
        typeof value === 'number' &&
        schema.range !== null &&
        value >= schema.range[0] &&
        value <= schema.range[1]
      );
    case 'boolean':
      return typeof value === 'boolean';
  }
}

/**
 * @throws {TypeMismatchError} if the attribute's variant differs from the schema's
 */
export function validateAttributeType(schema: AttributeSchema, attr: Attribute): void {
  if (attr.type !== schema.type) {
    throw new TypeMismatchError(attr.name, schema.type, attr.type);
  }
}

/**
 * Incorporate an attribute's value into the schema.
 *
 * @throws {TypeMismatchError} if the attribute's variant differs from the schema's
 */
export function addAttributeToSchema(schema: AttributeSchema, attr: Attribute): void {
  validateAttributeType(schema, attr);

  switch (schema.type) {
    case 'categorical':
      if (attr.type === 'categorical') {
        schema.categories.add(attr.value);
      }
      break;
    case 'numeric':
      if (attr.type === 'numeric') {
        schema.range = schema.range === null
          ? [attr.value, attr.value]
          : [Math.min(schema.range[0], attr.value), Math.max(schema.range[1], attr.value)];
      }
      break;
    case 'boolean':
      break;
  }
}

/**
 * Merge `source` into `target`: union of categories, convex hull of ranges
 * (an unset range takes the other's), no-op for booleans.
 *
 * @throws {TypeMismatchError} if the two schemas have different variants
 */
export function mergeAttributeSchema(target: AttributeSchema, source: AttributeSchema): void {
  if (target.type !== source.type) {
    throw new TypeMismatchError(target.name, target.type, source.type);
  }

  switch (target.type) {
    case 'categorical':
      if (source.type === 'categorical') {
        for (const category of source.categories) {
          target.categories.add(category);
        }
      }
      break;
    case 'numeric':
      if (source.type === 'numeric') {
        target.range = mergeRanges(target.range, source.range);
      }
      break;
    case 'boolean':
      break;
  }
}

function mergeRanges(a: NumericRange | null, b: NumericRange | null): NumericRange | null {
  if (a === null) return b === null ? null : [b[0], b[1]];
  if (b === null) return a;
  return [Math.min(a[0], b[0]), Math.max(a[1], b[1])];
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeAttributeSchema(schema: AttributeSchema): SerializedSchemaEntry {
  const out: SerializedSchemaEntry = { type: schema.type, name: schema.name, uuid: schema.uuid };

  switch (schema.type) {
    case 'categorical':
      out.categories = Array.from(schema.categories);
      break;
    case 'numeric':
      if (schema.range !== null) {
        out.range = [schema.range[0], schema.range[1]];
      }
      break;
    case 'boolean':
      break;
  }

  return out;
}

/**
 * Reconstruct a schema from its serialized form. A missing uuid is
 * generated.
 *
 * @throws {SerializationError} if the envelope is malformed
 * @throws {UnknownVariantError} if the discriminator is not registered
 */
export function deserializeAttributeSchema(
  data: unknown,
  registry: AttributeVariantRegistry = DEFAULT_ATTRIBUTE_VARIANTS,
): AttributeSchema {
  const envelope = parseWithSchema(SerializedSchemaEntrySchema, data, 'attribute schema');
  const type = registry.resolve(envelope.type);

  return createAttributeSchema(type, envelope.name, {
    uuid: envelope.uuid,
    categories: envelope.categories,
    range: envelope.range ?? null,
  });
}
