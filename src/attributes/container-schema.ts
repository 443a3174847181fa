/**
 * AttributeContainerSchema: one AttributeSchema per attribute name.
 *
 * An entry's variant is fixed by the first attribute observed with that
 * name. Bulk operations check every variant before mutating anything, so
 * a failing call leaves the schema as it was.
 *
 * @module attributes/container-schema
 */

import { NameNotFoundError, TypeMismatchError, ValueNotAllowedError } from '../errors.js';
import { parseWithSchema } from '../serialization/json-io.js';
import { DEFAULT_ATTRIBUTE_VARIANTS, type AttributeVariantRegistry } from './attribute.js';
import {
  addAttributeToSchema,
  cloneAttributeSchema,
  createAttributeSchema,
  deserializeAttributeSchema,
  isValidValue,
  mergeAttributeSchema,
  serializeAttributeSchema,
  validateAttributeType,
} from './attribute-schema.js';
import {
  SerializedContainerSchemaSchema,
  type Attribute,
  type AttributeSchema,
  type AttributeType,
  type SerializedSchemaEntry,
  type SerializedContainerSchema,
} from './types.js';

export class AttributeContainerSchema {
  private schemas: Map<string, AttributeSchema> = new Map();

  /**
   * @param schemas - Initial entries, keyed by their own `name`
   */
  constructor(schemas: Iterable<AttributeSchema> = []) {
    for (const schema of schemas) {
      this.schemas.set(schema.name, schema);
    }
  }

  /** Attribute names, in the order they were first seen. */
  get names(): string[] {
    return Array.from(this.schemas.keys());
  }

  get size(): number {
    return this.schemas.size;
  }

  hasAttribute(name: string): boolean {
    return this.schemas.has(name);
  }

  /**
   * @throws {NameNotFoundError} if the schema has no entry for `name`
   */
  getAttributeSchema(name: string): AttributeSchema {
    const schema = this.schemas.get(name);
    if (schema === undefined) {
      throw new NameNotFoundError(name);
    }
    return schema;
  }

  /**
   * @throws {NameNotFoundError} if the schema has no entry for `name`
   */
  getAttributeType(name: string): AttributeType {
    return this.getAttributeSchema(name).type;
  }

  /** Entries, in the order they were first seen. */
  entries(): IterableIterator<[string, AttributeSchema]> {
    return this.schemas.entries();
  }

  /**
   * Incorporate an attribute, creating an entry typed by its variant the
   * first time its name is seen.
   *
   * @throws {TypeMismatchError} if an entry exists with a different variant
   */
  addAttribute(attr: Attribute): void {
    let schema = this.schemas.get(attr.name);
    if (schema === undefined) {
      schema = createAttributeSchema(attr.type, attr.name);
      this.schemas.set(attr.name, schema);
    }
    addAttributeToSchema(schema, attr);
  }

  /**
   * Incorporate every attribute. Variants are checked for the whole batch
   * (including names first introduced by the batch) before any change.
   *
   * @throws {TypeMismatchError} if any attribute conflicts with a declared variant
   */
  addAttributes(attrs: Iterable<Attribute>): this {
    const batch = Array.from(attrs);
    const declared = new Map<string, AttributeType>();

    for (const attr of batch) {
      const expected = this.schemas.get(attr.name)?.type ?? declared.get(attr.name);
      if (expected === undefined) {
        declared.set(attr.name, attr.type);
      } else if (expected !== attr.type) {
        throw new TypeMismatchError(attr.name, expected, attr.type);
      }
    }

    for (const attr of batch) {
      this.addAttribute(attr);
    }
    return this;
  }

  /**
   * Merge another container schema into this one. Names missing here are
   * copied; shared names are merged per variant.
   *
   * @throws {TypeMismatchError} if a shared name has different variants
   */
  mergeSchema(other: AttributeContainerSchema): void {
    for (const [name, schema] of other.entries()) {
      const existing = this.schemas.get(name);
      if (existing !== undefined && existing.type !== schema.type) {
        throw new TypeMismatchError(name, existing.type, schema.type);
      }
    }

    for (const [name, schema] of other.entries()) {
      const existing = this.schemas.get(name);
      if (existing === undefined) {
        this.schemas.set(name, cloneAttributeSchema(schema));
      } else {
        mergeAttributeSchema(existing, schema);
      }
    }
  }

  /**
   * Check an attribute against the schema: known name, matching variant,
   * allowed value.
   *
   * @throws {NameNotFoundError} if the name is not in the schema
   * @throws {TypeMismatchError} if the variant differs
   * @throws {ValueNotAllowedError} if the value violates the entry's constraint
   */
  validateAttribute(attr: Attribute): void {
    const schema = this.getAttributeSchema(attr.name);
    validateAttributeType(schema, attr);

    if (!isValidValue(schema, attr.value)) {
      throw new ValueNotAllowedError(attr.name, attr.value);
    }
  }

  isValidAttribute(attr: Attribute): boolean {
    const schema = this.schemas.get(attr.name);
    return schema !== undefined && schema.type === attr.type && isValidValue(schema, attr.value);
  }

  clone(): AttributeContainerSchema {
    return new AttributeContainerSchema(
      Array.from(this.schemas.values(), (schema) => cloneAttributeSchema(schema)),
    );
  }

  /**
   * Build the schema describing exactly the given attributes.
   */
  static buildActiveSchema(attrs: Iterable<Attribute>): AttributeContainerSchema {
    return new AttributeContainerSchema().addAttributes(attrs);
  }

  toJSON(): SerializedContainerSchema {
    const schema: Record<string, SerializedSchemaEntry> = {};
    for (const [name, entry] of this.schemas) {
      schema[name] = serializeAttributeSchema(entry);
    }
    return { schema };
  }

  /**
   * @throws {SerializationError} if the envelope or an entry is malformed
   * @throws {UnknownVariantError} if an entry's discriminator is not registered
   */
  static fromJSON(
    data: unknown,
    registry: AttributeVariantRegistry = DEFAULT_ATTRIBUTE_VARIANTS,
  ): AttributeContainerSchema {
    const envelope = parseWithSchema(SerializedContainerSchemaSchema, data, 'attribute container schema');
    const result = new AttributeContainerSchema();

    for (const [name, entry] of Object.entries(envelope.schema ?? {})) {
      const schema = deserializeAttributeSchema(entry, registry);
      // Entries are keyed by the map key, which wins over the stored name.
      result.schemas.set(name, schema.name === name ? schema : { ...schema, name });
    }

    return result;
  }
}
