/**
 * AttributeContainer: ordered attributes with an optional enforced schema.
 *
 * The schema is shared, not owned: the same AttributeContainerSchema may
 * be enforced on several containers at once.
 *
 * @module attributes/attribute-container
 */

import { DataContainer } from '../containers/data-container.js';
import { DEFAULT_DATA_CONFIG } from '../config/schema.js';
import type { DataConfig } from '../config/types.js';
import { parseWithSchema, readJsonFile, writeJsonFile } from '../serialization/json-io.js';
import {
  DEFAULT_ATTRIBUTE_VARIANTS,
  deserializeAttribute,
  serializeAttribute,
  type AttributeVariantRegistry,
} from './attribute.js';
import { AttributeContainerSchema } from './container-schema.js';
import {
  SerializedAttributeContainerSchema,
  type Attribute,
  type SerializedAttributeContainer,
} from './types.js';

export interface AttributeContainerOptions {
  attributes?: Iterable<Attribute>;
  /** Schema to enforce; the initial attributes must satisfy it. */
  schema?: AttributeContainerSchema;
}

export class AttributeContainer extends DataContainer<Attribute> {
  private schema: AttributeContainerSchema | null = null;

  /**
   * @throws {NameNotFoundError | TypeMismatchError | ValueNotAllowedError}
   *   if a schema is given and an initial attribute violates it
   */
  constructor(options: AttributeContainerOptions = {}) {
    super(options.attributes);
    if (options.schema !== undefined) {
      this.setSchema(options.schema);
    }
  }

  get hasSchema(): boolean {
    return this.schema !== null;
  }

  /** The enforced schema, or null when none is enforced. */
  getSchema(): AttributeContainerSchema | null {
    return this.schema;
  }

  protected override validate(attr: Attribute): void {
    this.schema?.validateAttribute(attr);
  }

  /**
   * Build the schema describing the current contents. The enforced schema
   * is not touched.
   */
  getActiveSchema(): AttributeContainerSchema {
    return AttributeContainerSchema.buildActiveSchema(this.elements);
  }

  /**
   * Enforce `schema`. The current contents are validated first; on failure
   * the previous schema stays in place.
   */
  setSchema(schema: AttributeContainerSchema): void {
    for (const attr of this.elements) {
      schema.validateAttribute(attr);
    }
    this.schema = schema;
  }

  /**
   * Enforce the current active schema. Later additions are restricted to
   * the names, categories and ranges observed now.
   */
  freezeSchema(): void {
    this.setSchema(this.getActiveSchema());
  }

  removeSchema(): void {
    this.schema = null;
  }

  /** Attributes named `name`, in insertion order. */
  getAttributesNamed(name: string): Attribute[] {
    return this.elements.filter((attr) => attr.name === name);
  }

  /**
   * New container holding the attributes at the given positions, in the
   * given order, enforcing the same schema.
   */
  subsetFromIndices(indices: readonly number[]): AttributeContainer {
    return new AttributeContainer({
      attributes: this.pickIndices(indices),
      schema: this.schema ?? undefined,
    });
  }

  toJSON(): SerializedAttributeContainer {
    const out: SerializedAttributeContainer = { attrs: this.elements.map(serializeAttribute) };
    if (this.schema !== null) {
      out.schema = this.schema.toJSON();
    }
    return out;
  }

  /**
   * Reconstruct a container. A stored schema is enforced, so the stored
   * attributes must satisfy it.
   */
  static fromJSON(
    data: unknown,
    registry: AttributeVariantRegistry = DEFAULT_ATTRIBUTE_VARIANTS,
  ): AttributeContainer {
    const envelope = parseWithSchema(SerializedAttributeContainerSchema, data, 'attribute container');
    const attributes = envelope.attrs.map((attr) => deserializeAttribute(attr, registry));
    const schema = envelope.schema === undefined || envelope.schema === null
      ? undefined
      : AttributeContainerSchema.fromJSON(envelope.schema, registry);

    return new AttributeContainer({ attributes, schema });
  }

  static async fromJsonFile(
    path: string,
    registry: AttributeVariantRegistry = DEFAULT_ATTRIBUTE_VARIANTS,
  ): Promise<AttributeContainer> {
    return AttributeContainer.fromJSON(await readJsonFile(path), registry);
  }

  async writeJson(path: string, config: DataConfig = DEFAULT_DATA_CONFIG): Promise<void> {
    await writeJsonFile(path, this.toJSON(), config);
  }
}
