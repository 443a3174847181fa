/**
 * Attribute construction, value parsing and (de)serialization.
 *
 * @module attributes/attribute
 */

import { ValueParseError } from '../errors.js';
import { DiscriminatorRegistry } from '../registry/discriminator-registry.js';
import { parseWithSchema } from '../serialization/json-io.js';
import {
  ATTRIBUTE_TYPES,
  SerializedAttributeSchema,
  type Attribute,
  type AttributeType,
  type AttributeValueMap,
  type BooleanAttribute,
  type CategoricalAttribute,
  type NumericAttribute,
  type SerializedAttribute,
} from './types.js';

// ============================================================================
// Variant registry
// ============================================================================

/**
 * Registry resolving stored discriminators to attribute variants.
 * Shared by attribute and attribute schema deserialization.
 */
export type AttributeVariantRegistry = DiscriminatorRegistry<AttributeType>;

/**
 * Create a registry with every built-in variant registered under its own
 * name. Callers may register extra aliases on the result.
 */
export function createAttributeVariantRegistry(): AttributeVariantRegistry {
  const registry = new DiscriminatorRegistry<AttributeType>('attribute variant');
  for (const type of ATTRIBUTE_TYPES) {
    registry.register(type, type);
  }
  return registry;
}

/** Registry used when no registry is passed explicitly. */
export const DEFAULT_ATTRIBUTE_VARIANTS: AttributeVariantRegistry = createAttributeVariantRegistry();

// ============================================================================
// Value parsing
// ============================================================================

/**
 * Parse a raw value into the value type of the given variant.
 *
 * - categorical: strings unchanged; numbers and booleans as their string form
 * - numeric: finite numbers as-is (-0 as 0); decimal strings converted;
 *   booleans as 1/0
 * - boolean: truthiness (empty strings, 0, NaN, null, undefined, empty
 *   arrays and empty objects are false)
 *
 * @throws {ValueParseError} if the value cannot be coerced
 */
export function parseAttributeValue<T extends AttributeType>(
  type: T,
  raw: unknown,
): AttributeValueMap[T];
export function parseAttributeValue(type: AttributeType, raw: unknown): AttributeValueMap[AttributeType] {
  switch (type) {
    case 'categorical':
      return parseCategorical(raw);
    case 'numeric':
      return parseNumeric(raw);
    case 'boolean':
      return parseBoolean(raw);
    default: {
      const _exhaustive: never = type;
      throw new ValueParseError(String(_exhaustive), raw);
    }
  }
}

function parseCategorical(raw: unknown): string {
  if (typeof raw === 'string') return raw;
  if (typeof raw === 'number' || typeof raw === 'boolean') return String(raw);
  throw new ValueParseError('categorical', raw);
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// JSON has no representation for NaN or the infinities.
function parseNumeric(raw: unknown): number {
  if (typeof raw === 'boolean') return raw ? 1 : 0;

  let value: number;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && DECIMAL.test(raw.trim())) {
    value = Number(raw.trim());
  } else {
    throw new ValueParseError('numeric', raw);
  }

  if (!Number.isFinite(value)) {
    throw new ValueParseError('numeric', raw);
  }
  return value === 0 ? 0 : value;
}

function parseBoolean(raw: unknown): boolean {
  if (Array.isArray(raw)) return raw.length > 0;
  if (raw !== null && typeof raw === 'object') return Object.keys(raw).length > 0;
  return Boolean(raw);
}

// ============================================================================
// Construction
// ============================================================================

/**
 * Construct an attribute of the given variant, parsing `rawValue`.
 * Confidence, when given, is stored as-is.
 *
 * @throws {ValueParseError} if the raw value cannot be parsed
 */
export function createAttribute<T extends AttributeType>(
  type: T,
  name: string,
  rawValue: unknown,
  confidence?: number,
): Extract<Attribute, { type: T }>;
export function createAttribute(
  type: AttributeType,
  name: string,
  rawValue: unknown,
  confidence?: number,
): Attribute {
  switch (type) {
    case 'categorical':
      return categoricalAttribute(name, parseCategorical(rawValue), confidence);
    case 'numeric':
      return numericAttribute(name, parseNumeric(rawValue), confidence);
    case 'boolean':
      return booleanAttribute(name, parseBoolean(rawValue), confidence);
    default: {
      const _exhaustive: never = type;
      throw new ValueParseError(String(_exhaustive), rawValue);
    }
  }
}

export function categoricalAttribute(
  name: string,
  value: string | number | boolean,
  confidence?: number,
): CategoricalAttribute {
  const attr: CategoricalAttribute = { type: 'categorical', name, value: parseCategorical(value) };
  return withConfidence(attr, confidence);
}

export function numericAttribute(
  name: string,
  value: number | string,
  confidence?: number,
): NumericAttribute {
  const attr: NumericAttribute = { type: 'numeric', name, value: parseNumeric(value) };
  return withConfidence(attr, confidence);
}

export function booleanAttribute(
  name: string,
  value: unknown,
  confidence?: number,
): BooleanAttribute {
  const attr: BooleanAttribute = { type: 'boolean', name, value: parseBoolean(value) };
  return withConfidence(attr, confidence);
}

// Absent confidence leaves no key on the attribute.
function withConfidence<A extends Attribute>(attr: A, confidence: number | undefined): A {
  const out: A = confidence === undefined ? attr : { ...attr, confidence };
  Object.freeze(out);
  return out;
}

/**
 * Compare two attributes by name, variant, value and confidence.
 */
export function attributesEqual(a: Attribute, b: Attribute): boolean {
  return (
    a.type === b.type &&
    a.name === b.name &&
    Object.is(a.value, b.value) &&
    a.confidence === b.confidence
  );
}

// ============================================================================
// Serialization
// ============================================================================

export function serializeAttribute(attr: Attribute): SerializedAttribute {
  const out: SerializedAttribute = { type: attr.type, name: attr.name, value: attr.value };
  if (attr.confidence !== undefined) {
    out.confidence = attr.confidence;
  }
  return out;
}

/**
 * Reconstruct an attribute from its serialized form, resolving the stored
 * discriminator through the registry.
 *
 * @throws {SerializationError} if the envelope is malformed
 * @throws {UnknownVariantError} if the discriminator is not registered
 * @throws {ValueParseError} if the stored value does not parse
 */
export function deserializeAttribute(
  data: unknown,
  registry: AttributeVariantRegistry = DEFAULT_ATTRIBUTE_VARIANTS,
): Attribute {
  const envelope = parseWithSchema(SerializedAttributeSchema, data, 'attribute');
  const type = registry.resolve(envelope.type);
  return createAttribute(type, envelope.name, envelope.value, envelope.confidence ?? undefined);
}
