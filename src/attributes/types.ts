/**
 * Attribute and attribute schema types, plus the Zod schemas of their
 * serialized forms.
 *
 * Attributes and schemas are tagged unions over the attribute variant.
 * Each variant pairs one Attribute type with one AttributeSchema type.
 *
 * @module attributes/types
 */

import { z } from 'zod';

// ============================================================================
// Variants
// ============================================================================

/** Attribute variants, in registration order. */
export const ATTRIBUTE_TYPES = ['categorical', 'numeric', 'boolean'] as const;

export type AttributeType = (typeof ATTRIBUTE_TYPES)[number];

/** Value type carried by each attribute variant. */
export interface AttributeValueMap {
  categorical: string;
  numeric: number;
  boolean: boolean;
}

export type AttributeValue = AttributeValueMap[AttributeType];

// ============================================================================
// Attributes
// ============================================================================

interface AttributeBase<T extends AttributeType> {
  readonly type: T;
  readonly name: string;
  readonly value: AttributeValueMap[T];
  /** Optional confidence of the value, nominally in [0, 1] */
  readonly confidence?: number;
}

export type CategoricalAttribute = AttributeBase<'categorical'>;
export type NumericAttribute = AttributeBase<'numeric'>;
export type BooleanAttribute = AttributeBase<'boolean'>;

export type Attribute = CategoricalAttribute | NumericAttribute | BooleanAttribute;

// ============================================================================
// Attribute schemas
// ============================================================================

/** Inclusive [min, max] range of a numeric schema. */
export type NumericRange = readonly [min: number, max: number];

interface AttributeSchemaBase {
  readonly name: string;
  readonly uuid: string;
}

export interface CategoricalAttributeSchema extends AttributeSchemaBase {
  readonly type: 'categorical';
  /** Allowed categories. Only grows. */
  categories: Set<string>;
}

export interface NumericAttributeSchema extends AttributeSchemaBase {
  readonly type: 'numeric';
  /** Allowed range, or null until a first value or range is incorporated. */
  range: NumericRange | null;
}

export interface BooleanAttributeSchema extends AttributeSchemaBase {
  readonly type: 'boolean';
}

export type AttributeSchema =
  | CategoricalAttributeSchema
  | NumericAttributeSchema
  | BooleanAttributeSchema;

/** Schema type paired with an attribute variant. */
export type AttributeSchemaFor<T extends AttributeType> = Extract<AttributeSchema, { type: T }>;

// ============================================================================
// Serialized forms
// ============================================================================

/** Envelope of a serialized attribute; the value is parsed per variant. */
export const SerializedAttributeSchema = z.object({
  type: z.string(),
  name: z.string(),
  value: z.unknown(),
  confidence: z.number().nullish(),
});

export type SerializedAttribute = {
  type: string;
  name: string;
  value: AttributeValue;
  confidence?: number;
};

/** Envelope of a serialized attribute schema entry. */
export const SerializedSchemaEntrySchema = z.object({
  type: z.string(),
  name: z.string(),
  uuid: z.string().optional(),
  categories: z.array(z.string()).optional(),
  range: z
    .tuple([z.number().finite(), z.number().finite()])
    .refine(([min, max]) => min <= max, { message: 'range min must not exceed max' })
    .optional(),
});

export type SerializedSchemaEntry = {
  type: string;
  name: string;
  uuid: string;
  categories?: string[];
  range?: [number, number];
};

/** Serialized AttributeContainerSchema: `{schema: {name: AttributeSchema}}`. */
export const SerializedContainerSchemaSchema = z.object({
  schema: z.record(z.string(), z.unknown()).nullish(),
});

export type SerializedContainerSchema = {
  schema: Record<string, SerializedSchemaEntry>;
};

/** Serialized AttributeContainer. */
export const SerializedAttributeContainerSchema = z.object({
  attrs: z.array(z.unknown()).default([]),
  schema: z.unknown().optional(),
});

export type SerializedAttributeContainer = {
  attrs: SerializedAttribute[];
  schema?: SerializedContainerSchema;
};
