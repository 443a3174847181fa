// Barrel exports for attributes module

export type {
  AttributeType,
  AttributeValue,
  AttributeValueMap,
  Attribute,
  CategoricalAttribute,
  NumericAttribute,
  BooleanAttribute,
  NumericRange,
  AttributeSchema,
  AttributeSchemaFor,
  CategoricalAttributeSchema,
  NumericAttributeSchema,
  BooleanAttributeSchema,
  SerializedAttribute,
  SerializedSchemaEntry,
  SerializedContainerSchema,
  SerializedAttributeContainer,
} from './types.js';
export { ATTRIBUTE_TYPES } from './types.js';
export type { AttributeVariantRegistry } from './attribute.js';
export {
  createAttributeVariantRegistry,
  DEFAULT_ATTRIBUTE_VARIANTS,
  parseAttributeValue,
  createAttribute,
  categoricalAttribute,
  numericAttribute,
  booleanAttribute,
  attributesEqual,
  serializeAttribute,
  deserializeAttribute,
} from './attribute.js';
export type { AttributeSchemaOptions } from './attribute-schema.js';
export {
  createAttributeSchema,
  cloneAttributeSchema,
  isValidValue,
  validateAttributeType,
  addAttributeToSchema,
  mergeAttributeSchema,
  serializeAttributeSchema,
  deserializeAttributeSchema,
} from './attribute-schema.js';
export { AttributeContainerSchema } from './container-schema.js';
export type { AttributeContainerOptions } from './attribute-container.js';
export { AttributeContainer } from './attribute-container.js';
