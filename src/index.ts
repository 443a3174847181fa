// Errors
export {
  DataError,
  ValueParseError,
  UnknownVariantError,
  NameNotFoundError,
  TypeMismatchError,
  ValueNotAllowedError,
  PatternMismatchError,
  InvalidPatternError,
  InvalidIndexError,
  IndexOutOfBoundsError,
  ImmutableBoundsError,
  ArgumentError,
  FieldNotFoundError,
  MissingFieldError,
  MissingRecordKindError,
  SerializationError,
} from './errors.js';

// Registry
export { DiscriminatorRegistry } from './registry/index.js';

// Configuration
export type { DataConfig, SequenceConfig, RecordsConfig, SerializationConfig } from './config/index.js';
export {
  DataConfigSchema,
  DEFAULT_DATA_CONFIG,
  readDataConfig,
  validateDataConfig,
  DataConfigError,
  DEFAULT_CONFIG_PATH,
} from './config/index.js';

// Serialization
export { parseWithSchema, readJsonFile, writeJsonFile } from './serialization/index.js';

// Containers
export { DataContainer } from './containers/index.js';

// Attributes, schemas and attribute containers
export * from './attributes/index.js';

// File sequences
export * from './sequences/index.js';

// Records
export * from './records/index.js';

// Formatting
export type { SchemaFormatOptions } from './formatting/index.js';
export { SchemaFormatter } from './formatting/index.js';
