/**
 * Type definitions for the data-schema-kit configuration.
 *
 * Three sections:
 * - SequenceConfig: defaults for file sequences
 * - RecordsConfig: defaults for record collections on disk
 * - SerializationConfig: JSON output settings
 *
 * @module config/types
 */

/**
 * Defaults applied when constructing DataFileSequence instances.
 */
export interface SequenceConfig {
  /** Whether new sequences get immutable bounds unless told otherwise. */
  immutable_bounds: boolean;
}

/**
 * Defaults for DataRecords files.
 */
export interface RecordsConfig {
  /** File name used when records are stored in a directory. */
  default_filename: string;
}

/**
 * JSON output settings.
 */
export interface SerializationConfig {
  /** Spaces of indentation in written JSON files (0 for compact output). */
  indent: number;
}

/**
 * Complete configuration. Every field is populated after parsing.
 */
export interface DataConfig {
  sequences: SequenceConfig;
  records: RecordsConfig;
  serialization: SerializationConfig;
}
