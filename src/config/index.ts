export type { DataConfig, SequenceConfig, RecordsConfig, SerializationConfig } from './types.js';
export { DataConfigSchema, DEFAULT_DATA_CONFIG } from './schema.js';
export {
  readDataConfig,
  validateDataConfig,
  DataConfigError,
  DEFAULT_CONFIG_PATH,
} from './reader.js';
