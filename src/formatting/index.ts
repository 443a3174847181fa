export type { SchemaFormatOptions } from './schema-formatter.js';
export { SchemaFormatter } from './schema-formatter.js';
