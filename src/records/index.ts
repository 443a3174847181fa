export type {
  AnyRecord,
  RecordKind,
  RecordOf,
  RecordKindOptions,
  RecordKindRegistry,
} from './record-kind.js';
export {
  defineRecordKind,
  hasField,
  parseRecord,
  serializeRecord,
  createRecordKindRegistry,
} from './record-kind.js';
export type { LabeledVideoRecord } from './default-kinds.js';
export { LabeledVideoRecordSchema, LabeledVideoRecordKind, DEFAULT_RECORD_KINDS } from './default-kinds.js';
export type { CullOptions, FieldOf, RecordKindSource, SerializedDataRecords } from './data-records.js';
export {
  DataRecords,
  SerializedDataRecordsSchema,
  RECORD_KIND_FIELD,
  recordsPathForDir,
} from './data-records.js';
