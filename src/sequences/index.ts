export type { SequencePattern, SequenceBounds, DirPattern } from './pattern.js';
export {
  parseSequencePattern,
  formatIndexField,
  formatSequenceIndex,
  matchSequenceFile,
  parseBoundsFromPattern,
  parseDirPattern,
  patternExtension,
} from './pattern.js';
export type { DataFileSequenceOptions, SerializedDataFileSequence } from './data-file-sequence.js';
export { DataFileSequence, SerializedDataFileSequenceSchema } from './data-file-sequence.js';
export { SequenceCursor } from './sequence-cursor.js';
