/**
 * Built-in record kinds.
 *
 * @module records/default-kinds
 */

import { z } from 'zod';
import { createRecordKindRegistry, defineRecordKind, type RecordKindRegistry } from './record-kind.js';

/**
 * A labeled video. `group` optionally ties records together, e.g. clips
 * sampled from the same parent video.
 */
export const LabeledVideoRecordSchema = z.object({
  video_path: z.string(),
  label: z.string(),
  group: z.string().nullable().optional(),
});

export type LabeledVideoRecord = z.infer<typeof LabeledVideoRecordSchema>;

export const LabeledVideoRecordKind = defineRecordKind('LabeledVideoRecord', LabeledVideoRecordSchema);

/** Registry resolving embedded record kinds when no registry is given. */
export const DEFAULT_RECORD_KINDS: RecordKindRegistry = createRecordKindRegistry(LabeledVideoRecordKind);
