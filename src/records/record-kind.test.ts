import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  createRecordKindRegistry,
  defineRecordKind,
  hasField,
  parseRecord,
  serializeRecord,
} from './record-kind.js';
import { LabeledVideoRecordKind } from './default-kinds.js';
import { MissingFieldError, SerializationError, UnknownVariantError } from '../errors.js';

const TrackRecordKind = defineRecordKind(
  'TrackRecord',
  z.object({
    track_id: z.number().int(),
    label: z.string(),
    note: z.string().nullable().optional(),
    cache_key: z.string().optional(),
  }),
  { excluded: ['cache_key'] },
);

describe('defineRecordKind', () => {
  it('splits required and optional fields', () => {
    expect(TrackRecordKind.name).toBe('TrackRecord');
    expect(TrackRecordKind.required).toEqual(['track_id', 'label']);
    expect(TrackRecordKind.optional).toEqual(['note', 'cache_key']);
    expect(TrackRecordKind.excluded).toEqual(['cache_key']);
  });

  it('describes the built-in labeled video kind', () => {
    expect(LabeledVideoRecordKind.required).toEqual(['video_path', 'label']);
    expect(LabeledVideoRecordKind.optional).toEqual(['group']);
    expect(LabeledVideoRecordKind.excluded).toEqual([]);
  });
});

describe('hasField', () => {
  it('counts only own, defined properties', () => {
    expect(hasField({ a: null }, 'a')).toBe(true);
    expect(hasField({ a: 0 }, 'a')).toBe(true);
    expect(hasField({ a: undefined }, 'a')).toBe(false);
    expect(hasField({}, 'a')).toBe(false);
    expect(hasField({}, 'toString')).toBe(false);
  });
});

describe('parseRecord', () => {
  it('copies required fields and drops unknown ones', () => {
    const record = parseRecord(TrackRecordKind, { track_id: 4, label: 'car', speed: 3 });
    expect(record).toEqual({ track_id: 4, label: 'car' });
    expect('speed' in record).toBe(false);
  });

  it('distinguishes an absent optional field from a null one', () => {
    const absent = parseRecord(TrackRecordKind, { track_id: 1, label: 'car' });
    const explicitNull = parseRecord(TrackRecordKind, { track_id: 1, label: 'car', note: null });

    expect('note' in absent).toBe(false);
    expect('note' in explicitNull).toBe(true);
    expect(explicitNull.note).toBeNull();
  });

  it('reads an undefined optional field as absent', () => {
    const record = parseRecord(TrackRecordKind, { track_id: 1, label: 'car', note: undefined });
    expect('note' in record).toBe(false);
  });

  it('throws when a required field is missing', () => {
    expect(() => parseRecord(TrackRecordKind, { track_id: 1 })).toThrow(
      "Missing required field 'label' for record kind 'TrackRecord'",
    );
    expect(() => parseRecord(TrackRecordKind, { track_id: 1, label: undefined })).toThrow(MissingFieldError);
  });

  it('reports the first field failing its type', () => {
    try {
      parseRecord(TrackRecordKind, { track_id: 'one', label: 'car' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SerializationError);
      expect((err as SerializationError).field).toBe('track_id');
    }
  });

  it('rejects non-object input', () => {
    expect(() => parseRecord(TrackRecordKind, ['car'])).toThrow('Invalid TrackRecord record: expected an object');
    expect(() => parseRecord(TrackRecordKind, null)).toThrow(SerializationError);
  });
});

describe('serializeRecord', () => {
  it('skips excluded and absent fields and keeps nulls', () => {
    const record = parseRecord(TrackRecordKind, { track_id: 2, label: 'bus', note: null, cache_key: 'c-2' });

    expect(record.cache_key).toBe('c-2');
    expect(serializeRecord(TrackRecordKind, record)).toEqual({ track_id: 2, label: 'bus', note: null });
  });
});

describe('createRecordKindRegistry', () => {
  it('resolves kinds by name', () => {
    const registry = createRecordKindRegistry(TrackRecordKind, LabeledVideoRecordKind);

    expect(registry.resolve('TrackRecord')).toBe(TrackRecordKind);
    expect(registry.discriminators).toEqual(['TrackRecord', 'LabeledVideoRecord']);
    expect(() => registry.resolve('FrameRecord')).toThrow(UnknownVariantError);
    expect(() => registry.resolve('FrameRecord')).toThrow("Unknown record kind 'FrameRecord'");
  });
});
