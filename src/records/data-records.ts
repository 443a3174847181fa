/**
 * DataRecords: an ordered collection of records of a single kind.
 *
 * Every query is keyed by a field name and fails with FieldNotFoundError
 * as soon as one record lacks that field. Field values are compared with
 * SameValueZero, as Map and Set keys are.
 *
 * @module records/data-records
 */

import { join } from 'path';
import { z } from 'zod';
import { DEFAULT_DATA_CONFIG } from '../config/schema.js';
import type { DataConfig } from '../config/types.js';
import { DataContainer } from '../containers/data-container.js';
import { ArgumentError, FieldNotFoundError, MissingRecordKindError } from '../errors.js';
import { parseWithSchema, readJsonFile, writeJsonFile } from '../serialization/json-io.js';
import { DiscriminatorRegistry } from '../registry/discriminator-registry.js';
import { DEFAULT_RECORD_KINDS } from './default-kinds.js';
import {
  hasField,
  parseRecord,
  serializeRecord,
  type AnyRecord,
  type RecordKind,
  type RecordKindRegistry,
} from './record-kind.js';

/** Field of the serialized form holding the record kind name. */
export const RECORD_KIND_FIELD = 'record_kind';

export const SerializedDataRecordsSchema = z.object({
  records: z.array(z.unknown()),
  [RECORD_KIND_FIELD]: z.string().optional(),
});

export type SerializedDataRecords = {
  records: AnyRecord[];
  record_kind?: string;
};

/**
 * Values to keep or remove in `cull()`. Exactly one must be given.
 */
export type CullOptions<V> =
  | { keepValues: readonly V[]; removeValues?: undefined }
  | { removeValues: readonly V[]; keepValues?: undefined };

/** Where the record kind of a serialized collection comes from. */
export type RecordKindSource<R extends object> = RecordKind<R> | RecordKindRegistry;

export type FieldOf<R> = keyof R & string;

export class DataRecords<R extends object> extends DataContainer<R> {
  /**
   * @param kind - Kind of every record in the collection
   * @param records - Initial records, taken as-is
   */
  constructor(
    readonly kind: RecordKind<R>,
    records: Iterable<R> = [],
  ) {
    super(records);
  }

  /** Distinct values of `field`, in order of first appearance. */
  buildKeyset<F extends FieldOf<R>>(field: F): R[F][] {
    return Array.from(new Set(this.slice(field)));
  }

  /**
   * Map from each distinct value of `field` to the positions of the
   * records holding it, ascending.
   */
  buildLookup<F extends FieldOf<R>>(field: F): Map<R[F], number[]> {
    const lookup = new Map<R[F], number[]>();
    this.slice(field).forEach((value, index) => {
      const positions = lookup.get(value);
      if (positions === undefined) {
        lookup.set(value, [index]);
      } else {
        positions.push(index);
      }
    });
    return lookup;
  }

  /**
   * Map from each distinct value of `field` to the records holding it.
   * The records are the collection's own objects, not copies.
   */
  buildSubsets<F extends FieldOf<R>>(field: F): Map<R[F], R[]> {
    const subsets = new Map<R[F], R[]>();
    for (const [value, positions] of this.buildLookup(field)) {
      subsets.set(value, positions.map((index) => this.elements[index]));
    }
    return subsets;
  }

  /**
   * Values of `field`, in record order.
   *
   * @throws {FieldNotFoundError} if any record lacks the field
   */
  slice<F extends FieldOf<R>>(field: F): R[F][] {
    return this.elements.map((record, index) => {
      if (!hasField(record, field)) {
        throw new FieldNotFoundError(field, index);
      }
      return record[field];
    });
  }

  /**
   * Keep only the records whose `field` value is in the keep-set, in
   * their original relative order. With `removeValues`, the keep-set is
   * every distinct value of `field` except those.
   *
   * @returns the number of records left
   * @throws {ArgumentError} if both or neither of keepValues/removeValues
   *   are given, or the keep-set is empty
   * @throws {FieldNotFoundError} if any record lacks the field
   */
  cull<F extends FieldOf<R>>(field: F, options: CullOptions<R[F]>): number {
    const { keepValues, removeValues } = options;
    if ((keepValues === undefined) === (removeValues === undefined)) {
      throw new ArgumentError('Exactly one of keepValues or removeValues must be provided');
    }

    const lookup = this.buildLookup(field);

    let keep: Set<R[F]>;
    if (removeValues !== undefined) {
      const remove = new Set(removeValues);
      keep = new Set(Array.from(lookup.keys()).filter((value) => !remove.has(value)));
    } else {
      keep = new Set(keepValues ?? []);
    }

    if (keep.size === 0) {
      throw new ArgumentError(`No values of '${field}' left to keep`);
    }

    const positions: number[] = [];
    for (const value of keep) {
      positions.push(...(lookup.get(value) ?? []));
    }
    return this.keepIndices(positions);
  }

  /**
   * New collection of the same kind with the records at `indices`, in the
   * given order (repeats allowed).
   *
   * @throws {IndexOutOfBoundsError} if any index is out of range
   */
  subsetFromIndices(indices: readonly number[]): DataRecords<R> {
    return new DataRecords(this.kind, this.pickIndices(indices));
  }

  /**
   * Parse the records of a serialized collection and append them.
   * Records are parsed with `kind` when given, else with this collection's
   * kind. Nothing is appended if any record fails to parse.
   *
   * @returns the number of records in the collection
   */
  addDict(data: unknown, kind: RecordKind<R> = this.kind): number {
    this.addContainer(DataRecords.fromJSON(data, kind));
    return this.size;
  }

  /**
   * Read a serialized collection from a JSON file and append its records.
   *
   * @returns the number of records in the collection
   */
  async addJson(path: string, kind: RecordKind<R> = this.kind): Promise<number> {
    return this.addDict(await readJsonFile(path), kind);
  }

  toJSON(): SerializedDataRecords {
    return {
      records: this.elements.map((record) => serializeRecord(this.kind, record)),
      [RECORD_KIND_FIELD]: this.kind.name,
    };
  }

  async writeJson(path: string, config: DataConfig = DEFAULT_DATA_CONFIG): Promise<void> {
    await writeJsonFile(path, this.toJSON(), config);
  }

  /**
   * Build a collection from its serialized form.
   *
   * With a RecordKind, records are parsed as that kind. Otherwise the
   * embedded `record_kind` is resolved through the registry (by default
   * the built-in kinds).
   *
   * @throws {MissingRecordKindError} if no kind is supplied and none is embedded
   * @throws {UnknownVariantError} if the embedded kind is not registered
   * @throws {MissingFieldError} if a record lacks a required field
   */
  static fromJSON<R extends object>(data: unknown, kind: RecordKind<R>): DataRecords<R>;
  static fromJSON(data: unknown, registry?: RecordKindRegistry): DataRecords<AnyRecord>;
  static fromJSON<R extends object>(
    data: unknown,
    source: RecordKindSource<R> = DEFAULT_RECORD_KINDS,
  ): DataRecords<R> | DataRecords<AnyRecord> {
    const envelope = parseWithSchema(SerializedDataRecordsSchema, data, 'data records');

    if (!isRegistry(source)) {
      const kind = source;
      return new DataRecords(kind, envelope.records.map((raw) => parseRecord(kind, raw)));
    }

    const name = envelope[RECORD_KIND_FIELD];
    if (name === undefined) {
      throw new MissingRecordKindError();
    }
    const kind = source.resolve(name);
    return new DataRecords(kind, envelope.records.map((raw) => parseRecord(kind, raw)));
  }

  static async fromJsonFile<R extends object>(path: string, kind: RecordKind<R>): Promise<DataRecords<R>>;
  static async fromJsonFile(path: string, registry?: RecordKindRegistry): Promise<DataRecords<AnyRecord>>;
  static async fromJsonFile<R extends object>(
    path: string,
    source: RecordKindSource<R> = DEFAULT_RECORD_KINDS,
  ): Promise<DataRecords<R> | DataRecords<AnyRecord>> {
    const data = await readJsonFile(path);
    return isRegistry(source) ? DataRecords.fromJSON(data, source) : DataRecords.fromJSON(data, source);
  }
}

/**
 * Path of the records file inside `dir`, per `records.default_filename`.
 */
export function recordsPathForDir(dir: string, config: DataConfig = DEFAULT_DATA_CONFIG): string {
  return join(dir, config.records.default_filename);
}

function isRegistry<R extends object>(source: RecordKindSource<R>): source is RecordKindRegistry {
  return source instanceof DiscriminatorRegistry;
}
