/**
 * DataFileSequence: a family of files keyed by one integer index.
 *
 * A sequence must correspond to files on disk when it is created. With
 * mutable bounds, `genPath()` may then extend it one index at a time below
 * or above the current bounds, so a sequence never develops gaps.
 *
 * @module sequences/data-file-sequence
 */

import { z } from 'zod';
import { DEFAULT_DATA_CONFIG } from '../config/schema.js';
import type { DataConfig } from '../config/types.js';
import {
  ArgumentError,
  ImmutableBoundsError,
  IndexOutOfBoundsError,
  InvalidIndexError,
  PatternMismatchError,
} from '../errors.js';
import { parseWithSchema } from '../serialization/json-io.js';
import {
  formatSequenceIndex,
  parseBoundsFromPattern,
  parseDirPattern,
  parseSequencePattern,
  patternExtension,
  type SequencePattern,
} from './pattern.js';
import { SequenceCursor } from './sequence-cursor.js';

export interface DataFileSequenceOptions {
  /** Defaults to `sequences.immutable_bounds` of the config */
  immutableBounds?: boolean;
  config?: DataConfig;
}

export const SerializedDataFileSequenceSchema = z.object({
  sequence: z.string(),
  immutable_bounds: z.boolean().optional(),
});

export type SerializedDataFileSequence = {
  sequence: string;
  immutable_bounds: boolean;
};

export class DataFileSequence implements Iterable<string> {
  readonly sequence: string;
  readonly immutableBounds: boolean;
  readonly extension: string;

  private readonly parsed: SequencePattern;
  private lower: number;
  private upper: number;

  /**
   * Create a sequence from a pattern such as `/path/to/frame-%05d.json`.
   * The pattern's directory is scanned once for matching files.
   *
   * @throws {InvalidPatternError} if the pattern does not hold exactly one placeholder
   * @throws {PatternMismatchError} if no file on disk matches the pattern
   */
  constructor(sequence: string, options: DataFileSequenceOptions = {}) {
    const config = options.config ?? DEFAULT_DATA_CONFIG;

    this.sequence = sequence;
    this.immutableBounds = options.immutableBounds ?? config.sequences.immutable_bounds;
    this.extension = patternExtension(sequence);
    this.parsed = parseSequencePattern(sequence);

    const bounds = parseBoundsFromPattern(this.parsed);
    if (bounds === null) {
      throw new PatternMismatchError(sequence);
    }
    this.lower = bounds.lower;
    this.upper = bounds.upper;
  }

  /**
   * Build a sequence for the files in `dirPath`, inferring the pattern from
   * the most populated family of numbered file names.
   *
   * @throws {PatternMismatchError} if no file in the directory is numbered
   */
  static buildForDir(dirPath: string, options: DataFileSequenceOptions = {}): DataFileSequence {
    const { pattern, unmatched } = parseDirPattern(dirPath);
    if (unmatched.length > 0) {
      process.stderr.write(
        `[data-file-sequence] ${unmatched.length} file(s) in ${dirPath} do not match ${pattern} and are ignored\n`,
      );
    }
    return new DataFileSequence(pattern, options);
  }

  get lowerBound(): number {
    return this.lower;
  }

  /**
   * Clamped so that it never exceeds the upper bound.
   *
   * @throws {ImmutableBoundsError} if the bounds are immutable
   */
  set lowerBound(value: number) {
    this.assertMutable();
    this.assertIndex(value);
    this.lower = Math.min(value, this.upper);
  }

  get upperBound(): number {
    return this.upper;
  }

  /**
   * Clamped so that it never falls below the lower bound.
   *
   * @throws {ImmutableBoundsError} if the bounds are immutable
   */
  set upperBound(value: number) {
    this.assertMutable();
    this.assertIndex(value);
    this.upper = Math.max(value, this.lower);
  }

  get startsAtZero(): boolean {
    return this.lower === 0;
  }

  get startsAtOne(): boolean {
    return this.lower === 1;
  }

  /** Number of indices in [lowerBound, upperBound]. */
  get length(): number {
    return this.upper - this.lower + 1;
  }

  checkBounds(index: number): boolean {
    return index >= this.lower && index <= this.upper;
  }

  /**
   * Path of the file with the given index.
   *
   * Immutable bounds: the index must lie within the bounds. Mutable bounds:
   * the index may also be exactly one below the lower bound or one above
   * the upper bound, in which case that bound moves to it.
   *
   * @throws {IndexOutOfBoundsError} if the index is outside the (extendable) bounds
   * @throws {InvalidIndexError} if the index is negative (mutable bounds) or not an integer
   */
  genPath(index: number): string {
    if (!Number.isInteger(index)) {
      throw new InvalidIndexError(index, 'indices must be integers');
    }

    if (this.immutableBounds) {
      if (!this.checkBounds(index)) {
        throw new IndexOutOfBoundsError(index, this.lower, this.upper);
      }
      return formatSequenceIndex(this.parsed, index);
    }

    if (index < 0) {
      throw new InvalidIndexError(index);
    }

    const path = formatSequenceIndex(this.parsed, index);
    if (index === this.lower - 1) {
      this.lower = index;
    } else if (index === this.upper + 1) {
      this.upper = index;
    } else if (!this.checkBounds(index)) {
      throw new IndexOutOfBoundsError(
        index,
        this.lower,
        this.upper,
        'mutable sequences can be extended at most one index above or below',
      );
    }
    return path;
  }

  /**
   * Iterate the paths from lowerBound to upperBound. Every call starts a
   * fresh cursor, so iterations never interfere with one another.
   */
  [Symbol.iterator](): SequenceCursor {
    return new SequenceCursor(this.lower, () => this.upper, (index) => formatSequenceIndex(this.parsed, index));
  }

  /** All paths in the sequence, in index order. */
  paths(): string[] {
    return Array.from(this);
  }

  toJSON(): SerializedDataFileSequence {
    return { sequence: this.sequence, immutable_bounds: this.immutableBounds };
  }

  /**
   * @throws {SerializationError} if the envelope is malformed
   * @throws {PatternMismatchError} if no file on disk matches the stored pattern
   */
  static fromJSON(data: unknown, config: DataConfig = DEFAULT_DATA_CONFIG): DataFileSequence {
    const envelope = parseWithSchema(SerializedDataFileSequenceSchema, data, 'data file sequence');
    return new DataFileSequence(envelope.sequence, {
      immutableBounds: envelope.immutable_bounds,
      config,
    });
  }

  private assertMutable(): void {
    if (this.immutableBounds) {
      throw new ImmutableBoundsError(this.sequence);
    }
  }

  private assertIndex(value: number): void {
    if (!Number.isInteger(value) || value < 0) {
      throw new ArgumentError(`Sequence bounds must be nonnegative integers; got ${value}`);
    }
  }
}
