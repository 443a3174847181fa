/**
 * Sequence pattern utilities.
 *
 * A sequence pattern is a path whose file name holds exactly one
 * printf-style integer placeholder: `%d`, `%5d` or `%05d`
 * (e.g. `/data/frames/frame-%05d.png`). `%%` stands for a literal `%`.
 *
 * @module sequences/pattern
 */

import { readdirSync } from 'fs';
import { basename, dirname, extname, join } from 'path';
import { InvalidIndexError, InvalidPatternError, PatternMismatchError } from '../errors.js';

const TOKEN = /%%|%(0?)(\d*)d/g;

/**
 * Parsed form of a sequence pattern. Text fields are unescaped.
 */
export interface SequencePattern {
  /** The pattern as given */
  pattern: string;
  /** Directory part of the pattern */
  dir: string;
  /** File-name text before the placeholder */
  prefix: string;
  /** File-name text after the placeholder */
  suffix: string;
  /** Full pattern text before the placeholder */
  head: string;
  /** Full pattern text after the placeholder */
  tail: string;
  /** Minimum field width (0 when unpadded) */
  width: number;
  /** Whether the field is padded with zeros rather than spaces */
  zeroPad: boolean;
}

/**
 * Index bounds of a file sequence, inclusive.
 */
export interface SequenceBounds {
  lower: number;
  upper: number;
}

/**
 * @throws {InvalidPatternError} unless the file name holds exactly one
 *   placeholder and the directory part holds none
 */
export function parseSequencePattern(pattern: string): SequencePattern {
  const dir = dirname(pattern);
  const name = basename(pattern);

  if (findPlaceholders(dir).length > 0) {
    throw new InvalidPatternError(pattern, 'placeholder must be in the file name');
  }

  const inName = findPlaceholders(name);
  if (inName.length !== 1) {
    throw new InvalidPatternError(
      pattern,
      `expected exactly one integer placeholder, found ${inName.length}`,
    );
  }

  const [match] = inName;
  const start = match.index ?? 0;
  const inPattern = findPlaceholders(pattern);
  const last = inPattern[inPattern.length - 1];
  const offset = last?.index ?? pattern.length - name.length + start;

  return {
    pattern,
    dir: unescapePercent(dir),
    prefix: unescapePercent(name.slice(0, start)),
    suffix: unescapePercent(name.slice(start + match[0].length)),
    head: unescapePercent(pattern.slice(0, offset)),
    tail: unescapePercent(pattern.slice(offset + match[0].length)),
    width: match[2] === '' ? 0 : parseInt(match[2], 10),
    zeroPad: match[1] === '0',
  };
}

function findPlaceholders(text: string): RegExpMatchArray[] {
  return Array.from(text.matchAll(TOKEN)).filter((match) => match[0] !== '%%');
}

function unescapePercent(text: string): string {
  return text.replace(/%%/g, '%');
}

function escapePercent(text: string): string {
  return text.replace(/%/g, '%%');
}

/**
 * Format the index field of a parsed pattern, as printf would.
 *
 * @throws {InvalidIndexError} if the index is negative or not an integer
 */
export function formatIndexField(parsed: SequencePattern, index: number): string {
  if (!Number.isInteger(index) || index < 0) {
    throw new InvalidIndexError(index);
  }
  return String(index).padStart(parsed.width, parsed.zeroPad ? '0' : ' ');
}

/**
 * Substitute the index into the pattern. The rest of the pattern is kept
 * as written (no path normalization).
 */
export function formatSequenceIndex(parsed: SequencePattern, index: number): string {
  return `${parsed.head}${formatIndexField(parsed, index)}${parsed.tail}`;
}

/**
 * Index encoded in `fileName`, or null when the name is not exactly what
 * the pattern would generate for some index.
 */
export function matchSequenceFile(parsed: SequencePattern, fileName: string): number | null {
  if (!fileName.startsWith(parsed.prefix) || !fileName.endsWith(parsed.suffix)) {
    return null;
  }

  const field = fileName.slice(parsed.prefix.length, fileName.length - parsed.suffix.length);
  const digits = field.trimStart();
  if (!/^\d+$/.test(digits)) {
    return null;
  }

  const index = parseInt(digits, 10);
  return formatIndexField(parsed, index) === field ? index : null;
}

/**
 * Scan the pattern's directory for matching files and return the minimum
 * and maximum index found, or null when nothing matches (including when
 * the directory does not exist).
 */
export function parseBoundsFromPattern(pattern: string | SequencePattern): SequenceBounds | null {
  const parsed = typeof pattern === 'string' ? parseSequencePattern(pattern) : pattern;

  let bounds: SequenceBounds | null = null;
  for (const fileName of listFiles(parsed.dir)) {
    const index = matchSequenceFile(parsed, fileName);
    if (index === null) continue;

    bounds = bounds === null
      ? { lower: index, upper: index }
      : { lower: Math.min(bounds.lower, index), upper: Math.max(bounds.upper, index) };
  }

  return bounds;
}

/**
 * Pattern inferred from a directory's contents.
 */
export interface DirPattern {
  pattern: string;
  /** Indices of the files matching the pattern, ascending */
  indices: number[];
  /** Files in the directory that do not match the pattern */
  unmatched: string[];
}

interface PatternFamily {
  prefix: string;
  suffix: string;
  fields: string[];
}

/**
 * Infer a sequence pattern from the files in a directory.
 *
 * Each file name is split around the last run of digits before its
 * extension. Names sharing the text around that run form a family; the
 * largest family wins (ties go to the lexicographically smallest pattern). The field is zero-padded to the
 * shortest digit run when that run has a leading zero, unpadded otherwise.
 *
 * @throws {PatternMismatchError} if no file name contains digits outside its extension
 */
export function parseDirPattern(dirPath: string): DirPattern {
  const files = listFiles(dirPath).sort();
  const families = new Map<string, PatternFamily>();

  for (const fileName of files) {
    const extension = extname(fileName);
    const stem = fileName.slice(0, fileName.length - extension.length);
    const match = /^(.*?)(\d+)(\D*)$/.exec(stem);
    if (!match) continue;

    const prefix = match[1];
    const suffix = `${match[3]}${extension}`;
    const key = `${prefix}\0${suffix}`;
    let family = families.get(key);
    if (family === undefined) {
      family = { prefix, suffix, fields: [] };
      families.set(key, family);
    }
    family.fields.push(match[2]);
  }

  let best: { pattern: string; count: number } | null = null;
  for (const family of families.values()) {
    const pattern = join(
      escapePercent(dirPath),
      `${escapePercent(family.prefix)}${fieldSpec(family.fields)}${escapePercent(family.suffix)}`,
    );
    if (
      best === null ||
      family.fields.length > best.count ||
      (family.fields.length === best.count && pattern < best.pattern)
    ) {
      best = { pattern, count: family.fields.length };
    }
  }

  if (best === null) {
    throw new PatternMismatchError(join(dirPath, '*'));
  }

  const parsed = parseSequencePattern(best.pattern);
  const indices: number[] = [];
  const unmatched: string[] = [];
  for (const fileName of files) {
    const index = matchSequenceFile(parsed, fileName);
    if (index === null) {
      unmatched.push(fileName);
    } else {
      indices.push(index);
    }
  }

  return { pattern: best.pattern, indices: indices.sort((a, b) => a - b), unmatched };
}

/** File extension of a pattern, including the dot (`''` if none). */
export function patternExtension(pattern: string): string {
  return extname(pattern);
}

function fieldSpec(fields: string[]): string {
  const width = Math.min(...fields.map((field) => field.length));
  const padded = fields.some((field) => field.length === width && field.startsWith('0') && width > 1);
  return padded ? `%0${width}d` : '%d';
}

function listFiles(dir: string): string[] {
  try {
    return readdirSync(dir, { withFileTypes: true })
      .filter((entry) => entry.isFile())
      .map((entry) => entry.name);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return [];
    }
    throw err;
  }
}
