// ============================================================================
// Data Errors
// ============================================================================
// Error kinds raised by attributes, schemas, containers, file sequences and
// record collections. Every error is thrown synchronously to the immediate
// caller and leaves the structure it was raised from unchanged.

/**
 * Base class for every error raised by this package.
 */
export class DataError extends Error {
  override name: string = 'DataError';

  constructor(message: string, cause?: unknown) {
    super(message);
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

// ---- Attribute and schema errors ----

/**
 * A raw value cannot be coerced to the value type of an attribute variant.
 */
export class ValueParseError extends DataError {
  override name = 'ValueParseError';

  constructor(
    public readonly attributeType: string,
    public readonly rawValue: unknown,
  ) {
    super(`Cannot parse ${describeValue(rawValue)} as a ${attributeType} attribute value`);
  }
}

/**
 * A stored discriminator does not resolve to a registered variant.
 */
export class UnknownVariantError extends DataError {
  override name = 'UnknownVariantError';

  constructor(
    public readonly discriminator: string,
    public readonly registry: string,
  ) {
    super(`Unknown ${registry} '${discriminator}'`);
  }
}

/**
 * Attribute name is absent from an enforced schema.
 */
export class NameNotFoundError extends DataError {
  override name = 'NameNotFoundError';

  constructor(public readonly attributeName: string) {
    super(`Attribute '${attributeName}' is not allowed by the schema`);
  }
}

/**
 * Attribute variant disagrees with the declared variant of a schema entry.
 */
export class TypeMismatchError extends DataError {
  override name = 'TypeMismatchError';

  constructor(
    public readonly attributeName: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(`Expected attribute '${attributeName}' to have type '${expected}'; found '${actual}'`);
  }
}

/**
 * Value violates the categories or range of a schema entry.
 */
export class ValueNotAllowedError extends DataError {
  override name = 'ValueNotAllowedError';

  constructor(
    public readonly attributeName: string,
    public readonly value: unknown,
  ) {
    super(`Value ${describeValue(value)} of attribute '${attributeName}' is not allowed by the schema`);
  }
}

// ---- File sequence errors ----

/**
 * No file on disk matches a sequence pattern.
 */
export class PatternMismatchError extends DataError {
  override name = 'PatternMismatchError';

  constructor(public readonly pattern: string) {
    super(`Sequence '${pattern}' did not match any files on disk`);
  }
}

/**
 * A sequence pattern does not contain exactly one integer placeholder in its
 * file name.
 */
export class InvalidPatternError extends DataError {
  override name = 'InvalidPatternError';

  constructor(
    public readonly pattern: string,
    reason: string,
  ) {
    super(`Invalid sequence pattern '${pattern}': ${reason}`);
  }
}

/**
 * Index is negative or not an integer.
 */
export class InvalidIndexError extends DataError {
  override name = 'InvalidIndexError';

  constructor(
    public readonly index: number,
    reason = 'indices must be nonnegative integers',
  ) {
    super(`Invalid index ${index}: ${reason}`);
  }
}

/**
 * Index lies outside the current (or one-step-extendable) bounds.
 */
export class IndexOutOfBoundsError extends DataError {
  override name = 'IndexOutOfBoundsError';

  constructor(
    public readonly index: number,
    public readonly lower: number,
    public readonly upper: number,
    detail?: string,
  ) {
    super(`Index ${index} out of bounds [${lower}, ${upper}]${detail ? `; ${detail}` : ''}`);
  }
}

/**
 * Bound mutation attempted on a sequence with immutable bounds.
 */
export class ImmutableBoundsError extends DataError {
  override name = 'ImmutableBoundsError';

  constructor(public readonly pattern: string) {
    super(`Cannot set bounds of immutable sequence '${pattern}'`);
  }
}

// ---- Argument and record errors ----

/**
 * Conflicting or missing arguments.
 */
export class ArgumentError extends DataError {
  override name = 'ArgumentError';
}

/**
 * A record does not hold the requested field.
 */
export class FieldNotFoundError extends DataError {
  override name = 'FieldNotFoundError';

  constructor(
    public readonly field: string,
    public readonly position?: number,
  ) {
    super(
      position === undefined
        ? `Record has no field '${field}'`
        : `Record at position ${position} has no field '${field}'`,
    );
  }
}

/**
 * A required field is missing from the input of a record parse.
 */
export class MissingFieldError extends DataError {
  override name = 'MissingFieldError';

  constructor(
    public readonly field: string,
    public readonly recordKind: string,
  ) {
    super(`Missing required field '${field}' for record kind '${recordKind}'`);
  }
}

/**
 * Serialized records carry no record kind and none was supplied.
 */
export class MissingRecordKindError extends DataError {
  override name = 'MissingRecordKindError';

  constructor() {
    super('A record kind is required to parse serialized records');
  }
}

/**
 * A serialized form is malformed (invalid JSON or failing envelope schema).
 */
export class SerializationError extends DataError {
  override name = 'SerializationError';

  constructor(
    message: string,
    public readonly field?: string,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  if (value === undefined) return 'undefined';
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
