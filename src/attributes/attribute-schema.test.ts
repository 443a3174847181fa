import { describe, it, expect } from 'vitest';
import {
  addAttributeToSchema,
  cloneAttributeSchema,
  createAttributeSchema,
  deserializeAttributeSchema,
  isValidValue,
  mergeAttributeSchema,
  serializeAttributeSchema,
  validateAttributeType,
} from './attribute-schema.js';
import { booleanAttribute, categoricalAttribute, numericAttribute } from './attribute.js';
import { SerializationError, TypeMismatchError, UnknownVariantError } from '../errors.js';

describe('createAttributeSchema', () => {
  it('creates empty payloads', () => {
    const categorical = createAttributeSchema('categorical', 'label');
    const numeric = createAttributeSchema('numeric', 'speed');

    expect(categorical.categories.size).toBe(0);
    expect(numeric.range).toBeNull();
  });

  it('generates a uuid unless one is given', () => {
    const generated = createAttributeSchema('boolean', 'flag');
    const given = createAttributeSchema('boolean', 'flag', { uuid: 'schema-1' });

    expect(generated.uuid).toMatch(/^[0-9a-f-]{36}$/);
    expect(given.uuid).toBe('schema-1');
  });
});

describe('isValidValue', () => {
  it('checks category membership', () => {
    const schema = createAttributeSchema('categorical', 'label', { categories: ['cat', 'dog'] });
    expect(isValidValue(schema, 'cat')).toBe(true);
    expect(isValidValue(schema, 'bird')).toBe(false);
    expect(isValidValue(schema, 1)).toBe(false);
  });

  it('checks inclusive range containment', () => {
    const schema = createAttributeSchema('numeric', 'speed', { range: [0, 10] });
    expect(isValidValue(schema, 0)).toBe(true);
    expect(isValidValue(schema, 10)).toBe(true);
    expect(isValidValue(schema, 10.01)).toBe(false);
    expect(isValidValue(schema, -1)).toBe(false);
  });

  it('rejects every value while the range is unset', () => {
    expect(isValidValue(createAttributeSchema('numeric', 'speed'), 0)).toBe(false);
  });

  it('accepts any boolean', () => {
    const schema = createAttributeSchema('boolean', 'flag');
    expect(isValidValue(schema, true)).toBe(true);
    expect(isValidValue(schema, false)).toBe(true);
    expect(isValidValue(schema, 'true')).toBe(false);
  });
});

describe('addAttributeToSchema', () => {
  it('adds categories', () => {
    const schema = createAttributeSchema('categorical', 'label');
    addAttributeToSchema(schema, categoricalAttribute('label', 'cat'));
    addAttributeToSchema(schema, categoricalAttribute('label', 'dog'));
    addAttributeToSchema(schema, categoricalAttribute('label', 'cat'));

    expect(Array.from(schema.categories)).toEqual(['cat', 'dog']);
  });

  it('initializes then widens the range', () => {
    const schema = createAttributeSchema('numeric', 'speed');
    addAttributeToSchema(schema, numericAttribute('speed', 5));
    expect(schema.range).toEqual([5, 5]);

    addAttributeToSchema(schema, numericAttribute('speed', -2));
    addAttributeToSchema(schema, numericAttribute('speed', 3));
    expect(schema.range).toEqual([-2, 5]);
  });

  it('is a no-op for booleans', () => {
    const schema = createAttributeSchema('boolean', 'flag', { uuid: 'u' });
    addAttributeToSchema(schema, booleanAttribute('flag', true));
    expect(schema).toEqual({ type: 'boolean', name: 'flag', uuid: 'u' });
  });

  it('rejects a different variant without changing the schema', () => {
    const schema = createAttributeSchema('numeric', 'speed', { range: [1, 2] });

    expect(() => addAttributeToSchema(schema, categoricalAttribute('speed', 'fast'))).toThrow(TypeMismatchError);
    expect(schema.range).toEqual([1, 2]);
  });
});

describe('validateAttributeType', () => {
  it('names the expected and actual variants', () => {
    const schema = createAttributeSchema('boolean', 'flag');
    expect(() => validateAttributeType(schema, numericAttribute('flag', 1))).toThrow(
      "Expected attribute 'flag' to have type 'boolean'; found 'numeric'",
    );
  });
});

describe('mergeAttributeSchema', () => {
  it('unions categories and is idempotent under self-merge', () => {
    const a = createAttributeSchema('categorical', 'label', { categories: ['cat'] });
    const b = createAttributeSchema('categorical', 'label', { categories: ['dog', 'cat'] });

    mergeAttributeSchema(a, b);
    expect(Array.from(a.categories).sort()).toEqual(['cat', 'dog']);

    mergeAttributeSchema(a, a);
    expect(Array.from(a.categories).sort()).toEqual(['cat', 'dog']);
  });

  it('takes the convex hull of numeric ranges in either order', () => {
    const left = createAttributeSchema('numeric', 'speed', { range: [0, 4] });
    const right = createAttributeSchema('numeric', 'speed', { range: [2, 9] });
    const leftCopy = cloneAttributeSchema(left);
    const rightCopy = cloneAttributeSchema(right);

    mergeAttributeSchema(left, right);
    mergeAttributeSchema(rightCopy, leftCopy);

    expect(left.range).toEqual([0, 9]);
    expect(rightCopy.range).toEqual([0, 9]);
  });

  it('lets an unset range take the other range', () => {
    const unset = createAttributeSchema('numeric', 'speed');
    const set = createAttributeSchema('numeric', 'speed', { range: [3, 4] });

    mergeAttributeSchema(unset, set);
    expect(unset.range).toEqual([3, 4]);

    mergeAttributeSchema(set, createAttributeSchema('numeric', 'speed'));
    expect(set.range).toEqual([3, 4]);
  });

  it('rejects merging different variants', () => {
    const a = createAttributeSchema('categorical', 'x');
    const b = createAttributeSchema('numeric', 'x', { range: [0, 1] });
    expect(() => mergeAttributeSchema(a, b)).toThrow(TypeMismatchError);
  });
});

describe('cloneAttributeSchema', () => {
  it('copies the category set', () => {
    const original = createAttributeSchema('categorical', 'label', { categories: ['cat'] });
    const copy = cloneAttributeSchema(original);
    copy.categories.add('dog');

    expect(original.categories.has('dog')).toBe(false);
    expect(copy.uuid).toBe(original.uuid);
  });
});

describe('serializeAttributeSchema / deserializeAttributeSchema', () => {
  it('writes categories for categorical schemas', () => {
    const schema = createAttributeSchema('categorical', 'label', { uuid: 'u1', categories: ['cat'] });
    expect(serializeAttributeSchema(schema)).toEqual({
      type: 'categorical',
      name: 'label',
      uuid: 'u1',
      categories: ['cat'],
    });
  });

  it('writes the range only once set', () => {
    const schema = createAttributeSchema('numeric', 'speed', { uuid: 'u2' });
    expect(serializeAttributeSchema(schema)).toEqual({ type: 'numeric', name: 'speed', uuid: 'u2' });

    addAttributeToSchema(schema, numericAttribute('speed', 7));
    expect(serializeAttributeSchema(schema).range).toEqual([7, 7]);
  });

  it('round-trips every variant', () => {
    const schemas = [
      createAttributeSchema('categorical', 'label', { categories: ['a', 'b'] }),
      createAttributeSchema('numeric', 'speed', { range: [-1, 1] }),
      createAttributeSchema('boolean', 'flag'),
    ];

    for (const schema of schemas) {
      expect(deserializeAttributeSchema(serializeAttributeSchema(schema))).toEqual(schema);
    }
  });

  it('generates a uuid when none is stored', () => {
    const schema = deserializeAttributeSchema({ type: 'boolean', name: 'flag' });
    expect(schema.uuid).toHaveLength(36);
  });

  it('rejects an inverted range', () => {
    expect(() => deserializeAttributeSchema({ type: 'numeric', name: 'speed', range: [5, 1] })).toThrow(
      SerializationError,
    );
  });

  it('rejects a non-finite range bound', () => {
    expect(() =>
      deserializeAttributeSchema({ type: 'numeric', name: 'speed', range: [0, Number.POSITIVE_INFINITY] }),
    ).toThrow(SerializationError);
    expect(() => deserializeAttributeSchema({ type: 'numeric', name: 'speed', range: [null, null] })).toThrow(
      SerializationError,
    );
  });

  it('rejects unknown discriminators', () => {
    expect(() => deserializeAttributeSchema({ type: 'ordinal', name: 'x' })).toThrow(UnknownVariantError);
  });
});
