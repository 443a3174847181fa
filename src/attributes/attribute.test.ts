import { describe, it, expect } from 'vitest';
import {
  attributesEqual,
  booleanAttribute,
  categoricalAttribute,
  createAttribute,
  createAttributeVariantRegistry,
  deserializeAttribute,
  numericAttribute,
  parseAttributeValue,
  serializeAttribute,
} from './attribute.js';
import type { Attribute } from './types.js';
import { SerializationError, UnknownVariantError, ValueParseError } from '../errors.js';

describe('parseAttributeValue', () => {
  describe('categorical', () => {
    it('stores strings unchanged', () => {
      expect(parseAttributeValue('categorical', '  Cat ')).toBe('  Cat ');
    });

    it('stores numbers and booleans as strings', () => {
      expect(parseAttributeValue('categorical', 3)).toBe('3');
      expect(parseAttributeValue('categorical', false)).toBe('false');
    });

    it('rejects objects and null', () => {
      expect(() => parseAttributeValue('categorical', null)).toThrow(ValueParseError);
      expect(() => parseAttributeValue('categorical', { a: 1 })).toThrow(ValueParseError);
    });
  });

  describe('numeric', () => {
    it('keeps numbers', () => {
      expect(parseAttributeValue('numeric', 2.5)).toBe(2.5);
    });

    it('converts numeric strings', () => {
      expect(parseAttributeValue('numeric', ' 1e3 ')).toBe(1000);
      expect(parseAttributeValue('numeric', '-0.25')).toBe(-0.25);
    });

    it('converts booleans to 1 and 0', () => {
      expect(parseAttributeValue('numeric', true)).toBe(1);
      expect(parseAttributeValue('numeric', false)).toBe(0);
    });

    it('rejects non-numeric input', () => {
      expect(() => parseAttributeValue('numeric', 'abc')).toThrow(ValueParseError);
      expect(() => parseAttributeValue('numeric', '')).toThrow(ValueParseError);
      expect(() => parseAttributeValue('numeric', NaN)).toThrow(ValueParseError);
      expect(() => parseAttributeValue('numeric', [1])).toThrow(ValueParseError);
    });

    it('rejects values JSON cannot carry', () => {
      expect(() => parseAttributeValue('numeric', Infinity)).toThrow(ValueParseError);
      expect(() => parseAttributeValue('numeric', -Infinity)).toThrow(ValueParseError);
      expect(() => parseAttributeValue('numeric', 'Infinity')).toThrow(ValueParseError);
      expect(() => parseAttributeValue('numeric', '-Infinity')).toThrow(ValueParseError);
      expect(() => parseAttributeValue('numeric', '1e999')).toThrow(ValueParseError);
    });

    it('rejects non-decimal literals', () => {
      for (const raw of ['0x1A', '0b11', '0o7', '1_000', '1e', '.']) {
        expect(() => parseAttributeValue('numeric', raw)).toThrow(ValueParseError);
      }
    });

    it('accepts every decimal form', () => {
      expect(parseAttributeValue('numeric', '.5')).toBe(0.5);
      expect(parseAttributeValue('numeric', '+3')).toBe(3);
      expect(parseAttributeValue('numeric', '7.')).toBe(7);
      expect(parseAttributeValue('numeric', '2E-2')).toBe(0.02);
    });

    it('stores negative zero as zero', () => {
      expect(Object.is(parseAttributeValue('numeric', -0), 0)).toBe(true);
      expect(Object.is(parseAttributeValue('numeric', '-0'), 0)).toBe(true);
    });

    it('reports the variant and raw value', () => {
      try {
        parseAttributeValue('numeric', 'tall');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ValueParseError);
        const parseError = err as ValueParseError;
        expect(parseError.attributeType).toBe('numeric');
        expect(parseError.rawValue).toBe('tall');
        expect(parseError.message).toBe("Cannot parse 'tall' as a numeric attribute value");
      }
    });
  });

  describe('boolean', () => {
    it.each([
      [true, true],
      [false, false],
      [1, true],
      [0, false],
      ['yes', true],
      ['', false],
      [null, false],
      [undefined, false],
      [[], false],
      [[0], true],
      [{}, false],
      [{ a: 1 }, true],
    ])('coerces %j to %s', (raw, expected) => {
      expect(parseAttributeValue('boolean', raw)).toBe(expected);
    });
  });
});

describe('createAttribute', () => {
  it('builds a categorical attribute', () => {
    const attr = createAttribute('categorical', 'weather', 'sunny');
    expect(attr).toEqual({ type: 'categorical', name: 'weather', value: 'sunny' });
  });

  it('parses numeric values', () => {
    const attr = createAttribute('numeric', 'speed', '12.5', 0.8);
    expect(attr).toEqual({ type: 'numeric', name: 'speed', value: 12.5, confidence: 0.8 });
  });

  it('omits confidence when not given', () => {
    const attr = booleanAttribute('occluded', true);
    expect('confidence' in attr).toBe(false);
  });

  it('stores out-of-range confidence as given', () => {
    expect(categoricalAttribute('label', 'car', 1.7).confidence).toBe(1.7);
  });

  it('produces frozen attributes', () => {
    const attr = numericAttribute('speed', 3);
    expect(Object.isFrozen(attr)).toBe(true);
  });
});

describe('attributesEqual', () => {
  it('compares name, variant, value and confidence', () => {
    const a = numericAttribute('speed', 3, 0.5);
    expect(attributesEqual(a, numericAttribute('speed', 3, 0.5))).toBe(true);
    expect(attributesEqual(a, numericAttribute('speed', 3))).toBe(false);
    expect(attributesEqual(a, numericAttribute('velocity', 3, 0.5))).toBe(false);
    expect(attributesEqual(a, numericAttribute('speed', 4, 0.5))).toBe(false);
    expect(attributesEqual(categoricalAttribute('x', '1'), numericAttribute('x', 1))).toBe(false);
  });
});

describe('serializeAttribute / deserializeAttribute', () => {
  const attributes: Attribute[] = [
    categoricalAttribute('weather', 'rain', 0.9),
    numericAttribute('speed', -4.25),
    booleanAttribute('occluded', false, 0),
  ];

  for (const attr of attributes) {
    it(`round-trips a ${attr.type} attribute`, () => {
      const restored = deserializeAttribute(serializeAttribute(attr));
      expect(attributesEqual(restored, attr)).toBe(true);
    });
  }

  it('embeds the discriminator and omits absent confidence', () => {
    expect(serializeAttribute(numericAttribute('speed', 2))).toEqual({
      type: 'numeric',
      name: 'speed',
      value: 2,
    });
  });

  it('reads a null confidence as absent', () => {
    const attr = deserializeAttribute({ type: 'boolean', name: 'flag', value: 1, confidence: null });
    expect(attr).toEqual({ type: 'boolean', name: 'flag', value: true });
  });

  it('rejects unregistered discriminators', () => {
    expect(() => deserializeAttribute({ type: 'ordinal', name: 'x', value: 1 })).toThrow(UnknownVariantError);
  });

  it('rejects malformed envelopes', () => {
    expect(() => deserializeAttribute({ type: 'numeric', value: 1 })).toThrow(SerializationError);
    expect(() => deserializeAttribute('numeric')).toThrow(SerializationError);
  });

  it('rejects stored values that do not parse', () => {
    expect(() => deserializeAttribute({ type: 'numeric', name: 'speed', value: 'fast' })).toThrow(ValueParseError);
  });

  it('resolves aliases registered on a custom registry', () => {
    const registry = createAttributeVariantRegistry().register('categorical', 'CategoricalAttribute');
    const attr = deserializeAttribute({ type: 'CategoricalAttribute', name: 'label', value: 'dog' }, registry);
    expect(attr).toEqual({ type: 'categorical', name: 'label', value: 'dog' });
  });
});
