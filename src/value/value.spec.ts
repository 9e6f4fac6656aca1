import { describe, expect, it } from 'vitest';
import { PlistDate } from './plist-date';
import { Uid } from './uid';
import { PlistValue, valueKind, valuesEqual } from './value';

describe('valuesEqual', () => {
  it.each<[string, PlistValue, PlistValue, boolean]>([
    ['NaN equals NaN', NaN, NaN, true],
    ['0 differs from -0', 0, -0, false],
    ['an integer differs from a real', 1n, 1, false],
    ['equal bytes', Uint8Array.from([1, 2]), Uint8Array.from([1, 2]), true],
    ['different bytes', Uint8Array.from([1, 2]), Uint8Array.from([1]), false],
    ['equal dates', new PlistDate(5), new PlistDate(5), true],
    ['a uid differs from its integer', new Uid(5n), 5n, false],
    ['dictionaries in the same order', new Map([['a', 1n], ['b', 2n]]), new Map([['a', 1n], ['b', 2n]]), true],
    ['dictionaries in another order', new Map([['a', 1n], ['b', 2n]]), new Map([['b', 2n], ['a', 1n]]), false],
    ['nested arrays', [[true], 'x'], [[true], 'x'], true],
    ['an array and a dictionary', [], new Map(), false],
  ])('%s', (_, a, b, expected) => {
    expect(valuesEqual(a, b)).toBe(expected);
    expect(valuesEqual(b, a)).toBe(expected);
  });
});

describe('valuesEqual on deep values', () => {
  function nest(depth: number, leaf: PlistValue) {
    let value: PlistValue = [leaf];
    for (let i = 1; i < depth; ++i) {
      value = [value];
    }
    return value;
  }

  it('compares without recursion', () => {
    expect(valuesEqual(nest(100_000, 1n), nest(100_000, 1n))).toBe(true);
    expect(valuesEqual(nest(100_000, 1n), nest(100_000, 2n))).toBe(false);
  });
});

describe('valueKind', () => {
  it.each<[PlistValue, string]>([
    [[], 'array'],
    [new Map(), 'dictionary'],
    ['', 'string'],
    [false, 'boolean'],
    [0.5, 'real'],
    [0n, 'integer'],
    [new Uint8Array(), 'data'],
    [new PlistDate(0), 'date'],
    [new Uid(0n), 'uid'],
  ])('%#: %s', (value, kind) => {
    expect(valueKind(value)).toBe(kind);
  });
});

describe('PlistDate', () => {
  it('counts seconds from 2001-01-01', () => {
    expect(PlistDate.fromISOString('2001-01-01T00:00:00Z')).toEqual(new PlistDate(0));
    expect(PlistDate.fromISOString('2001-01-01T00:01:00Z')?.secondsSinceEpoch).toBe(60);
    expect(new PlistDate(-1).toDate().toISOString()).toBe('2000-12-31T23:59:59.000Z');
  });

  it('writes whole seconds without a fraction', () => {
    expect(new PlistDate(0).toISOString()).toBe('2001-01-01T00:00:00Z');
    expect(new PlistDate(0.25).toISOString()).toBe('2001-01-01T00:00:00.250Z');
  });

  it('rejects what cannot be a date', () => {
    expect(PlistDate.fromISOString('not a date')).toBeUndefined();
    expect(() => new PlistDate(Infinity)).toThrow(RangeError);
    expect(() => new PlistDate(1e300)).toThrow(RangeError);
  });

  it('accepts the whole range of Date', () => {
    const latest = (8.64e15 - 978_307_200_000) / 1e3;

    expect(PlistDate.isRepresentable(latest)).toBe(true);
    expect(PlistDate.isRepresentable(latest + 1)).toBe(false);
    expect(new PlistDate(latest).toDate().toISOString()).toBe('+275760-09-13T00:00:00.000Z');
  });

  it('converts from a Date', () => {
    expect(PlistDate.fromDate(new Date(Date.UTC(2001, 0, 1, 0, 0, 10)))).toEqual(new PlistDate(10));
  });
});

describe('Uid', () => {
  it('holds unsigned 64-bit values only', () => {
    expect(new Uid(2n ** 64n - 1n).toString()).toBe('Uid<18446744073709551615>');
    expect(() => new Uid(-1n)).toThrow(RangeError);
    expect(() => new Uid(2n ** 64n)).toThrow(RangeError);
  });
});
