import { MissingFieldError, ValueTypeError } from '../src/errors';
import { consoleLogger } from '../src/logger';
import type { ValueMap } from '../src/values';
import { getArray, getBigInt, getMap, getNumber } from '../src/values';

describe('value accessors', () => {
  const scope: ValueMap = {
    small: 5,
    big: 0x1000000000000n,
    ratio: 0.5,
    inner: { a: 1 },
    xs: [1, 2],
  };

  it('reads integers as bigint', () => {
    expect(getBigInt(scope, 'small')).toBe(5n);
    expect(getBigInt(scope, 'big')).toBe(0x1000000000000n);
    expect(getNumber(scope, 'big')).toBe(2 ** 48);
  });

  it('rejects a fractional number as bigint', () => {
    expect(() => getBigInt(scope, 'ratio')).toThrow(ValueTypeError);
    expect(() => getBigInt(scope, 'ratio')).toThrow("Expected integer, got number (at 'ratio')");
  });

  it('reads nested mappings and arrays', () => {
    expect(getMap(scope, 'inner')).toEqual({ a: 1 });
    expect(getArray(scope, 'xs')).toEqual([1, 2]);
  });

  it('checks the shape of nested values', () => {
    expect(() => getMap(scope, 'xs')).toThrow("Expected mapping, got array (at 'xs')");
    expect(() => getArray(scope, 'inner')).toThrow("Expected array, got object (at 'inner')");
  });

  it('reports missing entries', () => {
    expect(() => getArray(scope, 'nope')).toThrow(MissingFieldError);
  });
});

describe('consoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('forwards to the matching console method', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    consoleLogger.warn('ignoring trailing bytes', { trailing: 2 });
    consoleLogger.debug('encoded layout');
    expect(warn).toHaveBeenCalledWith('ignoring trailing bytes', { trailing: 2 });
    expect(debug).toHaveBeenCalledWith('encoded layout', {});
  });
});
