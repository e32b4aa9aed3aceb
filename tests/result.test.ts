import { CodecError, MissingFieldError, UnknownVariantError, isCodecError } from '../src/errors';
import { labelledLogger } from '../src/logger';
import { attempt } from '../src/result';

describe('attempt', () => {
  it('wraps a value', () => {
    expect(attempt(() => 42)).toEqual({ ok: true, value: 42 });
  });

  it('captures codec errors', () => {
    const result = attempt(() => {
      throw new MissingFieldError('a', 'hdr.a');
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(CodecError);
      expect(result.error.kind).toBe('MissingField');
    }
  });

  it('rethrows other errors', () => {
    expect(() =>
      attempt(() => {
        throw new TypeError('boom');
      }),
    ).toThrow(TypeError);
  });
});

describe('errors', () => {
  it('formats variant ids in hex', () => {
    expect(new UnknownVariantError('message id', 0x2a).message).toBe('Unknown message id 0x2a');
    expect(new UnknownVariantError('layout reference', 'Foo').message).toBe("Unknown layout reference 'Foo'");
  });

  it('names the subclass', () => {
    const err = new MissingFieldError('a');
    expect(err.name).toBe('MissingFieldError');
    expect(isCodecError(err)).toBe(true);
    expect(isCodecError(new Error('x'))).toBe(false);
  });
});

describe('labelledLogger', () => {
  it('prefixes messages', () => {
    const inner = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
    labelledLogger(inner, 'frame').info('hello', { id: 1 });
    expect(inner.info).toHaveBeenCalledWith('[frame] hello', { id: 1 });
  });
});
