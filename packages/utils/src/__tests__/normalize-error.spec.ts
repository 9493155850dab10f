import { describe, expect, it } from 'vitest';
import { normalizeError, sanitizeError } from '../normalize-error';

describe('normalizeError', () => {
  it('returns Error instances unchanged', () => {
    const error = new TypeError('bad input');

    expect(normalizeError(error)).toBe(error);
  });

  it('wraps primitives', () => {
    expect(normalizeError('Something went wrong').message).toBe('Something went wrong');
    expect(normalizeError(404).message).toBe('404');
    expect(normalizeError(null).message).toBe('null');
    expect(normalizeError(undefined).message).toBe('undefined');
  });

  it('keeps plain objects as JSON', () => {
    const result = normalizeError({ code: 'E_LOCKED', status: 423 });

    expect(result.message).toBe('{"code":"E_LOCKED","status":423}');
  });

  it('falls back to String() for circular objects', () => {
    const obj: Record<string, unknown> = { name: 'loop' };
    obj.self = obj;

    expect(normalizeError(obj).message).toBe('[object Object]');
  });
});

describe('sanitizeError', () => {
  it('serializes name and message', () => {
    const result = sanitizeError(new RangeError('out of range'));

    expect(result).toMatchObject({ name: 'RangeError', message: 'out of range' });
  });

  it('serializes thrown strings', () => {
    expect(sanitizeError('boom')).toMatchObject({ name: 'Error', message: 'boom' });
  });
});
