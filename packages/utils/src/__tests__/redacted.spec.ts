import { describe, expect, it } from 'vitest';
import { Redacted } from '../redacted';

describe('Redacted', () => {
  it('hides the value in strings and JSON', () => {
    const secret = new Redacted('test-secret');

    expect(`${secret}`).toBe('[Redacted]');
    expect(JSON.stringify({ secret })).toBe('{"secret":"[Redacted]"}');
    expect(secret.value).toBe('test-secret');
  });

  it('maps the wrapped value without exposing it', () => {
    const length = new Redacted('test-secret').map((value) => value.length);

    expect(length).toBeInstanceOf(Redacted);
    expect(length.value).toBe(11);
  });
});
