import { describe, it, expect } from 'vitest';
import { err, isErr, isOk, ok, type Result } from '../result.js';
import { ConfigError } from '../errors.js';

describe('Result', () => {
  it('Ok carries a value', () => {
    const r: Result<number, Error> = ok(3);
    expect(isOk(r)).toBe(true);
    expect(isErr(r)).toBe(false);
    expect(r.map((n) => n * 2).unwrap()).toBe(6);
    expect(r.unwrapOr(0)).toBe(3);
  });

  it('Err carries an error and ignores map', () => {
    const e = new ConfigError({ message: 'bad' });
    const r: Result<number, ConfigError> = err(e);
    expect(isErr(r)).toBe(true);
    expect(r.map((n) => n * 2).isErr()).toBe(true);
    expect(r.unwrapOr(7)).toBe(7);
  });

  it('Err.unwrap rethrows Error values as-is', () => {
    const e = new ConfigError({ message: 'bad' });
    expect(() => err(e).unwrap()).toThrow(e);
  });

  it('Err.unwrap wraps non-Error values', () => {
    expect(() => err('nope').unwrap()).toThrow(
      'Called unwrap on an Err value: nope'
    );
  });
});
