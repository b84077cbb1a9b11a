import { describe, it, expect } from 'vitest';
import { DEFAULT_CONFIG, resolveConfig, validateConfig } from '../config.js';
import { ConfigError } from '../errors.js';
import { Charset } from '../../generator/charset.js';
import { Pattern } from '../../generator/pattern.js';

describe('resolveConfig', () => {
  it('defaults to 1 alphanumeric code of length 8', () => {
    expect(resolveConfig()).toEqual({
      pattern: { kind: 'length', length: 8 },
      count: 1,
      charset: { kind: 'alphanumeric' },
      prefix: '',
      postfix: '',
    });
    expect(DEFAULT_CONFIG.count).toBe(1);
  });

  it('sets each field from its own key only', () => {
    const config = resolveConfig({
      prefix: 'P-',
      postfix: '-S',
      count: 4,
      charset: Charset.numeric(),
      pattern: Pattern.template('##'),
    });
    expect(config).toEqual({
      pattern: { kind: 'template', template: '##' },
      count: 4,
      charset: { kind: 'numeric' },
      prefix: 'P-',
      postfix: '-S',
    });
  });

  it('returns a frozen config', () => {
    const config = resolveConfig({ count: 2 });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('accepts count 0', () => {
    expect(resolveConfig({ count: 0 }).count).toBe(0);
  });

  it.each([-1, 1.5, Number.NaN, Number.POSITIVE_INFINITY])(
    'rejects count %s',
    (count) => {
      expect(() => resolveConfig({ count })).toThrow(ConfigError);
    }
  );

  it('names the offending setting', () => {
    try {
      resolveConfig({ count: -3 });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigError);
      expect((e as ConfigError).setting).toBe('count');
      expect((e as ConfigError).message).toBe(
        'Invalid count -3. Expected a non-negative integer.'
      );
    }
  });
});

describe('validateConfig', () => {
  it('rejects a hand-built length pattern with a negative length', () => {
    expect(() =>
      validateConfig({
        ...DEFAULT_CONFIG,
        pattern: { kind: 'length', length: -2 },
      })
    ).toThrow(ConfigError);
  });
});
