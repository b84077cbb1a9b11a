import { describe, it, expect } from 'vitest';
import { Pattern, WILDCARD, renderTemplate, wildcardCount } from '../pattern.js';
import { ConfigError } from '../../types/errors.js';

describe('Pattern', () => {
  it('uses # as the wildcard marker', () => {
    expect(WILDCARD).toBe('#');
  });

  describe('wildcardCount', () => {
    it('returns the length of a fixed-length pattern', () => {
      expect(wildcardCount(Pattern.length(5))).toBe(5);
      expect(wildcardCount(Pattern.length(0))).toBe(0);
    });

    it('counts markers in a template', () => {
      expect(wildcardCount(Pattern.template('REF-##-##'))).toBe(4);
      expect(wildcardCount(Pattern.template('ABC'))).toBe(0);
      expect(wildcardCount(Pattern.template(''))).toBe(0);
      expect(wildcardCount(Pattern.template('é#😀#'))).toBe(2);
    });
  });

  describe('renderTemplate', () => {
    it('renders a fixed-length pattern as markers', () => {
      expect(renderTemplate(Pattern.length(3))).toBe('###');
      expect(renderTemplate(Pattern.length(0))).toBe('');
    });

    it('returns a template unchanged', () => {
      expect(renderTemplate(Pattern.template('A#-#B'))).toBe('A#-#B');
    });
  });

  it('rejects negative or fractional lengths', () => {
    expect(() => Pattern.length(-1)).toThrow(ConfigError);
    expect(() => Pattern.length(1.5)).toThrow(ConfigError);
    expect(() => Pattern.length(Number.NaN)).toThrow(ConfigError);
  });
});
