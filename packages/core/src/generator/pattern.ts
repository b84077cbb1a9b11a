/**
 * Pattern
 * Templates of literal characters and `#` fill positions.
 *
 * There is no escape for `#`: every occurrence in a template is a fill
 * position. Literal `#` can only be added through the config prefix/postfix.
 */

import { ConfigError } from '../types/errors.js';

export const WILDCARD = '#';

export type Pattern =
  | { readonly kind: 'length'; readonly length: number }
  | { readonly kind: 'template'; readonly template: string };

export const Pattern = {
  length: (length: number): Pattern => {
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new ConfigError({
        message: `Invalid pattern length ${length}. Expected a non-negative integer.`,
        context: { setting: 'pattern', value: length },
      });
    }
    return { kind: 'length', length };
  },
  template: (template: string): Pattern => ({ kind: 'template', template }),
} as const;

export function wildcardCount(pattern: Pattern): number {
  switch (pattern.kind) {
    case 'length':
      return pattern.length;
    case 'template': {
      let count = 0;
      for (const ch of pattern.template) {
        if (ch === WILDCARD) count++;
      }
      return count;
    }
  }
}

export function renderTemplate(pattern: Pattern): string {
  switch (pattern.kind) {
    case 'length':
      return WILDCARD.repeat(pattern.length);
    case 'template':
      return pattern.template;
  }
}
