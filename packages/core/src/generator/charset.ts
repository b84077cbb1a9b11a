/**
 * Charset
 * Character pools that wildcard positions are filled from.
 */

import { ConfigError, GenerationError } from '../types/errors.js';
import { ErrorCode } from '../errors/codes.js';
import type { RandomSource } from '../util/rng.js';

const DIGITS = '0123456789';
const LETTERS = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ';

export type Charset =
  | { readonly kind: 'numeric' }
  | { readonly kind: 'alphabetic' }
  | { readonly kind: 'alphanumeric' }
  | { readonly kind: 'custom'; readonly pool: string };

export type CharsetKind = Charset['kind'];

export const Charset = {
  numeric: (): Charset => ({ kind: 'numeric' }),
  alphabetic: (): Charset => ({ kind: 'alphabetic' }),
  alphanumeric: (): Charset => ({ kind: 'alphanumeric' }),
  custom: (pool: string): Charset => ({ kind: 'custom', pool }),
} as const;

const BUILTIN_POOLS = {
  numeric: Array.from(DIGITS),
  alphabetic: Array.from(LETTERS),
  alphanumeric: Array.from(LETTERS + DIGITS),
} as const satisfies Record<Exclude<CharsetKind, 'custom'>, readonly string[]>;

/**
 * Characters sampled from, in order. Custom pools are split by code point
 * and keep duplicates, so a repeated character is drawn more often.
 */
export function charsetPool(charset: Charset): readonly string[] {
  switch (charset.kind) {
    case 'numeric':
    case 'alphabetic':
    case 'alphanumeric':
      return BUILTIN_POOLS[charset.kind];
    case 'custom':
      return Array.from(charset.pool);
  }
}

export function charsetCardinality(charset: Charset): number {
  switch (charset.kind) {
    case 'numeric':
      return 10;
    case 'alphabetic':
      return 52;
    case 'alphanumeric':
      return 62;
    case 'custom':
      return Array.from(charset.pool).length;
  }
}

/**
 * Draw one character uniformly over pool positions. Callers sampling many
 * positions pass the pool resolved once through `charsetPool`.
 * @throws GenerationError when the pool is empty
 */
export function sampleChar(
  charset: Charset,
  rng: RandomSource,
  pool: readonly string[] = charsetPool(charset)
): string {
  const index = pool.length > 0 ? rng.nextInt(pool.length) : -1;
  const char = pool[index];
  if (char === undefined) {
    throw new GenerationError({
      message: 'Cannot sample from an empty charset',
      errorCode: ErrorCode.EMPTY_CHARSET,
      context: { value: charset.kind },
    });
  }
  return char;
}

/**
 * Parse `numeric|alphabetic|alphanumeric|custom:<chars>`.
 * The keyword is case-insensitive; custom characters are taken verbatim.
 */
export function parseCharset(spec: string): Charset {
  const sep = spec.indexOf(':');
  const keyword = (sep === -1 ? spec : spec.slice(0, sep)).trim().toLowerCase();

  if (keyword === 'custom' && sep !== -1) {
    return Charset.custom(spec.slice(sep + 1));
  }
  if (
    sep === -1 &&
    (keyword === 'numeric' ||
      keyword === 'alphabetic' ||
      keyword === 'alphanumeric')
  ) {
    return { kind: keyword };
  }
  throw new ConfigError({
    message: `Invalid charset "${spec}". Expected numeric, alphabetic, alphanumeric or custom:<chars>.`,
    errorCode: ErrorCode.INVALID_ARGUMENT,
    context: { setting: 'charset', value: spec },
  });
}
