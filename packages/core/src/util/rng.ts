import { randomInt } from 'node:crypto';

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * Source of uniformly distributed integers used for character selection.
 */
export interface RandomSource {
  /** Returns an integer in [0, bound). `bound` must be in [1, 2^32]. */
  nextInt(bound: number): number;
}

const UINT32_RANGE = 0x100000000;

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = (seed >>> 0) ^ fnv1a32(label); a zero state is
 * replaced by the FNV offset basis since xorshift never leaves zero.
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 implements RandomSource {
  private x: number;

  constructor(seed: number, label = '') {
    const init = ((seed >>> 0) ^ fnv1a32(label)) >>> 0;
    this.x = init === 0 ? 2166136261 : init;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /**
   * Unbiased integer in [0, bound): draws landing in the incomplete top
   * bucket of the uint32 range are rejected.
   */
  nextInt(bound: number): number {
    if (!Number.isInteger(bound) || bound < 1 || bound > UINT32_RANGE) {
      throw new RangeError(`nextInt bound out of range: ${bound}`);
    }
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    let value = this.next();
    while (value >= limit) {
      value = this.next();
    }
    return value % bound;
  }
}

/**
 * Seeded source for reproducible runs; without a seed one is drawn from
 * node:crypto so separate runs diverge.
 */
export function createRandomSource(seed?: number, label = ''): XorShift32 {
  return new XorShift32(seed ?? randomInt(0, UINT32_RANGE), label);
}
