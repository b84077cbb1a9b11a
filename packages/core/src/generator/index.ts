/**
 * Generator module exports
 */

export {
  Charset,
  type CharsetKind,
  charsetCardinality,
  charsetPool,
  sampleChar,
  parseCharset,
} from './charset.js';
export { Pattern, WILDCARD, wildcardCount, renderTemplate } from './pattern.js';
export {
  generate,
  generateOne,
  isFeasible,
  computeCapacity,
  formatCapacity,
  MAX_EXACT_CAPACITY_BITS,
  type GenerateOptions,
} from './code-generator.js';
