/**
 * Code Generator
 * Feasibility-checked generation of distinct codes from a Pattern and Charset.
 *
 * Capacity is charset cardinality raised to the wildcard count. A request for
 * more codes than the capacity fails before any sampling; otherwise candidates
 * are rendered and collected into a Set until the requested count is reached.
 * Order of the returned codes is unspecified.
 */

import { type Result, ok, err } from '../types/result.js';
import { FeasibilityError } from '../types/errors.js';
import { type CodegenConfig, validateConfig } from '../types/config.js';
import type { MetricsCollector } from '../util/metrics.js';
import { type RandomSource, createRandomSource } from '../util/rng.js';
import {
  type Charset,
  charsetCardinality,
  charsetPool,
  sampleChar,
} from './charset.js';
import {
  type Pattern,
  WILDCARD,
  renderTemplate,
  wildcardCount,
} from './pattern.js';

export interface GenerateOptions {
  /** Seed for a reproducible run; ignored when `rng` is given */
  seed?: number;
  rng?: RandomSource;
  metrics?: MetricsCollector;
}

/**
 * Exact cardinality^wildcards (0^0 = 1). Grows with the pattern length; use
 * formatCapacity to report it.
 */
export function computeCapacity(pattern: Pattern, charset: Charset): bigint {
  return (
    BigInt(charsetCardinality(charset)) ** BigInt(wildcardCount(pattern))
  );
}

/** Beyond this many bits the capacity is reported as `cardinality^wildcards`. */
export const MAX_EXACT_CAPACITY_BITS = 4096;

/**
 * Capacity for reports: the exact decimal value while it stays within
 * MAX_EXACT_CAPACITY_BITS, otherwise the unevaluated power, e.g. `62^200000000`.
 */
export function formatCapacity(pattern: Pattern, charset: Charset): string {
  const cardinality = charsetCardinality(charset);
  const wildcards = wildcardCount(pattern);
  if (
    cardinality > 1 &&
    wildcards * Math.log2(cardinality) > MAX_EXACT_CAPACITY_BITS
  ) {
    return `${cardinality}^${wildcards}`;
  }
  return computeCapacity(pattern, charset).toString();
}

/**
 * capacity >= count, multiplying only until the target is reached so the
 * product stays small for long patterns.
 */
export function isFeasible(config: CodegenConfig): boolean {
  const target = BigInt(config.count);
  const base = BigInt(charsetCardinality(config.charset));
  const wildcards = wildcardCount(config.pattern);

  // Capacity is 1 without wildcards or with a one-character pool; an empty
  // pool fills no position.
  if (wildcards === 0 || base === 1n) return target <= 1n;
  if (base === 0n) return target === 0n;

  let capacity = 1n;
  for (let i = 0; i < wildcards && capacity < target; i++) {
    capacity *= base;
  }
  return capacity >= target;
}

function resolveRng(
  config: CodegenConfig,
  options: GenerateOptions
): RandomSource {
  return (
    options.rng ??
    createRandomSource(options.seed, renderTemplate(config.pattern))
  );
}

function renderCandidate(
  template: string,
  pool: readonly string[],
  config: CodegenConfig,
  rng: RandomSource
): string {
  let body = '';
  for (const ch of template) {
    body += ch === WILDCARD ? sampleChar(config.charset, rng, pool) : ch;
  }
  return config.prefix + body + config.postfix;
}

/**
 * Render a single code. No feasibility or uniqueness checks.
 * @throws GenerationError when the pattern has wildcards and the charset is empty
 */
export function generateOne(
  config: CodegenConfig,
  options: GenerateOptions = {}
): string {
  validateConfig(config);
  return renderCandidate(
    renderTemplate(config.pattern),
    charsetPool(config.charset),
    config,
    resolveRng(config, options)
  );
}

/**
 * Generate exactly `config.count` pairwise-distinct codes.
 * @throws ConfigError for a malformed config
 */
export function generate(
  config: CodegenConfig,
  options: GenerateOptions = {}
): Result<string[], FeasibilityError> {
  validateConfig(config);
  const { metrics } = options;

  if (!isFeasible(config)) {
    const capacity = computeCapacity(config.pattern, config.charset);
    return err(
      new FeasibilityError({
        message: `Cannot generate ${config.count} unique codes: pattern "${renderTemplate(
          config.pattern
        )}" allows only ${capacity.toString()} distinct values`,
        context: {
          capacity: capacity.toString(),
          count: config.count,
          cardinality: charsetCardinality(config.charset),
          wildcards: wildcardCount(config.pattern),
        },
      })
    );
  }

  metrics?.recordCapacity(formatCapacity(config.pattern, config.charset));
  metrics?.begin();

  const accepted = new Set<string>();
  if (config.count > 0) {
    const template = renderTemplate(config.pattern);
    const pool = charsetPool(config.charset);
    const rng = resolveRng(config, options);
    while (accepted.size < config.count) {
      const before = accepted.size;
      accepted.add(renderCandidate(template, pool, config, rng));
      metrics?.recordAttempt(accepted.size > before);
    }
  }

  metrics?.end();
  return ok(Array.from(accepted));
}
