import {
  ConfigError,
  ErrorCode,
  Pattern,
  parseCharset,
  type CodegenConfig,
} from '@codemint/core';

export type OutputFormat = 'json' | 'ndjson' | 'text';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  pattern?: string;
  length?: string | number;
  charset?: string;
  count?: string | number;
  n?: string | number;
  seed?: string | number;
  prefix?: string;
  postfix?: string;
  out?: string;
  printMetrics?: boolean;
  debugPasses?: boolean;
}

function invalidArgument(
  setting: string,
  value: unknown,
  message: string
): ConfigError {
  return new ConfigError({
    message,
    errorCode: ErrorCode.INVALID_ARGUMENT,
    context: { setting, value },
  });
}

function parseNonNegativeInt(name: string, value: string | number): number {
  const num = typeof value === 'number' ? value : Number(value.trim());
  if (
    (typeof value === 'string' && value.trim() === '') ||
    !Number.isSafeInteger(num) ||
    num < 0
  ) {
    throw invalidArgument(
      name,
      value,
      `Invalid ${name} value "${String(value)}". Expected a non-negative integer.`
    );
  }
  return num;
}

/**
 * Parse CLI options into a partial CodegenConfig; unset flags fall back to
 * DEFAULT_CONFIG when the result goes through resolveConfig.
 */
export function parseCodegenFlags(options: CliOptions): Partial<CodegenConfig> {
  const config: Partial<CodegenConfig> = {};

  const pattern = resolvePattern(options);
  if (pattern) config.pattern = pattern;

  if (options.charset !== undefined) {
    config.charset = parseCharset(options.charset);
  }

  const count = resolveCount(options);
  if (count !== undefined) config.count = count;

  if (options.prefix !== undefined) config.prefix = options.prefix;
  if (options.postfix !== undefined) config.postfix = options.postfix;

  return config;
}

/**
 * --pattern and --length are mutually exclusive; neither means the default.
 */
export function resolvePattern(
  options: Pick<CliOptions, 'pattern' | 'length'>
): Pattern | undefined {
  if (options.pattern !== undefined && options.length !== undefined) {
    throw invalidArgument(
      'pattern',
      options.pattern,
      'Use either --pattern or --length, not both.'
    );
  }
  if (options.pattern !== undefined) {
    return Pattern.template(options.pattern);
  }
  if (options.length !== undefined) {
    return Pattern.length(parseNonNegativeInt('length', options.length));
  }
  return undefined;
}

/**
 * Resolve --count/-n into a single non-negative integer.
 * When both are given they must agree.
 */
export function resolveCount(
  options: Pick<CliOptions, 'count' | 'n'>
): number | undefined {
  const provided: Array<[string, string | number]> = [];
  if (options.count !== undefined) provided.push(['count', options.count]);
  if (options.n !== undefined) provided.push(['n', options.n]);

  const parsed = provided.map(
    ([name, value]) => [name, parseNonNegativeInt(name, value)] as const
  );
  const first = parsed[0];
  if (!first) return undefined;

  for (const [, value] of parsed) {
    if (value !== first[1]) {
      throw invalidArgument(
        'count',
        options.count,
        'Conflicting count flags (--count, -n) with different values.'
      );
    }
  }
  return first[1];
}

export function resolveSeed(value: unknown): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const num = Number(String(value));
  if (!Number.isInteger(num)) {
    throw invalidArgument(
      'seed',
      value,
      `Invalid --seed value "${String(value)}". Expected an integer.`
    );
  }
  return num;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'json';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'json' || raw === 'ndjson' || raw === 'text') {
    return raw;
  }
  throw invalidArgument(
    'out',
    value,
    `Invalid --out value "${String(
      value
    )}". Supported formats are "json", "ndjson" and "text".`
  );
}
