/**
 * Configuration for a code generation run
 *
 * All fields are optional on input and resolved against DEFAULT_CONFIG.
 * A resolved config is frozen; derive a new one with resolveConfig({...old, ...changes}).
 */

import { Charset } from '../generator/charset.js';
import { Pattern } from '../generator/pattern.js';
import { ConfigError } from './errors.js';

export interface CodegenConfig {
  /** Template of literal and fill positions (default: length 8) */
  pattern: Pattern;
  /** Number of distinct codes requested (default: 1) */
  count: number;
  /** Pool wildcard positions are drawn from (default: alphanumeric) */
  charset: Charset;
  /** Literal text prepended to every code (default: '') */
  prefix: string;
  /** Literal text appended to every code (default: '') */
  postfix: string;
}

export const DEFAULT_CONFIG: Readonly<CodegenConfig> = Object.freeze({
  pattern: Pattern.length(8),
  count: 1,
  charset: Charset.alphanumeric(),
  prefix: '',
  postfix: '',
});

export function resolveConfig(
  userConfig: Partial<CodegenConfig> = {}
): Readonly<CodegenConfig> {
  const resolved: CodegenConfig = {
    pattern: userConfig.pattern ?? DEFAULT_CONFIG.pattern,
    count: userConfig.count ?? DEFAULT_CONFIG.count,
    charset: userConfig.charset ?? DEFAULT_CONFIG.charset,
    prefix: userConfig.prefix ?? DEFAULT_CONFIG.prefix,
    postfix: userConfig.postfix ?? DEFAULT_CONFIG.postfix,
  };

  validateConfig(resolved);

  return Object.freeze(resolved);
}

/**
 * @throws ConfigError naming the offending setting
 */
export function validateConfig(config: CodegenConfig): void {
  if (!Number.isSafeInteger(config.count) || config.count < 0) {
    throw new ConfigError({
      message: `Invalid count ${String(config.count)}. Expected a non-negative integer.`,
      context: { setting: 'count', value: config.count },
    });
  }

  if (
    config.pattern.kind === 'length' &&
    (!Number.isSafeInteger(config.pattern.length) || config.pattern.length < 0)
  ) {
    throw new ConfigError({
      message: `Invalid pattern length ${String(config.pattern.length)}. Expected a non-negative integer.`,
      context: { setting: 'pattern', value: config.pattern.length },
    });
  }

  if (typeof config.prefix !== 'string') {
    throw new ConfigError({
      message: 'prefix must be a string',
      context: { setting: 'prefix', value: config.prefix },
    });
  }
  if (typeof config.postfix !== 'string') {
    throw new ConfigError({
      message: 'postfix must be a string',
      context: { setting: 'postfix', value: config.postfix },
    });
  }
}
