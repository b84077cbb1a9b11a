import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  FeasibilityError,
  GenerationError,
  InternalError,
  isCodemintError,
} from '../errors.js';
import { ErrorCode } from '../../errors/codes.js';

const feasibility = () =>
  new FeasibilityError({
    message: 'too many',
    context: { capacity: '62', count: 63, cardinality: 62, wildcards: 1 },
  });

describe('error hierarchy', () => {
  it('FeasibilityError maps to NON_FEASIBLE_CONFIG with a suggestion', () => {
    const e = feasibility();
    expect(e.name).toBe('FeasibilityError');
    expect(e.errorCode).toBe(ErrorCode.NON_FEASIBLE_CONFIG);
    expect(e.getExitCode()).toBe(30);
    expect(e.capacity).toBe(62n);
    expect(e.suggestions).toEqual([
      'Lengthen the pattern, widen the charset, or request fewer codes.',
    ]);
  });

  it('subclasses default to their own codes', () => {
    expect(new GenerationError({ message: 'x' }).errorCode).toBe(
      ErrorCode.EMPTY_CHARSET
    );
    expect(new ConfigError({ message: 'x' }).errorCode).toBe(
      ErrorCode.CONFIGURATION_ERROR
    );
    expect(new InternalError({ message: 'x' }).getExitCode()).toBe(99);
  });

  it('keeps the cause', () => {
    const cause = new Error('root');
    const e = new InternalError({ message: 'wrapped', cause });
    expect(e.cause).toBe(cause);
    expect(e.toJSON().cause).toEqual({ name: 'Error', message: 'root' });
  });

  it('toJSON("prod") drops the stack and the raw value', () => {
    const e = new ConfigError({
      message: 'bad count',
      context: { setting: 'count', value: -1 },
    });
    const dev = e.toJSON('dev');
    const prod = e.toJSON('prod');
    expect(dev.stack).toBeDefined();
    expect(dev.context).toEqual({ setting: 'count', value: -1 });
    expect(prod.stack).toBeUndefined();
    expect(prod.context).toEqual({ setting: 'count', value: '[REDACTED]' });
  });

  it('toUserError exposes message, code and setting', () => {
    const e = new ConfigError({
      message: 'bad',
      context: { setting: 'prefix' },
    });
    expect(e.toUserError()).toEqual({
      message: 'bad',
      code: ErrorCode.CONFIGURATION_ERROR,
      severity: 'error',
      setting: 'prefix',
    });
  });

  it('isCodemintError narrows only library errors', () => {
    expect(isCodemintError(feasibility())).toBe(true);
    expect(isCodemintError(new Error('plain'))).toBe(false);
    expect(isCodemintError('string')).toBe(false);
  });
});
