/**
 * Error hierarchy for codemint
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  setting?: string; // Config key the error refers to (e.g., 'count')
  value?: unknown; // Problematic value
  valueExcerpt?: string; // Safe excerpt of value
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface UserError {
  message: string;
  code: ErrorCode;
  severity: Severity;
  setting?: string;
}

export interface ErrorParams<C extends ErrorContext = ErrorContext> {
  message: string;
  errorCode?: ErrorCode;
  severity?: Severity;
  context?: C;
  cause?: Error;
}

/**
 * Base error class for all codemint errors
 */
export abstract class CodemintError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public override readonly cause?: Error;

  public suggestions?: string[];
  public documentation?: string;

  constructor(params: ErrorParams & { errorCode: ErrorCode }) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack and full context
   * - prod: excludes stack and drops context.value
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: env === 'prod' ? this.#redactContext(this.context) : this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Return a minimal, safe structure for external exposure */
  toUserError(): UserError {
    return {
      message: this.message,
      code: this.errorCode,
      severity: this.severity,
      setting: this.context?.setting,
    };
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }

  #redactContext(context?: ErrorContext): ErrorContext | undefined {
    if (!context || !('value' in context)) return context;
    const { value: _value, ...rest } = context;
    return { ...rest, value: '[REDACTED]' };
  }
}

/**
 * Raised when charset^wildcards cannot hold the requested number of codes
 */
export class FeasibilityError extends CodemintError {
  constructor(
    params: ErrorParams<
      ErrorContext & {
        capacity: string;
        count: number;
        cardinality: number;
        wildcards: number;
      }
    >
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.NON_FEASIBLE_CONFIG,
    });
    this.suggestions = [
      'Lengthen the pattern, widen the charset, or request fewer codes.',
    ];
  }

  get capacity(): bigint {
    return BigInt(String(this.context?.capacity ?? '0'));
  }
}

/**
 * Errors raised while rendering a code (e.g., sampling an empty pool)
 */
export class GenerationError extends CodemintError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.EMPTY_CHARSET,
    });
  }
}

/**
 * Configuration and argument errors
 */
export class ConfigError extends CodemintError {
  constructor(params: ErrorParams<ErrorContext & { setting?: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Catch-all for unexpected failures surfaced at the CLI boundary
 */
export class InternalError extends CodemintError {
  constructor(params: ErrorParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR,
    });
  }
}

export function isCodemintError(error: unknown): error is CodemintError {
  return error instanceof CodemintError;
}
