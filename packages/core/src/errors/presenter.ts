/**
 * ErrorPresenter - pure presentation layer for CodemintError instances
 * - No business logic; formats into environment-specific view objects
 */

import { getHttpStatus, type ErrorCode } from './codes.js';
import type { CodemintError } from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  setting?: string;
  excerpt?: string;
  workaround?: string;
  details?: string;
  colors: boolean;
  terminalWidth: number;
}

export interface APIErrorView {
  status: number;
  title: string;
  detail: string;
  code: ErrorCode;
  suggestions: string[];
}

export class ErrorPresenter {
  constructor(
    private readonly env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: CodemintError): CLIErrorView {
    return {
      title: `Error ${error.errorCode}: ${error.message}`,
      code: error.errorCode,
      setting: error.context?.setting,
      excerpt: this.#formatExcerpt(error),
      workaround: this.#formatWorkaround(error),
      details: this.env === 'dev' ? this.#formatDetails(error) : undefined,
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.options.terminalWidth || process.stdout?.columns || 80,
    };
  }

  formatForAPI(error: CodemintError): APIErrorView {
    return {
      status: getHttpStatus(error.errorCode),
      title: error.message,
      detail: this.#formatDetails(error) ?? error.message,
      code: error.errorCode,
      suggestions: error.suggestions ?? [],
    };
  }

  #formatExcerpt(error: CodemintError): string | undefined {
    const excerpt = error.context?.valueExcerpt;
    if (excerpt !== undefined) return excerpt;
    const value = error.context?.value;
    if (typeof value === 'string' || typeof value === 'number') {
      return String(value);
    }
    return undefined;
  }

  #formatWorkaround(error: CodemintError): string | undefined {
    if (Array.isArray(error.suggestions) && error.suggestions.length > 0) {
      return error.suggestions[0];
    }
    return error.context?.suggestion;
  }

  // Feasibility failures carry the numbers that produced them
  #formatDetails(error: CodemintError): string | undefined {
    const ctx = error.context;
    if (!ctx || ctx.capacity === undefined) return undefined;
    return `capacity=${String(ctx.capacity)} count=${String(
      ctx.count
    )} cardinality=${String(ctx.cardinality)} wildcards=${String(
      ctx.wildcards
    )}`;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    if (typeof opt === 'undefined') return this.env === 'dev';
    return opt;
  }
}

export default ErrorPresenter;
