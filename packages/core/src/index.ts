// @codemint/core entry point
//
// Public API:
// - generate(config) / generateOne(config): the generation entry points.
// - Charset / Pattern variants and their helpers, resolveConfig + DEFAULT_CONFIG.
// - Result, the error hierarchy with stable codes, and the ErrorPresenter used by the CLI.
// - Seeded RNG and the MetricsCollector for callers that want reproducible or measured runs.

export * from './generator/index.js';

export {
  resolveConfig,
  validateConfig,
  DEFAULT_CONFIG,
  type CodegenConfig,
} from './types/config.js';
export {
  type Result,
  Ok,
  Err,
  ok,
  err,
  isOk,
  isErr,
} from './types/result.js';
export {
  CodemintError,
  FeasibilityError,
  GenerationError,
  ConfigError,
  InternalError,
  isCodemintError,
  type ErrorContext,
  type ErrorParams,
  type SerializedError,
  type UserError,
} from './types/errors.js';

// Errors
export {
  ErrorCode,
  type Severity,
  getExitCode,
  getHttpStatus,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type APIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';

export {
  XorShift32,
  createRandomSource,
  fnv1a32,
  type RandomSource,
} from './util/rng.js';
export {
  MetricsCollector,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';
