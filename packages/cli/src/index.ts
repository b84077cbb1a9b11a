#!/usr/bin/env node

// CLI entry point
// - Command name: `codemint` with subcommands `generate` and `capacity`.
// - `generate` maps --pattern/--length, --charset, --count/-n, --prefix/--postfix onto a
//   CodegenConfig, calls generate() from @codemint/core and prints JSON/NDJSON/text.
// - `capacity` reports how many distinct codes a pattern/charset pair allows without
//   generating anything.

import { Command } from 'commander';
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  InternalError,
  MetricsCollector,
  charsetCardinality,
  formatCapacity,
  generate,
  isCodemintError,
  isErr,
  isFeasible,
  renderTemplate,
  resolveConfig,
  wildcardCount,
  type CodemintError,
} from '@codemint/core';
import { renderCLIView, renderCodes } from './render.js';
import {
  parseCodegenFlags,
  resolveOutputFormat,
  resolveSeed,
  type CliOptions,
} from './flags.js';
import { printEffectiveConfig, printMetrics } from './debug.js';

function addConfigOptions(command: Command): Command {
  return command
    .option(
      '-p, --pattern <template>',
      'Template where # marks a random position'
    )
    .option('-l, --length <number>', 'Fixed number of random positions')
    .option(
      '--charset <spec>',
      'Charset: numeric|alphabetic|alphanumeric|custom:<chars>'
    )
    .option('-c, --count <number>', 'Number of unique codes')
    .option('-n, --n <number>', 'Alias for --count')
    .option('--prefix <text>', 'Literal text before every code')
    .option('--postfix <text>', 'Literal text after every code');
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('codemint')
    .description('Generate unique pattern-constrained codes')
    .version('0.1.0');

  addConfigOptions(program.command('generate'))
    .description('Generate unique codes')
    .option('--seed <number>', 'Deterministic seed')
    .option('--out <format>', 'Output format: json|ndjson|text', 'json')
    .option(
      '--print-metrics',
      'Print generation metrics as JSON to stderr',
      false
    )
    .option('--debug-passes', 'Print effective configuration to stderr')
    .action(function (options: CliOptions) {
      try {
        const config = resolveConfig(parseCodegenFlags(options));
        const seed = resolveSeed(options.seed);
        const outFormat = resolveOutputFormat(options.out);

        if (options.debugPasses) {
          printEffectiveConfig(config, seed);
        }

        const metrics = new MetricsCollector({
          enabled: options.printMetrics === true,
        });
        const result = generate(config, { seed, metrics });
        if (isErr(result)) throw result.error;

        process.stdout.write(renderCodes(result.value, outFormat));

        if (options.printMetrics === true) {
          printMetrics(metrics.snapshot());
        }
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  addConfigOptions(program.command('capacity'))
    .description('Report how many distinct codes a pattern and charset allow')
    .action(function (options: CliOptions) {
      try {
        const config = resolveConfig(parseCodegenFlags(options));
        const report = {
          template:
            config.prefix + renderTemplate(config.pattern) + config.postfix,
          cardinality: charsetCardinality(config.charset),
          wildcards: wildcardCount(config.pattern),
          capacity: formatCapacity(config.pattern, config.charset),
          count: config.count,
          feasible: isFeasible(config),
        };
        process.stdout.write(JSON.stringify(report, null, 2) + '\n');
      } catch (err: unknown) {
        handleCliError(err);
      }
    });

  return program;
}

export function handleCliError(err: unknown): never {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: CodemintError;
  if (isCodemintError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const argvEntry = process.argv[1];
const entryFile =
  typeof argvEntry === 'string' && fs.existsSync(argvEntry)
    ? fs.realpathSync(argvEntry)
    : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
