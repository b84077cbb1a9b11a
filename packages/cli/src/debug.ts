import type { CodegenConfig, MetricsSnapshot } from '@codemint/core';

/**
 * Print the resolved generation config to stderr.
 * Intended to be used behind the --debug-passes flag.
 */
export function printEffectiveConfig(
  config: Readonly<CodegenConfig>,
  seed: number | undefined
): void {
  process.stderr.write(
    `[codemint] effective config: ${JSON.stringify(
      { ...config, seed: seed ?? null },
      null,
      2
    )}\n`
  );
}

export function printMetrics(snapshot: MetricsSnapshot): void {
  process.stderr.write(`[codemint] metrics: ${JSON.stringify(snapshot)}\n`);
}
