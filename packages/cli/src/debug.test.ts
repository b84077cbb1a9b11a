import { describe, it, expect, vi, afterEach } from 'vitest';
import { Pattern, resolveConfig } from '@codemint/core';

import { printEffectiveConfig, printMetrics } from './debug.js';

describe('debug output', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints the effective config with the seed', () => {
    const spy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);

    printEffectiveConfig(
      resolveConfig({ pattern: Pattern.template('A#'), count: 2 }),
      undefined
    );

    const output = spy.mock.calls.map((call) => String(call[0])).join('');
    expect(output).toBe(
      `[codemint] effective config: ${JSON.stringify(
        {
          pattern: { kind: 'template', template: 'A#' },
          count: 2,
          charset: { kind: 'alphanumeric' },
          prefix: '',
          postfix: '',
          seed: null,
        },
        null,
        2
      )}\n`
    );
  });

  it('prints metrics on one line', () => {
    const spy = vi
      .spyOn(process.stderr, 'write')
      .mockImplementation(() => true);

    printMetrics({ generateMs: 1, attempts: 3, collisions: 1, accepted: 2 });

    expect(spy).toHaveBeenCalledWith(
      '[codemint] metrics: {"generateMs":1,"attempts":3,"collisions":1,"accepted":2}\n'
    );
  });
});
