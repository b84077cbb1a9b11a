import { performance } from 'node:perf_hooks';

export interface MetricsSnapshot {
  generateMs: number;
  /** Candidates rendered, including rejected duplicates */
  attempts: number;
  /** Candidates rejected because they were already accepted */
  collisions: number;
  accepted: number;
  /** Decimal string, or `cardinality^wildcards` once it grows too large */
  capacity?: string;
}

const DEFAULT_COUNTERS: MetricsSnapshot = {
  generateMs: 0,
  attempts: 0,
  collisions: 0,
  accepted: 0,
};

export interface MetricsCollectorOptions {
  enabled?: boolean;
  now?: () => number;
}

export class MetricsCollector {
  private readonly enabled: boolean;
  private readonly now: () => number;
  private counters: MetricsSnapshot = { ...DEFAULT_COUNTERS };
  private startedAt: number | undefined;

  constructor(options: MetricsCollectorOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => performance.now());
  }

  begin(): void {
    if (!this.enabled) return;
    this.startedAt = this.now();
  }

  end(): void {
    if (!this.enabled || this.startedAt === undefined) return;
    this.counters.generateMs += this.now() - this.startedAt;
    this.startedAt = undefined;
  }

  recordAttempt(accepted: boolean): void {
    if (!this.enabled) return;
    this.counters.attempts += 1;
    if (accepted) {
      this.counters.accepted += 1;
    } else {
      this.counters.collisions += 1;
    }
  }

  recordCapacity(capacity: string): void {
    if (!this.enabled) return;
    this.counters.capacity = capacity;
  }

  snapshot(): MetricsSnapshot {
    return { ...this.counters };
  }

  reset(): void {
    this.counters = { ...DEFAULT_COUNTERS };
    this.startedAt = undefined;
  }
}
