// ============================================
// Tick Telemetry
// Rolling tick-time statistics for the performance log
// ============================================

export interface TickStatsSummary {
  tickCount: number;
  avgMs: number;
  minMs: number;
  maxMs: number;
  p50Ms: number;
  p95Ms: number;
  p99Ms: number;
  budgetUsedPct: number;
}

/**
 * Collects per-tick processing times between perf log lines
 */
export class TickStats {
  private samples: number[] = [];

  constructor(private readonly budgetMs: number) {}

  record(ms: number): void {
    this.samples.push(ms);
  }

  get count(): number {
    return this.samples.length;
  }

  /**
   * Summarize and reset. Null when nothing was recorded.
   */
  flush(): TickStatsSummary | null {
    if (this.samples.length === 0) return null;

    const sorted = [...this.samples].sort((a, b) => a - b);
    const at = (q: number) => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))];
    const avgMs = sorted.reduce((a, b) => a + b, 0) / sorted.length;

    const summary: TickStatsSummary = {
      tickCount: sorted.length,
      avgMs,
      minMs: sorted[0],
      maxMs: sorted[sorted.length - 1],
      p50Ms: at(0.5),
      p95Ms: at(0.95),
      p99Ms: at(0.99),
      budgetUsedPct: (avgMs / this.budgetMs) * 100,
    };
    this.samples = [];
    return summary;
  }
}
