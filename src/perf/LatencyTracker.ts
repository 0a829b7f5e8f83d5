export interface PassLatencySample {
  /** Duration of the audio window sent to the engine. */
  windowMs: number;
  asrMs: number;
  injectMs: number;
  /** Tick start to injected text. */
  passMs: number;
}

interface PercentileSummary {
  p50: number;
  p95: number;
  max: number;
  avg: number;
}

export interface LatencySummary {
  passes: number;
  skippedTicks: number;
  windowMs: PercentileSummary;
  asrMs: PercentileSummary;
  injectMs: PercentileSummary;
  passMs: PercentileSummary;
}

const asSummary = (values: number[]): PercentileSummary => {
  if (values.length === 0) {
    return { p50: 0, p95: 0, max: 0, avg: 0 };
  }

  const sorted = [...values].sort((a, b) => a - b);
  const pick = (pct: number): number => {
    const index = Math.min(sorted.length - 1, Math.max(0, Math.ceil(sorted.length * pct) - 1));
    return sorted[index];
  };
  const total = sorted.reduce((sum, value) => sum + value, 0);

  return {
    p50: Math.round(pick(0.5)),
    p95: Math.round(pick(0.95)),
    max: Math.round(sorted[sorted.length - 1]),
    avg: Math.round(total / sorted.length)
  };
};

export class LatencyTracker {
  private samples: PassLatencySample[] = [];
  private skippedTicks = 0;

  public reset(): void {
    this.samples = [];
    this.skippedTicks = 0;
  }

  public push(sample: PassLatencySample): void {
    this.samples.push(sample);
  }

  /** A scheduled tick dropped because the previous call was still running. */
  public recordSkippedTick(): void {
    this.skippedTicks += 1;
  }

  public summarize(): LatencySummary {
    return {
      passes: this.samples.length,
      skippedTicks: this.skippedTicks,
      windowMs: asSummary(this.samples.map((sample) => sample.windowMs)),
      asrMs: asSummary(this.samples.map((sample) => sample.asrMs)),
      injectMs: asSummary(this.samples.map((sample) => sample.injectMs)),
      passMs: asSummary(this.samples.map((sample) => sample.passMs))
    };
  }
}
