export const LATENCY_SMOOTHING = 0.2;

export interface MetricsSnapshot {
  eventsProcessed: number;
  errors: number;
  lastProcessed: number | null;
  latencyAvg: number;
}

/**
 * Running counters for one topic.
 * latencyAvg is an EMA over successful outcomes only.
 */
export class MetricsRecorder {
  private eventsProcessed = 0;
  private errors = 0;
  private lastProcessed: number | null = null;
  private latencyAvg = 0;

  constructor(private readonly now: () => number = Date.now) {}

  record(success: boolean, latencyMs = 0): void {
    this.eventsProcessed += 1;
    this.lastProcessed = this.now();

    if (!success) {
      this.errors += 1;
      return;
    }
    this.latencyAvg = LATENCY_SMOOTHING * latencyMs + (1 - LATENCY_SMOOTHING) * this.latencyAvg;
  }

  snapshot(): MetricsSnapshot {
    return {
      eventsProcessed: this.eventsProcessed,
      errors: this.errors,
      lastProcessed: this.lastProcessed,
      latencyAvg: this.latencyAvg,
    };
  }
}
