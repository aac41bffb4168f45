// Stage timer - wall-clock start/end per stage for observability
// Read-only to the aggregation layer; nothing numeric depends on it

import type { StageName, StageTiming, StageTimings } from '../types/analysis.js';

export type Clock = () => number;

export class StageTimer {
  private timings = new Map<StageName, StageTiming>();

  constructor(private readonly clock: Clock = Date.now) {}

  start(stage: StageName): void {
    this.timings.set(stage, { startedAt: this.clock() });
  }

  /** Close a stage; a stage that was never started is recorded as zero-length */
  end(stage: StageName): number {
    const now = this.clock();
    const startedAt = this.timings.get(stage)?.startedAt ?? now;
    const elapsedMs = now - startedAt;
    this.timings.set(stage, { startedAt, endedAt: now, elapsedMs });
    return elapsedMs;
  }

  async time<T>(stage: StageName, fn: () => Promise<T>): Promise<T> {
    this.start(stage);
    try {
      return await fn();
    } finally {
      this.end(stage);
    }
  }

  /** Elapsed time of a finished stage, or time so far for a running one */
  elapsedMs(stage: StageName): number | undefined {
    const timing = this.timings.get(stage);
    if (!timing) return undefined;
    return timing.elapsedMs ?? this.clock() - timing.startedAt;
  }

  snapshot(): StageTimings {
    const out: StageTimings = {};
    for (const [stage, timing] of this.timings) {
      out[stage] = { ...timing };
    }
    return Object.freeze(out);
  }
}
