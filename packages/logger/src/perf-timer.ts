/**
 * @fileoverview Performance timing utilities for measuring pipeline stages.
 * Uses performance.now() for high-resolution measurements.
 */

/**
 * Performance timer for measuring operation durations
 */
export interface PerfTimer {
  /** Start time in milliseconds (high-resolution) */
  readonly startTime: number;

  /** Elapsed milliseconds since the timer started, or until it was stopped */
  elapsed(): number;

  /** Stops the timer and returns the final duration in milliseconds */
  stop(): number;

  isRunning(): boolean;
}

interface TimerState {
  startTime: number;
  endTime: number | null;
}

/**
 * Create a new performance timer
 *
 * @example
 * ```typescript
 * const timer = startTimer();
 * const ranked = await aggregateRevenue(observations, 800);
 * logger.info('Aggregation complete', { duration_ms: timer.stop() });
 * ```
 */
export function startTimer(): PerfTimer {
  const state: TimerState = {
    startTime: performance.now(),
    endTime: null,
  };

  return {
    get startTime() {
      return state.startTime;
    },

    elapsed(): number {
      const endTime = state.endTime ?? performance.now();
      return Math.round(endTime - state.startTime);
    },

    stop(): number {
      if (state.endTime === null) {
        state.endTime = performance.now();
      }
      return Math.round(state.endTime - state.startTime);
    },

    isRunning(): boolean {
      return state.endTime === null;
    },
  };
}

/**
 * Records the duration of each named pipeline stage, in the order the
 * stages were started.
 */
export class StageTimings {
  private readonly timers = new Map<string, PerfTimer>();

  /**
   * @throws Error if a stage with this name is already running
   */
  start(stage: string): PerfTimer {
    const existing = this.timers.get(stage);
    if (existing?.isRunning()) {
      throw new Error(`Stage "${stage}" is already running`);
    }

    const timer = startTimer();
    this.timers.set(stage, timer);
    return timer;
  }

  /**
   * @throws Error if the stage was never started
   */
  stop(stage: string): number {
    const timer = this.timers.get(stage);
    if (!timer) {
      throw new Error(`Stage "${stage}" does not exist`);
    }
    return timer.stop();
  }

  /** Durations in milliseconds keyed by stage name */
  toJSON(): Record<string, number> {
    const durations: Record<string, number> = {};
    for (const [stage, timer] of this.timers) {
      durations[stage] = timer.elapsed();
    }
    return durations;
  }
}
