// backend/src/retryPolicy.ts
// Retry ladder for missed and failed calls

import type { RetryUnit } from "./config";

export interface RetryPolicyConfig {
  maxRetries: number;
  intervals: number[]; // Ladder of waits, expressed in `unit`
  unit: RetryUnit;
}

const UNIT_MS: Record<RetryUnit, number> = {
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
};

/**
 * Pure retry decisions for a lead, given its retry count.
 *
 * Counting model:
 * - retryCount is incremented once per missed/failed outcome
 * - a lead with retryCount === maxRetries - 1 is on its final allowed attempt,
 *   so no further retry time is scheduled
 * - retryCount >= maxRetries means retries are exhausted and fallback channels take over
 */
export class RetryPolicy {
  readonly maxRetries: number;
  readonly intervals: number[];
  readonly unit: RetryUnit;

  constructor(config: RetryPolicyConfig) {
    if (config.intervals.length === 0) {
      throw new Error("Retry policy needs at least one interval");
    }
    this.maxRetries = config.maxRetries;
    this.intervals = [...config.intervals];
    this.unit = config.unit;
  }

  canRetry(retryCount: number): boolean {
    return retryCount < this.maxRetries;
  }

  /**
   * When the next attempt should be made, or null if none should be scheduled.
   * Counts past the end of the ladder reuse its last entry.
   */
  nextRetryAt(retryCount: number, now: Date = new Date()): Date | null {
    if (retryCount >= this.maxRetries - 1) {
      return null;
    }

    const index = Math.min(Math.max(retryCount, 0), this.intervals.length - 1);
    const waitMs = this.intervals[index] * UNIT_MS[this.unit];
    return new Date(now.getTime() + waitMs);
  }

  shouldTriggerFallback(retryCount: number): boolean {
    return retryCount >= this.maxRetries;
  }

  describe() {
    return {
      maxRetries: this.maxRetries,
      intervals: this.intervals,
      unit: this.unit,
      ladder: this.intervals.map((value, index) => `attempt ${index + 1}: wait ${value} ${this.unit}`),
    };
  }
}
