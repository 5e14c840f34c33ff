/**
 * Threshold Set
 * One independent threshold category of a quality gate: four issue count
 * limits (all, high, normal, low) and their evaluation
 */

import { SEVERITIES } from '@quality-gate/shared';
import type { Severity, SeverityCounts, ThresholdValues } from '@quality-gate/shared';

// ============================================================================
// Threshold Result
// ============================================================================

/**
 * Outcome of evaluating one threshold set against a four-tuple of counts
 */
export class ThresholdResult {
  constructor(
    readonly totalReached: boolean,
    readonly highReached: boolean,
    readonly normalReached: boolean,
    readonly lowReached: boolean
  ) {}

  /**
   * Whether no limit of the set has been reached
   */
  get success(): boolean {
    return !this.totalReached && !this.highReached && !this.normalReached && !this.lowReached;
  }

  /**
   * Whether the limit of the given severity channel has been reached
   */
  isReached(severity: Severity): boolean {
    switch (severity) {
      case 'all':
        return this.totalReached;
      case 'high':
        return this.highReached;
      case 'normal':
        return this.normalReached;
      case 'low':
        return this.lowReached;
    }
  }
}

// ============================================================================
// Threshold Set
// ============================================================================

/**
 * A limit is reached only when it is enabled (non-zero) and the count
 * meets or exceeds it. A limit of 0 never triggers, not even for 0 issues.
 */
function isLimitReached(limit: number, count: number): boolean {
  return limit > 0 && count >= limit;
}

/**
 * Immutable set of four issue count limits. A limit of 0 is disabled.
 */
export class ThresholdSet {
  constructor(
    readonly totalThreshold: number,
    readonly highThreshold: number,
    readonly normalThreshold: number,
    readonly lowThreshold: number
  ) {}

  /**
   * Threshold set with every limit disabled
   */
  static disabled(): ThresholdSet {
    return new ThresholdSet(0, 0, 0, 0);
  }

  /**
   * Create a threshold set from severity-indexed values
   */
  static fromValues(values: Partial<ThresholdValues>): ThresholdSet {
    return new ThresholdSet(values.all ?? 0, values.high ?? 0, values.normal ?? 0, values.low ?? 0);
  }

  /**
   * Whether at least one limit is enabled
   */
  get enabled(): boolean {
    return SEVERITIES.some((severity) => this.limitFor(severity) > 0);
  }

  /**
   * Limit of the given severity channel
   */
  limitFor(severity: Severity): number {
    switch (severity) {
      case 'all':
        return this.totalThreshold;
      case 'high':
        return this.highThreshold;
      case 'normal':
        return this.normalThreshold;
      case 'low':
        return this.lowThreshold;
    }
  }

  toValues(): ThresholdValues {
    return {
      all: this.totalThreshold,
      high: this.highThreshold,
      normal: this.normalThreshold,
      low: this.lowThreshold,
    };
  }

  /**
   * Evaluate the observed counts against the four limits
   *
   * Each severity channel is evaluated independently. Counts are expected to
   * be non-negative integers; other values are not checked here.
   */
  evaluate(total: number, high: number, normal: number, low: number): ThresholdResult {
    return new ThresholdResult(
      isLimitReached(this.totalThreshold, total),
      isLimitReached(this.highThreshold, high),
      isLimitReached(this.normalThreshold, normal),
      isLimitReached(this.lowThreshold, low)
    );
  }

  evaluateCounts(counts: SeverityCounts): ThresholdResult {
    return this.evaluate(counts.all, counts.high, counts.normal, counts.low);
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof ThresholdSet)) {
      return false;
    }
    return (
      this.totalThreshold === other.totalThreshold &&
      this.highThreshold === other.highThreshold &&
      this.normalThreshold === other.normalThreshold &&
      this.lowThreshold === other.lowThreshold
    );
  }

  /**
   * Structural 32-bit hash, equal for equal sets
   */
  hashCode(): number {
    let result = this.totalThreshold | 0;
    result = (31 * result + this.highThreshold) | 0;
    result = (31 * result + this.normalThreshold) | 0;
    result = (31 * result + this.lowThreshold) | 0;
    return result;
  }
}

// ============================================================================
// Threshold Set Builder
// ============================================================================

/**
 * Mutable accumulator for {@link ThresholdSet} values, all defaulting to 0.
 *
 * `build()` snapshots the current values, so a builder keeps its last-set
 * values across builds. Do not share one instance between concurrent
 * configuration sequences.
 */
export class ThresholdSetBuilder {
  private totalThreshold = 0;
  private highThreshold = 0;
  private normalThreshold = 0;
  private lowThreshold = 0;

  setTotalThreshold(totalThreshold: number): this {
    this.totalThreshold = totalThreshold;
    return this;
  }

  setHighThreshold(highThreshold: number): this {
    this.highThreshold = highThreshold;
    return this;
  }

  setNormalThreshold(normalThreshold: number): this {
    this.normalThreshold = normalThreshold;
    return this;
  }

  setLowThreshold(lowThreshold: number): this {
    this.lowThreshold = lowThreshold;
    return this;
  }

  build(): ThresholdSet {
    return new ThresholdSet(this.totalThreshold, this.highThreshold, this.normalThreshold, this.lowThreshold);
  }
}
