/**
 * Quality Gate
 * Composes four threshold categories and evaluates an analysis run against
 * them, producing a build verdict and the list of violated limits
 */

import { SEVERITIES, THRESHOLD_CATEGORIES } from '@quality-gate/shared';
import type {
  AnalysisRunCounts,
  QualityGateThresholds,
  QualityGateVerdict,
  Severity,
  ThresholdCategory,
} from '@quality-gate/shared';
import { CATEGORY_INFO, countsForScope } from './categories.js';
import { formatViolationMessage } from './messages.js';
import { ThresholdSet, type ThresholdResult } from './threshold-set.js';

// ============================================================================
// Quality Gate Result
// ============================================================================

/**
 * A reached limit of one category
 */
export interface Violation {
  category: ThresholdCategory;
  severity: Severity;
  /** Verdict raised by the category */
  verdict: Exclude<QualityGateVerdict, 'SUCCESS'>;
  /** Count observed when the run was evaluated */
  observed: number;
  limit: number;
  message: string;
}

/**
 * Result of a {@link QualityGate} evaluation for one analysis run
 */
export class QualityGateResult {
  /** Counts the result was computed from, detached from the caller's object */
  readonly run: Readonly<AnalysisRunCounts>;

  /**
   * One entry per reached limit, ordered by category
   * (total failed, total unstable, new failed, new unstable) and then by
   * severity (all, high, normal, low)
   */
  readonly violations: readonly Violation[];

  constructor(
    readonly totalFailed: ThresholdResult,
    readonly totalUnstable: ThresholdResult,
    readonly newFailed: ThresholdResult,
    readonly newUnstable: ThresholdResult,
    readonly gate: QualityGate,
    run: AnalysisRunCounts
  ) {
    this.run = Object.freeze({ ...run });
    this.violations = Object.freeze(this.collectViolations());
  }

  resultFor(category: ThresholdCategory): ThresholdResult {
    switch (category) {
      case 'totalFailed':
        return this.totalFailed;
      case 'totalUnstable':
        return this.totalUnstable;
      case 'newFailed':
        return this.newFailed;
      case 'newUnstable':
        return this.newUnstable;
    }
  }

  /**
   * Overall verdict: FAILURE dominates UNSTABLE, which dominates SUCCESS
   */
  get overallResult(): QualityGateVerdict {
    if (!this.totalFailed.success || !this.newFailed.success) {
      return 'FAILURE';
    }
    if (!this.totalUnstable.success || !this.newUnstable.success) {
      return 'UNSTABLE';
    }
    return 'SUCCESS';
  }

  get successful(): boolean {
    return this.overallResult === 'SUCCESS';
  }

  /**
   * Violation messages in {@link QualityGateResult.violations} order
   */
  get messages(): string[] {
    return this.violations.map((violation) => violation.message);
  }

  private collectViolations(): Violation[] {
    const violations: Violation[] = [];

    for (const category of THRESHOLD_CATEGORIES) {
      const { scope, verdict } = CATEGORY_INFO[category];
      const result = this.resultFor(category);
      const thresholds = this.gate.thresholdFor(category);
      const counts = countsForScope(this.run, scope);

      for (const severity of SEVERITIES) {
        if (result.isReached(severity)) {
          const observed = counts[severity];
          const limit = thresholds.limitFor(severity);
          violations.push({
            category,
            severity,
            verdict,
            observed,
            limit,
            message: formatViolationMessage(verdict, scope, severity, observed, limit),
          });
        }
      }
    }

    return violations;
  }
}

// ============================================================================
// Quality Gate
// ============================================================================

/**
 * Defines the quality gate of a static analysis run
 */
export class QualityGate {
  constructor(
    readonly totalFailedThreshold: ThresholdSet,
    readonly totalUnstableThreshold: ThresholdSet,
    readonly newFailedThreshold: ThresholdSet,
    readonly newUnstableThreshold: ThresholdSet
  ) {}

  /**
   * Create a quality gate from the flat 16-value configuration.
   * Missing values are 0 (disabled).
   */
  static fromThresholds(thresholds: Partial<QualityGateThresholds>): QualityGate {
    return new QualityGate(
      new ThresholdSet(
        thresholds.failedTotalAll ?? 0,
        thresholds.failedTotalHigh ?? 0,
        thresholds.failedTotalNormal ?? 0,
        thresholds.failedTotalLow ?? 0
      ),
      new ThresholdSet(
        thresholds.unstableTotalAll ?? 0,
        thresholds.unstableTotalHigh ?? 0,
        thresholds.unstableTotalNormal ?? 0,
        thresholds.unstableTotalLow ?? 0
      ),
      new ThresholdSet(
        thresholds.failedNewAll ?? 0,
        thresholds.failedNewHigh ?? 0,
        thresholds.failedNewNormal ?? 0,
        thresholds.failedNewLow ?? 0
      ),
      new ThresholdSet(
        thresholds.unstableNewAll ?? 0,
        thresholds.unstableNewHigh ?? 0,
        thresholds.unstableNewNormal ?? 0,
        thresholds.unstableNewLow ?? 0
      )
    );
  }

  /**
   * Quality gate with every category disabled
   */
  static disabled(): QualityGate {
    return new QualityGateBuilder().build();
  }

  /**
   * Whether at least one limit of any category is enabled
   */
  get enabled(): boolean {
    return (
      this.totalFailedThreshold.enabled ||
      this.totalUnstableThreshold.enabled ||
      this.newFailedThreshold.enabled ||
      this.newUnstableThreshold.enabled
    );
  }

  thresholdFor(category: ThresholdCategory): ThresholdSet {
    switch (category) {
      case 'totalFailed':
        return this.totalFailedThreshold;
      case 'totalUnstable':
        return this.totalUnstableThreshold;
      case 'newFailed':
        return this.newFailedThreshold;
      case 'newUnstable':
        return this.newUnstableThreshold;
    }
  }

  /**
   * Enforce this quality gate for the specified run
   */
  evaluate(run: AnalysisRunCounts): QualityGateResult {
    const total = countsForScope(run, 'total');
    const added = countsForScope(run, 'new');

    return new QualityGateResult(
      this.totalFailedThreshold.evaluateCounts(total),
      this.totalUnstableThreshold.evaluateCounts(total),
      this.newFailedThreshold.evaluateCounts(added),
      this.newUnstableThreshold.evaluateCounts(added),
      this,
      run
    );
  }

  /**
   * Flat 16-value view, the inverse of {@link QualityGate.fromThresholds}
   */
  toThresholds(): QualityGateThresholds {
    const totalFailed = this.totalFailedThreshold;
    const totalUnstable = this.totalUnstableThreshold;
    const newFailed = this.newFailedThreshold;
    const newUnstable = this.newUnstableThreshold;

    return {
      failedTotalAll: totalFailed.totalThreshold,
      failedTotalHigh: totalFailed.highThreshold,
      failedTotalNormal: totalFailed.normalThreshold,
      failedTotalLow: totalFailed.lowThreshold,
      unstableTotalAll: totalUnstable.totalThreshold,
      unstableTotalHigh: totalUnstable.highThreshold,
      unstableTotalNormal: totalUnstable.normalThreshold,
      unstableTotalLow: totalUnstable.lowThreshold,
      failedNewAll: newFailed.totalThreshold,
      failedNewHigh: newFailed.highThreshold,
      failedNewNormal: newFailed.normalThreshold,
      failedNewLow: newFailed.lowThreshold,
      unstableNewAll: newUnstable.totalThreshold,
      unstableNewHigh: newUnstable.highThreshold,
      unstableNewNormal: newUnstable.normalThreshold,
      unstableNewLow: newUnstable.lowThreshold,
    };
  }

  equals(other: unknown): boolean {
    if (this === other) {
      return true;
    }
    if (!(other instanceof QualityGate)) {
      return false;
    }
    return THRESHOLD_CATEGORIES.every((category) =>
      this.thresholdFor(category).equals(other.thresholdFor(category))
    );
  }

  hashCode(): number {
    let result = this.totalUnstableThreshold.hashCode();
    result = (31 * result + this.totalFailedThreshold.hashCode()) | 0;
    result = (31 * result + this.newUnstableThreshold.hashCode()) | 0;
    result = (31 * result + this.newFailedThreshold.hashCode()) | 0;
    return result;
  }
}

// ============================================================================
// Quality Gate Builder
// ============================================================================

/**
 * Creates {@link QualityGate} instances one category at a time.
 * Categories that are not set stay disabled.
 */
export class QualityGateBuilder {
  private totalFailedThreshold = ThresholdSet.disabled();
  private totalUnstableThreshold = ThresholdSet.disabled();
  private newFailedThreshold = ThresholdSet.disabled();
  private newUnstableThreshold = ThresholdSet.disabled();

  setTotalFailedThreshold(totalFailedThreshold: ThresholdSet): this {
    this.totalFailedThreshold = totalFailedThreshold;
    return this;
  }

  setTotalUnstableThreshold(totalUnstableThreshold: ThresholdSet): this {
    this.totalUnstableThreshold = totalUnstableThreshold;
    return this;
  }

  setNewFailedThreshold(newFailedThreshold: ThresholdSet): this {
    this.newFailedThreshold = newFailedThreshold;
    return this;
  }

  setNewUnstableThreshold(newUnstableThreshold: ThresholdSet): this {
    this.newUnstableThreshold = newUnstableThreshold;
    return this;
  }

  build(): QualityGate {
    return new QualityGate(
      this.totalFailedThreshold,
      this.totalUnstableThreshold,
      this.newFailedThreshold,
      this.newUnstableThreshold
    );
  }
}
