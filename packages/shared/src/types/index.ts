// Types module entry point
// Core types for static analysis quality gates

// ============================================================================
// Severity & Category Types
// ============================================================================

/**
 * Severity channel of a threshold
 * 'all' counts every issue regardless of its priority
 */
export type Severity = 'all' | 'high' | 'normal' | 'low';

/**
 * Severity channels in evaluation and message order
 */
export const SEVERITIES: readonly Severity[] = ['all', 'high', 'normal', 'low'];

/**
 * Issue scope a threshold applies to
 */
export type IssueScope = 'total' | 'new';

/**
 * Independent threshold categories of a quality gate
 */
export type ThresholdCategory = 'totalFailed' | 'totalUnstable' | 'newFailed' | 'newUnstable';

/**
 * Threshold categories in message order
 */
export const THRESHOLD_CATEGORIES: readonly ThresholdCategory[] = [
  'totalFailed',
  'totalUnstable',
  'newFailed',
  'newUnstable',
];

// ============================================================================
// Verdict Types
// ============================================================================

/**
 * Build verdict produced by a quality gate
 * Mapped onto the host build system's result type at the boundary
 */
export type QualityGateVerdict = 'SUCCESS' | 'UNSTABLE' | 'FAILURE';

/**
 * Verdicts ordered from best to worst
 */
export const VERDICTS: readonly QualityGateVerdict[] = ['SUCCESS', 'UNSTABLE', 'FAILURE'];

// ============================================================================
// Count & Threshold Types
// ============================================================================

/**
 * Issue counts of one scope, indexed by severity
 */
export type SeverityCounts = Record<Severity, number>;

/**
 * Limits of one threshold category, indexed by severity
 * A value of 0 disables the limit
 */
export type ThresholdValues = Record<Severity, number>;

/**
 * Issue counts of a single static analysis run
 * Computed by the analysis collaborator, consumed read-only
 */
export interface AnalysisRunCounts {
  /** Number of all issues */
  totalSize: number;
  /** Number of high priority issues */
  totalHighSize: number;
  /** Number of normal priority issues */
  totalNormalSize: number;
  /** Number of low priority issues */
  totalLowSize: number;
  /** Number of issues introduced since the reference build */
  newSize: number;
  /** Number of new high priority issues */
  newHighSize: number;
  /** Number of new normal priority issues */
  newNormalSize: number;
  /** Number of new low priority issues */
  newLowSize: number;
}

/**
 * Flat quality gate configuration: 4 categories x 4 severities
 * Every value is a non-negative integer, 0 disables the limit
 */
export interface QualityGateThresholds {
  failedTotalAll: number;
  failedTotalHigh: number;
  failedTotalNormal: number;
  failedTotalLow: number;
  unstableTotalAll: number;
  unstableTotalHigh: number;
  unstableTotalNormal: number;
  unstableTotalLow: number;
  failedNewAll: number;
  failedNewHigh: number;
  failedNewNormal: number;
  failedNewLow: number;
  unstableNewAll: number;
  unstableNewHigh: number;
  unstableNewNormal: number;
  unstableNewLow: number;
}

/**
 * Name of a single flat threshold value
 */
export type ThresholdKey = keyof QualityGateThresholds;

/**
 * Flat threshold names in category and severity order
 */
export const THRESHOLD_KEYS: readonly ThresholdKey[] = [
  'failedTotalAll',
  'failedTotalHigh',
  'failedTotalNormal',
  'failedTotalLow',
  'unstableTotalAll',
  'unstableTotalHigh',
  'unstableTotalNormal',
  'unstableTotalLow',
  'failedNewAll',
  'failedNewHigh',
  'failedNewNormal',
  'failedNewLow',
  'unstableNewAll',
  'unstableNewHigh',
  'unstableNewNormal',
  'unstableNewLow',
];
