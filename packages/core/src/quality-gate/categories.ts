/**
 * Threshold category metadata
 * Which issue scope each category reads and which verdict it raises
 */

import type {
  AnalysisRunCounts,
  IssueScope,
  QualityGateVerdict,
  SeverityCounts,
  ThresholdCategory,
} from '@quality-gate/shared';

export interface CategoryInfo {
  scope: IssueScope;
  /** Verdict raised when a limit of the category is reached */
  verdict: Exclude<QualityGateVerdict, 'SUCCESS'>;
}

export const CATEGORY_INFO: Record<ThresholdCategory, CategoryInfo> = {
  totalFailed: { scope: 'total', verdict: 'FAILURE' },
  totalUnstable: { scope: 'total', verdict: 'UNSTABLE' },
  newFailed: { scope: 'new', verdict: 'FAILURE' },
  newUnstable: { scope: 'new', verdict: 'UNSTABLE' },
};

/**
 * Severity-indexed counts of one scope of an analysis run
 */
export function countsForScope(run: AnalysisRunCounts, scope: IssueScope): SeverityCounts {
  if (scope === 'total') {
    return {
      all: run.totalSize,
      high: run.totalHighSize,
      normal: run.totalNormalSize,
      low: run.totalLowSize,
    };
  }
  return {
    all: run.newSize,
    high: run.newHighSize,
    normal: run.newNormalSize,
    low: run.newLowSize,
  };
}
