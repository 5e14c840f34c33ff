/**
 * Violation messages for reached quality gate limits
 */

import type { IssueScope, QualityGateVerdict, Severity } from '@quality-gate/shared';

const DESCRIPTIONS: Record<IssueScope, Record<Severity, string>> = {
  total: {
    all: 'Total number of issues',
    high: 'Number of high priority issues',
    normal: 'Number of normal priority issues',
    low: 'Number of low priority issues',
  },
  new: {
    all: 'Number of new issues',
    high: 'Number of new high priority issues',
    normal: 'Number of new normal priority issues',
    low: 'Number of new low priority issues',
  },
};

/**
 * Human-readable description of the counted issue class
 */
export function describeCount(scope: IssueScope, severity: Severity): string {
  return DESCRIPTIONS[scope][severity];
}

/**
 * Format a single violation message
 *
 * @example
 * formatViolationMessage('FAILURE', 'total', 'all', 15, 10)
 * // 'FAILURE -> Total number of issues: 15 - Quality Gate: 10'
 */
export function formatViolationMessage(
  verdict: Exclude<QualityGateVerdict, 'SUCCESS'>,
  scope: IssueScope,
  severity: Severity,
  observed: number,
  limit: number
): string {
  return `${verdict} -> ${describeCount(scope, severity)}: ${observed} - Quality Gate: ${limit}`;
}
