/**
 * Build Result Mapping
 * Translates quality gate verdicts to the host build system at the boundary
 */

import { VERDICTS } from '@quality-gate/shared';
import type { QualityGateVerdict } from '@quality-gate/shared';

/**
 * Process exit code per verdict
 */
export type ExitCodeMapping = Record<QualityGateVerdict, number>;

const DEFAULT_EXIT_CODES: ExitCodeMapping = {
  SUCCESS: 0,
  UNSTABLE: 0,
  FAILURE: 1,
};

function rank(verdict: QualityGateVerdict): number {
  return VERDICTS.indexOf(verdict);
}

/**
 * Whether verdict `a` is strictly worse than verdict `b`
 */
export function isWorseThan(a: QualityGateVerdict, b: QualityGateVerdict): boolean {
  return rank(a) > rank(b);
}

/**
 * Combine verdicts, keeping the worst one
 * (FAILURE > UNSTABLE > SUCCESS). No verdicts combine to SUCCESS.
 *
 * @example
 * worstVerdict(currentBuildResult, gateResult.overallResult)
 */
export function worstVerdict(...verdicts: QualityGateVerdict[]): QualityGateVerdict {
  return verdicts.reduce<QualityGateVerdict>(
    (worst, verdict) => (isWorseThan(verdict, worst) ? verdict : worst),
    'SUCCESS'
  );
}

/**
 * Map a verdict to a process exit code
 * Unstable builds pass by default
 */
export function toExitCode(
  verdict: QualityGateVerdict,
  mapping: Partial<ExitCodeMapping> = {}
): number {
  const fullMapping = { ...DEFAULT_EXIT_CODES, ...mapping };
  return fullMapping[verdict];
}
