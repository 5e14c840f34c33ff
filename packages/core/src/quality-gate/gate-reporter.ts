/**
 * Quality Gate Reporter
 * Renders and logs quality gate results for the build log and reports
 */

import type { QualityGateVerdict } from '@quality-gate/shared';
import type { QualityGateResult } from './quality-gate.js';

/**
 * Subset of the console used for build log output
 */
export interface GateLogger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const STATUS_LINES: Record<QualityGateVerdict, string> = {
  SUCCESS: '**Status: ✅ PASSED**',
  UNSTABLE: '**Status: ⚠️ UNSTABLE**',
  FAILURE: '**Status: ❌ FAILED**',
};

/**
 * Format gate result as human-readable Markdown
 */
export function formatQualityGateResult(result: QualityGateResult): string {
  const lines: string[] = [];

  lines.push('## Quality Gate Results\n');

  if (!result.gate.enabled) {
    lines.push('Quality gates are disabled.');
    return lines.join('\n');
  }

  lines.push(`${STATUS_LINES[result.overallResult]}\n`);

  const messages = result.messages;
  if (messages.length === 0) {
    lines.push('No quality gate threshold has been reached.');
  } else {
    lines.push('### Violations\n');
    for (const message of messages) {
      lines.push(`- ${message}`);
    }
  }

  return lines.join('\n');
}

/**
 * Write the evaluation to the build log
 * FAILURE messages go to `error`, UNSTABLE messages to `warn`
 */
export function logQualityGateResult(result: QualityGateResult, logger: GateLogger = console): void {
  if (!result.gate.enabled) {
    logger.log('-> Quality gates are disabled');
    return;
  }

  logger.log('Evaluating quality gates');

  for (const violation of result.violations) {
    if (violation.verdict === 'FAILURE') {
      logger.error(violation.message);
    } else {
      logger.warn(violation.message);
    }
  }

  const verdict = result.overallResult;
  if (verdict === 'SUCCESS') {
    logger.log('-> All quality gates have been passed');
  } else {
    logger.log(`-> Some quality gates have been missed: overall result is ${verdict}`);
  }
}
