/**
 * Quality Gate Module
 * Threshold evaluation of static analysis runs and verdict aggregation
 */

export { ThresholdSet, ThresholdSetBuilder, ThresholdResult } from './threshold-set.js';

export { QualityGate, QualityGateBuilder, QualityGateResult, type Violation } from './quality-gate.js';

export { CATEGORY_INFO, countsForScope, type CategoryInfo } from './categories.js';

export { describeCount, formatViolationMessage } from './messages.js';

export {
  DEFAULT_THRESHOLDS,
  QualityGateConfigError,
  createQualityGate,
  parseThresholdInputs,
  resolveThresholdInput,
  type ThresholdInputs,
} from './config.js';

export { isWorseThan, worstVerdict, toExitCode, type ExitCodeMapping } from './build-result.js';

export { formatQualityGateResult, logQualityGateResult, type GateLogger } from './gate-reporter.js';
