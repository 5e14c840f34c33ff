/**
 * Quality Gate Configuration
 * Builds quality gates from untrusted configuration and rejects values the
 * evaluation core does not accept (negative or non-integer limits)
 *
 * String inputs support $VAR_NAME environment variable references
 */

import {
  THRESHOLD_KEYS,
  formatValidationErrors,
  isQualityGateThresholds,
  validateQualityGateThresholds,
} from '@quality-gate/shared';
import type { QualityGateThresholds, ThresholdKey, ValidationError } from '@quality-gate/shared';
import { QualityGate } from './quality-gate.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Every limit disabled
 */
export const DEFAULT_THRESHOLDS: QualityGateThresholds = {
  failedTotalAll: 0,
  failedTotalHigh: 0,
  failedTotalNormal: 0,
  failedTotalLow: 0,
  unstableTotalAll: 0,
  unstableTotalHigh: 0,
  unstableTotalNormal: 0,
  unstableTotalLow: 0,
  failedNewAll: 0,
  failedNewHigh: 0,
  failedNewNormal: 0,
  failedNewLow: 0,
  unstableNewAll: 0,
  unstableNewHigh: 0,
  unstableNewNormal: 0,
  unstableNewLow: 0,
};

/**
 * Matches $VAR_NAME references to environment variables
 */
const ENV_VAR_PATTERN = /^\$([A-Z_][A-Z0-9_]*)$/;

const NON_NEGATIVE_INTEGER_PATTERN = /^\d+$/;

// ============================================================================
// Errors
// ============================================================================

export class QualityGateConfigError extends Error {
  constructor(
    message: string,
    public readonly errors: ValidationError[]
  ) {
    super(message);
    this.name = 'QualityGateConfigError';
  }
}

/**
 * String form of a threshold configuration, as supplied by CI step inputs or
 * form fields
 */
export type ThresholdInputs = Partial<Record<ThresholdKey, string>>;

// ============================================================================
// Core Functions
// ============================================================================

/**
 * Create a quality gate from an untrusted configuration object
 *
 * Missing thresholds are disabled.
 *
 * @throws QualityGateConfigError if a value is not a non-negative integer or
 * an unknown threshold is named
 *
 * @example
 * createQualityGate({ failedTotalAll: 10, unstableNewHigh: 1 })
 */
export function createQualityGate(config: unknown): QualityGate {
  if (!isQualityGateThresholds(config)) {
    const result = validateQualityGateThresholds(config);
    throw new QualityGateConfigError(
      `Invalid quality gate configuration\n${formatValidationErrors(result)}`,
      result.errors
    );
  }

  return QualityGate.fromThresholds({ ...DEFAULT_THRESHOLDS, ...config });
}

/**
 * Resolve a $VAR_NAME reference from process.env; plain values are returned
 * as-is. Returns undefined for a reference to an unset variable.
 */
export function resolveThresholdInput(value: string): string | undefined {
  const match = value.match(ENV_VAR_PATTERN);
  if (!match) {
    return value;
  }
  return process.env[match[1]];
}

/**
 * Parse string inputs into a threshold configuration
 *
 * Blank or absent inputs are 0 (disabled). All invalid inputs are reported
 * together.
 *
 * @throws QualityGateConfigError if an input is not a non-negative integer or
 * references an unset environment variable
 *
 * @example
 * // With process.env.MAX_NEW_ISSUES = '5'
 * parseThresholdInputs({ failedTotalAll: '100', failedNewAll: '$MAX_NEW_ISSUES' })
 * // { ...DEFAULT_THRESHOLDS, failedTotalAll: 100, failedNewAll: 5 }
 */
export function parseThresholdInputs(inputs: ThresholdInputs): QualityGateThresholds {
  const thresholds: QualityGateThresholds = { ...DEFAULT_THRESHOLDS };
  const errors: ValidationError[] = [];

  for (const key of THRESHOLD_KEYS) {
    const raw = inputs[key]?.trim();
    if (!raw) {
      continue;
    }

    const resolved = resolveThresholdInput(raw);
    if (resolved === undefined) {
      errors.push({
        path: `/${key}`,
        message: `Environment variable ${raw.slice(1)} is not set`,
        keyword: 'env',
        params: { variable: raw.slice(1) },
      });
      continue;
    }

    const value = resolved.trim();
    if (value === '') {
      continue;
    }
    if (!NON_NEGATIVE_INTEGER_PATTERN.test(value)) {
      errors.push({
        path: `/${key}`,
        message: `must be a non-negative integer, got '${value}'`,
        keyword: 'type',
        params: { value },
      });
      continue;
    }

    thresholds[key] = Number.parseInt(value, 10);
  }

  if (errors.length > 0) {
    throw new QualityGateConfigError(
      `Invalid quality gate inputs\n${formatValidationErrors({ valid: false, errors })}`,
      errors
    );
  }

  return thresholds;
}
