/**
 * JSON Schema Definitions and Validator
 * Validates quality gate configuration and analysis run counts before they
 * reach the evaluation core
 */

import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import type { AnalysisRunCounts, QualityGateThresholds } from '../types/index.js';

import qualityGateThresholdsSchema from './quality-gate-thresholds.schema.json' with { type: 'json' };
import analysisRunCountsSchema from './analysis-run-counts.schema.json' with { type: 'json' };

// Schema types
export type SchemaType = 'quality-gate-thresholds' | 'analysis-run-counts';

// Schema map
const schemas: Record<SchemaType, object> = {
  'quality-gate-thresholds': qualityGateThresholdsSchema,
  'analysis-run-counts': analysisRunCountsSchema,
};

// Create AJV instance
const ajv = new Ajv.default({
  allErrors: true,
  verbose: true,
  strict: false,
});

// Compile schemas
const validators: Record<SchemaType, ValidateFunction> = {
  'quality-gate-thresholds': ajv.compile(qualityGateThresholdsSchema),
  'analysis-run-counts': ajv.compile(analysisRunCountsSchema),
};

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Validation error
 */
export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

/**
 * Validate data against a schema
 */
export function validate(schemaType: SchemaType, data: unknown): ValidationResult {
  const validator = validators[schemaType];
  const valid = validator(data);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const errors: ValidationError[] = (validator.errors || []).map((err: ErrorObject) => ({
    path: err.instancePath || '/',
    message: err.message || 'Validation error',
    keyword: err.keyword,
    params: err.params,
  }));

  return { valid: false, errors };
}

/**
 * Validate a flat quality gate threshold configuration
 * Missing fields are allowed and mean "disabled"
 */
export function validateQualityGateThresholds(data: unknown): ValidationResult {
  return validate('quality-gate-thresholds', data);
}

/**
 * Validate the eight issue counts of an analysis run
 */
export function validateAnalysisRunCounts(data: unknown): ValidationResult {
  return validate('analysis-run-counts', data);
}

/**
 * Type guard for a valid, possibly partial, threshold configuration
 */
export function isQualityGateThresholds(data: unknown): data is Partial<QualityGateThresholds> {
  return validators['quality-gate-thresholds'](data);
}

/**
 * Type guard for valid analysis run counts
 */
export function isAnalysisRunCounts(data: unknown): data is AnalysisRunCounts {
  return validators['analysis-run-counts'](data);
}

/**
 * Get schema by type
 */
export function getSchema(schemaType: SchemaType): object {
  return schemas[schemaType];
}

/**
 * Get all schema types
 */
export function getSchemaTypes(): SchemaType[] {
  return ['quality-gate-thresholds', 'analysis-run-counts'];
}

/**
 * Format validation errors as string
 */
export function formatValidationErrors(result: ValidationResult): string {
  if (result.valid) {
    return 'Validation passed';
  }

  const lines = ['Validation failed:'];
  for (const error of result.errors) {
    lines.push(`  - ${error.path}: ${error.message} (${error.keyword})`);
  }

  return lines.join('\n');
}
