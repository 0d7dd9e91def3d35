/**
 * Validation helper functions
 * Reusable checks that append findings to error and warning lists
 */

import { SEVERITIES } from '$types/common';
import { isFiniteNumber, isInteger } from '@utils/number';

import type { ValidationIssue } from './types';

// ═══════════════════════════════════════════════════════════════
// ISSUE BUILDERS
// ═══════════════════════════════════════════════════════════════

/**
 * Add a critical error
 * @param errors - List to append to
 * @param field - Offending field
 * @param message - Human-readable message
 */
export function addError(errors: ValidationIssue[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/**
 * Add a warning
 * @param warnings - List to append to
 * @param field - Field with a sub-optimal value
 * @param message - Human-readable message
 */
export function addWarning(warnings: ValidationIssue[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// TYPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate that a value is a boolean
 */
export function validateBoolean(value: unknown, field: string, errors: ValidationIssue[]): void {
  if (typeof value !== 'boolean') {
    addError(errors, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

/**
 * Validate that a value names a severity
 */
export function validateSeverity(value: unknown, field: string, errors: ValidationIssue[]): void {
  for (let i = 0; i < SEVERITIES.length; i++) {
    if (SEVERITIES[i] === value) return;
  }
  addError(errors, field, `${field} must be one of ${SEVERITIES.join(', ')} (got ${String(value)})`);
}

/**
 * Validate an optional file path: null, or a non-empty string
 */
export function validatePath(value: unknown, field: string, errors: ValidationIssue[]): void {
  if (value === null) return;
  if (typeof value !== 'string' || value.trim() === '') {
    addError(errors, field, `${field} must be a non-empty path or null`);
  }
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Validate a number against critical and recommended ranges
 *
 * Outside the critical range is an error; outside the recommended range
 * (when given) only a warning.
 *
 * @param value - Value to check
 * @param field - Field name for messages
 * @param criticalMin - Hard lower limit
 * @param criticalMax - Hard upper limit
 * @param errors - Error list
 * @param warnings - Warning list
 * @param recommendedMin - Recommended lower bound
 * @param recommendedMax - Recommended upper bound
 */
export function validateNumberRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(errors, field, `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`);
    return;
  }

  if (recommendedMin !== undefined && recommendedMax !== undefined) {
    if (value < recommendedMin || value > recommendedMax) {
      addWarning(warnings, field, `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`);
    }
  }
}

/**
 * Validate an integer against critical and recommended ranges
 * Same contract as validateNumberRange, plus the integer check
 */
export function validateIntegerRange(
  value: number,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationIssue[],
  warnings: ValidationIssue[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (!isInteger(value)) {
    addError(errors, field, `${field} must be an integer (got ${value})`);
    return;
  }
  validateNumberRange(value, field, criticalMin, criticalMax, errors, warnings, recommendedMin, recommendedMax);
}
