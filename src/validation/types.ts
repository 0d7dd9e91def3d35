/**
 * Configuration validation types
 */

export type IssueLevel = 'CRITICAL' | 'WARNING';

/**
 * One finding about a configuration field
 */
export interface ValidationIssue {
  level: IssueLevel;
  field: string;
  message: string;
}

/**
 * Validation outcome
 * Critical findings go to errors and fail validation; warnings do not
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
