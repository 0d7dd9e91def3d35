export { validateConfig } from './validator';
export {
  addError,
  addWarning,
  validateBoolean,
  validateIntegerRange,
  validateNumberRange,
  validatePath,
  validateSeverity
} from './helpers';
export type { IssueLevel, ValidationIssue, ValidationResult } from './types';
