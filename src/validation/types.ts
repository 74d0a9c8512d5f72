export type ValidationLevel = 'CRITICAL' | 'WARNING';

export interface ValidationIssue {
  level: ValidationLevel;
  field: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
