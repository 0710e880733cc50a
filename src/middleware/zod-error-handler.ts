import { ZodError, ZodIssue } from 'zod';
import { ValidationError } from '../utils/errors/app-error';

export interface ValidationIssue {
  /** Environment variable or header name the issue belongs to */
  field: string;
  message: string;
  code: ZodIssue['code'];
  received?: string;
}

const receivedOf = (issue: ZodIssue): string | undefined => {
  if (issue.code === 'invalid_type' || issue.code === 'invalid_enum_value') {
    return String(issue.received);
  }
  return undefined;
};

/**
 * Flattens zod issues into one entry per field
 * @param subject Label used for issues raised on the value as a whole
 */
export const formatZodError = (error: ZodError, subject: string): ValidationIssue[] =>
  error.issues.map(issue => ({
    field: issue.path.length > 0 ? issue.path.join('.') : subject,
    message: issue.message,
    code: issue.code,
    received: receivedOf(issue),
  }));

/**
 * Converts a ZodError into a ValidationError whose message lists
 * `field: message` pairs
 */
export const handleZodError = (error: ZodError, subject: string = 'value'): ValidationError => {
  const issues = formatZodError(error, subject);

  return new ValidationError(issues.map(issue => `${issue.field}: ${issue.message}`).join(', '), {
    validationErrors: issues,
  });
};
