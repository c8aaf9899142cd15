import type { ZodError } from 'zod';
import { BaseError } from './base.error';

/**
 * Validation error - for schema validation failures
 */
export class ValidationError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', 400, context);
  }

  /**
   * Wrap a zod failure, keeping each issue as `path: message`
   */
  static fromZod(subject: string, error: ZodError): ValidationError {
    const issues = error.issues.map(
      issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`
    );
    return new ValidationError(`Invalid ${subject}: ${issues.join('; ')}`, { issues });
  }
}
