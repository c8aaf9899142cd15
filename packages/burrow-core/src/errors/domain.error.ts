import { BaseError } from './base.error';

/**
 * Domain error - a derived statistic would not be a finite number
 */
export class DomainError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'DOMAIN_ERROR', 422, context);
  }
}
