import { BaseError } from './base.error';

/**
 * Precursor missing error - analysis requested before its input was computed
 */
export class PrecursorMissingError extends BaseError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PRECURSOR_MISSING', 409, context);
  }
}
