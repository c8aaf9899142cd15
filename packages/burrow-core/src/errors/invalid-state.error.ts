import { BaseError } from './base.error';

/**
 * Invalid state error - a location state has fields that cannot be encoded
 */
export class InvalidStateError extends BaseError {
  readonly fields: string[];

  constructor(fields: string[], context?: Record<string, unknown>) {
    super(
      `Some state information cannot be interpreted: ${fields.join(', ')}`,
      'INVALID_STATE',
      422,
      { ...context, fields }
    );
    this.fields = fields;
  }
}
