import { BaseError } from './base.error';

/**
 * Unknown query error - category predicate name is not recognized
 */
export class UnknownQueryError extends BaseError {
  readonly query: string;

  constructor(query: string) {
    super(`Unknown query \`${query}\``, 'UNKNOWN_QUERY', 400, { query });
    this.query = query;
  }
}
