import { BaseError } from './base.error';

/**
 * Category mapping error - a state code has no category label
 */
export class CategoryMappingError extends BaseError {
  constructor(code: number) {
    super(`No category defined for state code ${code}`, 'CATEGORY_MAPPING_ERROR', 422, { code });
  }
}
