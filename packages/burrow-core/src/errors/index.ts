export * from './base.error';
export * from './validation.error';
export * from './invalid-state.error';
export * from './unknown-query.error';
export * from './precursor-missing.error';
export * from './domain.error';
export * from './category-mapping.error';
