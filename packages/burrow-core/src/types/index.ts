export * from './state.types';
export * from './transition.types';
