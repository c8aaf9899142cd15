export * from './transition-analyzer';
export * from './graph-summary';
export * from './session-analyzer';
