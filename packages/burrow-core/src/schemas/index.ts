// Re-export all schemas and types
export * from './state.schema';
export * from './transitions.schema';
export * from './session.schema';
