// Schemas and types
export * from './schemas';
export * from './types';

// Errors
export * from './errors';

// Logger
export * from './logger';

// Constants
export * from './constants';

// Codec
export * from './codec/state-codec';

// Models
export * from './models/mouse-track';

// Analysis
export * from './analysis';
