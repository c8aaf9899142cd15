export * from './factories/state-sequence.factory';
export * from './factories/session.factory';
