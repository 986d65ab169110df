export * from './primitives.js';
export * from './transaction-event.js';
