export * from './account.js';
export * from './contracts.js';
export * from './transaction-event.js';
