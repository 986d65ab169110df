export * from './types/index.js';
export * from './schemas/index.js';
export * from './utils/decimal-utils.js';
