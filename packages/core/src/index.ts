export * from './currency.js';
export * from './identifiers.js';
export * from './errors/index.js';
export * from './utils/decimal-utils.js';
export * from './schemas/primitives.js';
export * from './utils/zod-utils.js';
