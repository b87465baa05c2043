export * from './errors.js';
export * from './logger.js';
export * from './mac.js';
export * from './random.js';
