export * from './vendor.js';
export * from './interface.js';
