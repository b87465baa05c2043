export * from './address-assembler.js';
export * from './invocation.js';
export * from './mac-changer.js';
export * from './messages.js';
export * from './vendor-selector.js';
