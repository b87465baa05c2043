export * from './system-interface-controller.js';
export * from './terminal-survey-browser.js';
export * from './vendor-store.js';
