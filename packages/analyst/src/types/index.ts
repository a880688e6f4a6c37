export * from './error.js';
export * from './function.js';
export * from './state.js';
