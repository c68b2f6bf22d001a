export * from './enums/index.js';
export * from './types/index.js';
