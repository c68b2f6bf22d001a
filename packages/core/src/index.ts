export * from './errors/index.js';
export * from './logging/index.js';
export * from './reporter.js';
export * from './settings.js';
export * from './validation-utils.js';
export * from './env/index.js';
