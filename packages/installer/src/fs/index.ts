export { NodeConfigFileSystem } from './config-file-system.js';
export type { IConfigFileSystem } from './config-file-system.js';
