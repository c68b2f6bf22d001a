export type { InstallationStatus } from './status.js';
export type { InstallRequest, ScriptInstallOptions } from './install.js';
