export { Installer, createInstaller } from './installer.js';
export type { IInstaller, CreateInstallerOptions } from './installer.js';
export { ConfigStore } from './config-store.js';
export type { ConfigStoreOptions } from './config-store.js';
export { ProjectTypeDetector, DEFAULT_PROJECT_TYPE } from './project-type-detector.js';
export { ReleaseClient } from './release-client.js';
export type { FetchFn, ReleaseClientOptions } from './release-client.js';
export { ReadlinePrompter, AutoConfirmPrompter, isAffirmative } from './prompter.js';
export { parseInstallRequest, toScriptOptions } from './install-request.js';
export * from './scripts/index.js';
export * from './fs/index.js';
export type {
  IConfigStore,
  IInstallScripts,
  IPrompter,
  IReleaseClient,
  InstallerContext,
} from './types/index.js';
