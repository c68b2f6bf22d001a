/**
 * Seams between the installer state machine and its collaborators.
 */
import type { ConfigDocument } from '@agentos/schemas';
import type { InstallationStatus, ScriptInstallOptions } from '@agentos/models';
import type { IReporter, Settings } from '@agentos/core';

export interface IConfigStore {
  /**
   * Parses the base `config.yml`, cached after the first success.
   * @throws {ConfigurationError} When the file is missing or invalid
   */
  loadConfig(): ConfigDocument;
  /** Drops the config and status caches together. */
  clearCache(): void;
  getInstallStatus(): InstallationStatus;
}

export interface IInstallScripts {
  runBaseInstall(options: ScriptInstallOptions): Promise<void>;
  runProjectInstall(options: ScriptInstallOptions): Promise<void>;
}

export interface IReleaseClient {
  /**
   * @returns The latest release version without a leading `v`
   * @throws {VersionCheckError}
   */
  getLatestVersion(): Promise<string>;
}

export interface IPrompter {
  /** Resolves true when the answer starts with `y` (any case). */
  confirm(question: string): Promise<boolean>;
  close(): void;
}

/**
 * Collaborators shared by the install, update and uninstall flows.
 */
export interface InstallerContext {
  settings: Settings;
  configStore: IConfigStore;
  scripts: IInstallScripts;
  releaseClient: IReleaseClient;
  prompter: IPrompter;
  reporter: IReporter;
}
