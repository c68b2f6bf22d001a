/**
 * Install, update and uninstall orchestration for AgentOS.
 *
 * Two independent scopes are managed:
 * - BASE: `~/.agent-os/`, validated through its `config.yml`
 * - PROJECT: `<cwd>/.agent-os/`, considered installed when the directory exists
 *
 * The actual file work is done by external `base.sh` and `project.sh`
 * scripts; this class decides when to run them and with which flags.
 * @example
 * ```typescript
 * import { createInstaller } from '@agentos/installer';
 *
 * const installer = createInstaller(settings, { reporter: new ConsoleReporter() });
 * await installer.install({ scope: 'project', enableClaudeCode: true });
 * ```
 * @public
 * @see file:./util/install.ts - Installation flow
 * @see file:./util/update.ts - Update flow
 * @see file:./util/uninstall.ts - Removal flow
 */
import type { InstallRequestInput } from '@agentos/schemas';
import type { InstallationStatus, ScopeSelector } from '@agentos/models';
import { type IReporter, NoOpReporter, type Settings } from '@agentos/core';
import { ConfigStore } from './config-store.js';
import type { IConfigFileSystem } from './fs/index.js';
import { AutoConfirmPrompter } from './prompter.js';
import { ReleaseClient, type FetchFn } from './release-client.js';
import {
  ScriptExecutor,
  ScriptLocator,
  ScriptRunner,
  type IProcessRunner,
} from './scripts/index.js';
import type {
  IConfigStore,
  IInstallScripts,
  IPrompter,
  IReleaseClient,
  InstallerContext,
} from './types/index.js';
import { install, uninstall, update } from './util/index.js';

export interface IInstaller {
  install(request: InstallRequestInput): Promise<void>;
  update(selector: ScopeSelector): Promise<void>;
  uninstall(selector: ScopeSelector): Promise<void>;
  getInstallStatus(): InstallationStatus;
}

export class Installer implements IInstaller {
  public constructor(private readonly context: InstallerContext) {}

  /**
   * Installs BASE or PROJECT.
   * @param request - Raw request; `projectType` is validated before any prompt or script
   * @throws {InvalidTokenError} When `projectType` is unsafe
   * @throws {InstallationError} When BASE is missing for a PROJECT install, or the script fails
   * @example
   * ```typescript
   * await installer.install({ scope: 'base', enableCursor: true, projectType: 'python' });
   * ```
   */
  public async install(request: InstallRequestInput): Promise<void> {
    return install(this.context, request);
  }

  /**
   * Re-runs the install scripts with full overwrite for the selected scopes.
   * @throws {InstallationError} When nothing selected is installed, or a script fails
   */
  public async update(selector: ScopeSelector): Promise<void> {
    return update(this.context, selector);
  }

  /**
   * Removes the selected scope roots after confirmation.
   * @throws {InstallationError} When a directory cannot be removed
   */
  public async uninstall(selector: ScopeSelector): Promise<void> {
    return uninstall(this.context, selector);
  }

  public getInstallStatus(): InstallationStatus {
    return this.context.configStore.getInstallStatus();
  }
}

/**
 * Overrides for the collaborators `createInstaller` builds by default.
 */
export interface CreateInstallerOptions {
  reporter?: IReporter;
  prompter?: IPrompter;
  fileSystem?: IConfigFileSystem;
  processRunner?: IProcessRunner;
  fetchImpl?: FetchFn;
  configStore?: IConfigStore;
  scripts?: IInstallScripts;
  releaseClient?: IReleaseClient;
}

/**
 * Wires an Installer from settings.
 * @param settings - Process settings
 * @param options - Replacement collaborators
 */
export function createInstaller(
  settings: Settings,
  options: CreateInstallerOptions = {},
): Installer {
  const reporter = options.reporter ?? new NoOpReporter();
  const fileSystem = options.fileSystem;
  const configStore = options.configStore ?? new ConfigStore(settings, { fileSystem });
  const scripts =
    options.scripts ??
    new ScriptRunner(
      new ScriptLocator(settings, { fileSystem, reporter }),
      new ScriptExecutor(settings, { runner: options.processRunner, reporter }),
    );
  const releaseClient =
    options.releaseClient ?? new ReleaseClient(settings, { fetchImpl: options.fetchImpl });

  return new Installer({
    settings,
    configStore,
    scripts,
    releaseClient,
    prompter: options.prompter ?? new AutoConfirmPrompter(false),
    reporter,
  });
}
