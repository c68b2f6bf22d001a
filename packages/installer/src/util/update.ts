import {
  AgentKind,
  type InstallationStatus,
  ScopeSelector,
  type ScriptInstallOptions,
} from '@agentos/models';
import {
  InstallationError,
  VersionCheckError,
  createLogger,
  logEvent,
  toError,
} from '@agentos/core';
import type { InstallerContext } from '../types/index.js';
import { DEFAULT_PROJECT_TYPE } from '../project-type-detector.js';

const logger = createLogger('installer:update');

const FULL_OVERWRITE = {
  overwriteInstructions: true,
  overwriteStandards: true,
  overwriteConfig: true,
} as const;

/**
 * Re-runs the install scripts for whichever scopes are installed.
 *
 * BASE is skipped when the installed version already equals the latest
 * release; a failed version check only warns. PROJECT reuses the agents and
 * project type found on disk. Both always overwrite every file they manage.
 * @param context - Installer collaborators
 * @param selector - `project-only` or `both`
 * @throws {InstallationError} When nothing selected is installed, or a script fails
 * @see file:../installer.ts - Public API wrapper
 * @internal
 */
export async function update(context: InstallerContext, selector: ScopeSelector): Promise<void> {
  const status = context.configStore.getInstallStatus();
  logEvent('info', 'installer:update', { selector });

  if (selector === ScopeSelector.PROJECT_ONLY) {
    if (!status.projectInstalled) {
      throw new InstallationError(
        'No project installation found to update. ' +
          "Run 'agentos install --project' to install project components first.",
      );
    }
  } else if (!status.baseInstalled && !status.projectInstalled) {
    throw new InstallationError(
      "No AgentOS installation found to update. Run 'agentos install' to install AgentOS first.",
    );
  }

  try {
    if (selector === ScopeSelector.BOTH && status.baseInstalled) {
      await updateBase(context, status);
    }
    if (status.projectInstalled) {
      await updateProject(context, status);
    }
  } finally {
    context.configStore.clearCache();
  }
}

async function updateBase(context: InstallerContext, status: InstallationStatus): Promise<void> {
  const { reporter, releaseClient, scripts } = context;
  reporter.step('🔄 Updating base AgentOS installation...');

  const currentVersion = status.baseVersion ?? 'unknown';
  try {
    const latestVersion = await releaseClient.getLatestVersion();
    if (latestVersion === currentVersion) {
      reporter.success(`✅ Base installation is already up to date (v${currentVersion})`);
      return;
    }
    reporter.info(`📦 Updating from v${currentVersion} to v${latestVersion}`);
  } catch (error) {
    if (!(error instanceof VersionCheckError)) {
      throw InstallationError.wrap('Base update', toError(error));
    }
    logger.warn({ err: error }, 'Version check failed');
    reporter.warn('Could not check latest version, proceeding with update');
  }

  const options: ScriptInstallOptions = {
    claudeCode: true,
    cursor: true,
    projectType: DEFAULT_PROJECT_TYPE,
    ...FULL_OVERWRITE,
  };
  try {
    await scripts.runBaseInstall(options);
  } catch (error) {
    throw InstallationError.wrap('Base update', toError(error));
  }
}

async function updateProject(context: InstallerContext, status: InstallationStatus): Promise<void> {
  const { reporter, scripts } = context;
  reporter.step('🔄 Updating project AgentOS installation...');

  const options: ScriptInstallOptions = {
    claudeCode: status.projectAgents.includes(AgentKind.CLAUDE_CODE),
    cursor: status.projectAgents.includes(AgentKind.CURSOR),
    projectType: status.projectType ?? DEFAULT_PROJECT_TYPE,
    ...FULL_OVERWRITE,
  };
  try {
    await scripts.runProjectInstall(options);
  } catch (error) {
    throw InstallationError.wrap('Project update', toError(error));
  }
}
