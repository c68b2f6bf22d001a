import type { InstallRequestInput } from '@agentos/schemas';
import { InstallationScope, type InstallRequest } from '@agentos/models';
import { InstallationError, createLogger, logEvent, toError } from '@agentos/core';
import type { InstallerContext } from '../types/index.js';
import { parseInstallRequest, toScriptOptions } from '../install-request.js';

const logger = createLogger('installer:install');

/**
 * Installs one scope.
 *
 * An existing installation is only replaced after confirmation, unless the
 * request sets `overwriteConfig`. A PROJECT install needs BASE first unless
 * `skipBaseRequirement` is set. Caches are cleared once the scope handler
 * has run, whichever branch it took.
 * @param context - Installer collaborators
 * @param input - Raw request; validated before anything else happens
 * @throws {InvalidTokenError} When `projectType` is unsafe
 * @throws {InstallationError} When a precondition fails or the script fails
 * @see file:../installer.ts - Public API wrapper
 * @internal
 */
export async function install(
  context: InstallerContext,
  input: InstallRequestInput,
): Promise<void> {
  const request = parseInstallRequest(input);
  logEvent('info', 'installer:install', { scope: request.scope, projectType: request.projectType });

  try {
    if (request.scope === InstallationScope.BASE) {
      await installBase(context, request);
    } else {
      await installProject(context, request);
    }
  } finally {
    context.configStore.clearCache();
  }
}

async function installBase(context: InstallerContext, request: InstallRequest): Promise<void> {
  const { configStore, reporter, prompter, scripts } = context;
  reporter.step('🚀 Installing AgentOS base components...');

  const status = configStore.getInstallStatus();
  if (status.baseInstalled && !request.overwriteConfig) {
    reporter.warn('Base installation already exists');
    if (!(await prompter.confirm('Proceed with reinstall?'))) {
      logger.info('Base reinstall declined');
      return;
    }
  }

  try {
    await scripts.runBaseInstall(toScriptOptions(request));
  } catch (error) {
    throw InstallationError.wrap('Base installation', toError(error));
  }
}

async function installProject(context: InstallerContext, request: InstallRequest): Promise<void> {
  const { configStore, reporter, prompter, scripts } = context;
  reporter.step('📁 Installing AgentOS project components...');

  const status = configStore.getInstallStatus();
  if (!status.baseInstalled && !request.skipBaseRequirement) {
    throw new InstallationError(
      'Base AgentOS installation required for project installation. ' +
        "Run 'agentos install' first, or use --no-base to skip this requirement.",
    );
  }

  if (status.projectInstalled && !request.overwriteConfig) {
    reporter.warn('Project installation already exists');
    if (!(await prompter.confirm('Proceed with reinstall?'))) {
      logger.info('Project reinstall declined');
      return;
    }
  }

  try {
    await scripts.runProjectInstall(toScriptOptions(request));
  } catch (error) {
    throw InstallationError.wrap('Project installation', toError(error));
  }
}
