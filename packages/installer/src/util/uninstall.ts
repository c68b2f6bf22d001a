import { existsSync } from 'fs';
import { rm } from 'fs/promises';
import { ScopeSelector } from '@agentos/models';
import {
  InstallationError,
  OperationInterruptedError,
  logEvent,
  toError,
} from '@agentos/core';
import type { InstallerContext } from '../types/index.js';

/**
 * Removes installed scopes by deleting their root directories.
 *
 * `both` removes PROJECT before BASE. Each removal asks for confirmation and
 * is skipped when its directory is gone. Nothing installed is reported, not
 * thrown.
 * @param context - Installer collaborators
 * @param selector - `project-only` or `both`
 * @throws {InstallationError} When a directory cannot be removed
 * @see file:../installer.ts - Public API wrapper
 * @internal
 */
export async function uninstall(context: InstallerContext, selector: ScopeSelector): Promise<void> {
  const { configStore, reporter } = context;
  const status = configStore.getInstallStatus();
  logEvent('info', 'installer:uninstall', { selector });

  if (selector === ScopeSelector.PROJECT_ONLY) {
    if (!status.projectInstalled) {
      reporter.warn('No project installation found to remove');
      return;
    }
    try {
      await removeScope(context, 'project', status.projectRoot);
    } finally {
      configStore.clearCache();
    }
    return;
  }

  if (!status.projectInstalled && !status.baseInstalled) {
    reporter.warn('No AgentOS installation found to remove');
    return;
  }

  try {
    if (status.projectInstalled) {
      await removeScope(context, 'project', status.projectRoot);
    }
    if (status.baseInstalled) {
      await removeScope(context, 'base', status.baseRoot);
    }
  } finally {
    configStore.clearCache();
  }
}

async function removeScope(
  context: InstallerContext,
  scope: 'base' | 'project',
  root: string | undefined,
): Promise<void> {
  const { reporter, prompter } = context;
  const label = scope === 'base' ? 'Base' : 'Project';
  reporter.step(`🗑️ Removing ${scope} AgentOS installation...`);

  try {
    if (!root || !existsSync(root)) {
      reporter.warn(`${label} installation directory not found`);
      return;
    }
    if (!(await prompter.confirm(`Remove ${scope} installation at ${root}?`))) {
      return;
    }
    await rm(root, { recursive: true, force: true });
    reporter.success(`✅ ${label} installation removed successfully`);
  } catch (error) {
    if (error instanceof OperationInterruptedError) {
      throw error;
    }
    throw InstallationError.wrap(`${label} uninstall`, toError(error));
  }
}
