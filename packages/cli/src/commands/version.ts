import type { InstallationStatus } from '@agentos/models';
import { createLogger } from '@agentos/core';
import type { CliContext } from '../context.js';
import { AutoConfirmPrompter } from '@agentos/installer';
import { EXIT_SUCCESS } from './run-command.js';

const logger = createLogger('cli:version');

/**
 * Lines printed by `agentos version`.
 */
export function describeStatus(version: string, status: InstallationStatus | undefined): string[] {
  const lines = [`AgentOS CLI v${version}`];
  if (!status) {
    lines.push('Status: Unable to determine installation status');
    return lines;
  }

  lines.push(
    status.baseInstalled
      ? `Base installation: ✅ Installed (v${status.baseVersion ?? 'unknown'}) at ${status.baseRoot ?? ''}`
      : 'Base installation: ❌ Not installed',
  );

  if (status.projectInstalled) {
    lines.push(`Project installation: ✅ Installed at ${status.projectRoot ?? ''}`);
    lines.push(
      `Project agents: ${status.projectAgents.length > 0 ? status.projectAgents.join(', ') : 'none'}`,
    );
    lines.push(`Project type: ${status.projectType ?? 'default'}`);
  } else {
    lines.push('Project installation: ❌ Not installed');
  }
  return lines;
}

/**
 * `agentos version`
 * @returns Process exit code
 */
export async function runVersion(context: CliContext): Promise<number> {
  const installer = context.createInstaller(new AutoConfirmPrompter(false));
  let status: InstallationStatus | undefined;
  try {
    status = installer.getInstallStatus();
  } catch (error) {
    logger.warn({ err: error }, 'Status unavailable');
  }
  for (const line of describeStatus(context.settings.metadata.version, status)) {
    context.reporter.info(line);
  }
  return EXIT_SUCCESS;
}
