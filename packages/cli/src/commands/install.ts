import { InstallationScope } from '@agentos/models';
import type { InstallRequestInput } from '@agentos/schemas';
import type { CliContext } from '../context.js';
import { runCommand } from './run-command.js';

/**
 * Parsed flags of `agentos install`.
 */
export interface InstallCommandOptions {
  project?: boolean;
  claudeCode?: boolean;
  cursor?: boolean;
  projectType: string;
  overwriteInstructions?: boolean;
  overwriteStandards?: boolean;
  overwriteConfig?: boolean;
  /** False when `--no-base` was given. */
  base: boolean;
  yes?: boolean;
}

/**
 * Installs BASE and then offers to install the current project too. With
 * `--project` or `--no-base` only the project is installed.
 * @returns Process exit code
 */
export async function runInstall(
  context: CliContext,
  options: InstallCommandOptions,
): Promise<number> {
  const prompter = context.createPrompter(options.yes ?? false);
  const installer = context.createInstaller(prompter);
  const projectOnly = (options.project ?? false) || !options.base;

  const request: InstallRequestInput = {
    scope: projectOnly ? InstallationScope.PROJECT : InstallationScope.BASE,
    enableClaudeCode: options.claudeCode ?? false,
    enableCursor: options.cursor ?? false,
    projectType: options.projectType,
    overwriteInstructions: options.overwriteInstructions ?? false,
    overwriteStandards: options.overwriteStandards ?? false,
    overwriteConfig: options.overwriteConfig ?? false,
    skipBaseRequirement: !options.base,
  };

  try {
    return await runCommand(
      context.reporter,
      { known: 'Installation failed', unexpected: 'Unexpected error during installation' },
      async () => {
        await installer.install(request);
        if (projectOnly) {
          return;
        }
        if (await prompter.confirm('🤔 Install AgentOS to current project as well?')) {
          await installer.install({ ...request, scope: InstallationScope.PROJECT });
        }
      },
    );
  } finally {
    prompter.close();
  }
}
