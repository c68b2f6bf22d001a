import type { CliContext } from '../context.js';
import { runCommand } from './run-command.js';
import { toSelector, type ScopeCommandOptions } from './update.js';

/**
 * `agentos uninstall [--project]`
 * @returns Process exit code
 */
export async function runUninstall(
  context: CliContext,
  options: ScopeCommandOptions,
): Promise<number> {
  const prompter = context.createPrompter(options.yes ?? false);
  const installer = context.createInstaller(prompter);
  try {
    return await runCommand(
      context.reporter,
      { known: 'Uninstall failed', unexpected: 'Unexpected error during uninstall' },
      () => installer.uninstall(toSelector(options)),
    );
  } finally {
    prompter.close();
  }
}
