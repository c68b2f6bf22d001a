import { ScopeSelector } from '@agentos/models';
import type { CliContext } from '../context.js';
import { runCommand } from './run-command.js';

export interface ScopeCommandOptions {
  project?: boolean;
  yes?: boolean;
}

export function toSelector(options: ScopeCommandOptions): ScopeSelector {
  return options.project ? ScopeSelector.PROJECT_ONLY : ScopeSelector.BOTH;
}

/**
 * `agentos update [--project]`
 * @returns Process exit code
 */
export async function runUpdate(context: CliContext, options: ScopeCommandOptions): Promise<number> {
  const prompter = context.createPrompter(options.yes ?? false);
  const installer = context.createInstaller(prompter);
  try {
    return await runCommand(
      context.reporter,
      { known: 'Update failed', unexpected: 'Unexpected error during update' },
      () => installer.update(toSelector(options)),
    );
  } finally {
    prompter.close();
  }
}
