import { Command, CommanderError } from 'commander';
import { DEFAULT_PROJECT_TYPE } from '@agentos/installer';
import type { CliContext } from './context.js';
import type { InstallCommandOptions } from './commands/install.js';
import type { ScopeCommandOptions } from './commands/update.js';
import { EXIT_SUCCESS } from './commands/run-command.js';

/**
 * Builds the `agentos` command tree. Each action stores its exit code
 * through `setExitCode` instead of calling `process.exit`.
 */
export function buildProgram(context: CliContext, setExitCode: (code: number) => void): Command {
  const program = new Command();
  const { metadata } = context.settings;

  program
    .name(metadata.name)
    .description('Install, update and remove AgentOS workflows for AI coding agents')
    .version(metadata.version, '-V, --version')
    .exitOverride()
    .showHelpAfterError();

  if (context.output) {
    program.configureOutput(context.output);
  }

  program
    .command('install')
    .description('Install AgentOS base, then optionally the current project')
    .option('--project', 'Install only into the current project')
    .option('--claude-code', 'Enable Claude Code support')
    .option('--cursor', 'Enable Cursor support')
    .option('--project-type <type>', 'Project type to use', DEFAULT_PROJECT_TYPE)
    .option('--overwrite-instructions', 'Overwrite existing instruction files')
    .option('--overwrite-standards', 'Overwrite existing standards files')
    .option('--overwrite-config', 'Overwrite existing configuration')
    .option('--no-base', 'Install the project without requiring a base installation')
    .option('-y, --yes', 'Answer yes to every prompt')
    .action(async (options: InstallCommandOptions) => {
      const { runInstall } = await import('./commands/install.js');
      setExitCode(await runInstall(context, options));
    });

  program
    .command('update')
    .description('Update installed AgentOS components to the latest version')
    .option('--project', 'Update only the current project')
    .option('-y, --yes', 'Answer yes to every prompt')
    .action(async (options: ScopeCommandOptions) => {
      const { runUpdate } = await import('./commands/update.js');
      setExitCode(await runUpdate(context, options));
    });

  program
    .command('uninstall')
    .description('Remove AgentOS installations')
    .option('--project', 'Remove only the current project installation')
    .option('-y, --yes', 'Answer yes to every prompt')
    .action(async (options: ScopeCommandOptions) => {
      const { runUninstall } = await import('./commands/uninstall.js');
      setExitCode(await runUninstall(context, options));
    });

  program
    .command('version')
    .description('Show the CLI version and installation status')
    .action(async () => {
      const { runVersion } = await import('./commands/version.js');
      setExitCode(await runVersion(context));
    });

  return program;
}

/**
 * Parses `argv` (without the node and script entries) and runs the matching
 * command.
 * @returns Process exit code
 */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  let exitCode = EXIT_SUCCESS;
  const program = buildProgram(context, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
