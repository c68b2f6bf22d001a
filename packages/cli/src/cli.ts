import chalk from 'chalk';
import {
  ConfigurationError,
  getEventLogPath,
  logError,
  logEvent,
} from '@agentos/core';
import { createCliContext, type CliContext } from './context.js';
import { EXIT_FAILURE, EXIT_INTERRUPTED } from './commands/run-command.js';
import { runCli } from './program.js';

process.on('uncaughtException', (error) => {
  logError('uncaughtException', error);
  console.error(chalk.red(`Unexpected error: ${error.message}`));
  process.exit(EXIT_FAILURE);
});

process.on('unhandledRejection', (reason) => {
  logError('unhandledRejection', reason);
  console.error(chalk.red('Unexpected error; see', getEventLogPath()));
  process.exit(EXIT_FAILURE);
});

process.once('SIGINT', () => {
  logEvent('info', 'cli:interrupted');
  console.error(chalk.yellow('\n👋 AgentOS CLI interrupted by user'));
  process.exit(EXIT_INTERRUPTED);
});

async function bootstrap(): Promise<void> {
  logEvent('info', 'cli:start', { argv: process.argv.slice(2), cwd: process.cwd() });

  let context: CliContext;
  try {
    context = createCliContext(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.bold.red(`❌ ${error.message}`));
      process.exitCode = EXIT_FAILURE;
      return;
    }
    throw error;
  }

  process.exitCode = await runCli(process.argv.slice(2), context);
}

bootstrap().catch((error: unknown) => {
  logError('cli:bootstrap', error);
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(EXIT_FAILURE);
});
