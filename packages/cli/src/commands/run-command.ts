import {
  AgentOsError,
  OperationInterruptedError,
  logError,
  toError,
  type IReporter,
} from '@agentos/core';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INTERRUPTED = 130;

/**
 * Prefixes for the single error line a command prints.
 */
export interface FailureLabels {
  /** e.g. `Installation failed` */
  known: string;
  /** e.g. `Unexpected error during installation` */
  unexpected: string;
}

/**
 * Runs a command body and maps its outcome to an exit code. Errors are
 * reported as one line; stacks only reach the event log.
 */
export async function runCommand(
  reporter: IReporter,
  labels: FailureLabels,
  body: () => Promise<void>,
): Promise<number> {
  try {
    await body();
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof OperationInterruptedError) {
      reporter.warn('AgentOS CLI interrupted by user');
      return EXIT_INTERRUPTED;
    }
    logError('cli:command', error, { labels });
    if (error instanceof AgentOsError) {
      reporter.error(`${labels.known}: ${error.message}`);
    } else {
      reporter.error(`${labels.unexpected}: ${toError(error).message}`);
    }
    return EXIT_FAILURE;
  }
}
