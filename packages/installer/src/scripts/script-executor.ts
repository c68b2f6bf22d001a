/**
 * Runs an install script under the restricted environment and turns every
 * outcome into either a reported success or a ScriptExecutionError.
 * @public
 * @see file:./process-runner.ts - Spawning and timeout handling
 */
import {
  buildScriptEnvironment,
  createLogger,
  type IReporter,
  NoOpReporter,
  ScriptExecutionError,
  type Settings,
  toError,
} from '@agentos/core';
import { NodeProcessRunner, type IProcessRunner, type ProcessResult } from './process-runner.js';
import { ProcessSpawnError } from './spawn-error-handler.js';

const logger = createLogger('script-executor');

export interface ScriptExecutorOptions {
  runner?: IProcessRunner;
  reporter?: IReporter;
}

export class ScriptExecutor {
  private readonly runner: IProcessRunner;
  private readonly reporter: IReporter;

  public constructor(
    private readonly settings: Settings,
    options: ScriptExecutorOptions = {},
  ) {
    this.runner = options.runner ?? new NodeProcessRunner();
    this.reporter = options.reporter ?? new NoOpReporter();
  }

  /**
   * @param args - Script path followed by its arguments; never passed through a shell
   * @param description - Shown before the script starts
   * @param successMessage - Shown after exit code 0
   * @returns Captured process result of a successful run
   * @throws {ScriptExecutionError} Kind `exit`, `timeout`, `spawn` or `unexpected`
   */
  public async execute(
    args: readonly string[],
    description: string,
    successMessage: string,
  ): Promise<ProcessResult> {
    const [command, ...rest] = args;
    if (command === undefined) {
      throw ScriptExecutionError.unexpected(new Error('No script given'));
    }

    const timeoutSeconds = this.settings.execution.scriptTimeoutSeconds;
    const env = buildScriptEnvironment(this.settings.paths.homeDir);
    this.reporter.step(`${description}...`);
    logger.info({ command, args: rest, timeoutSeconds }, description);

    let result: ProcessResult;
    try {
      result = await this.runner.run({
        command,
        args: rest,
        env,
        cwd: this.settings.paths.cwd,
        timeoutMs: timeoutSeconds * 1000,
      });
    } catch (error) {
      if (error instanceof ProcessSpawnError) {
        throw ScriptExecutionError.spawnFailed(error);
      }
      throw ScriptExecutionError.unexpected(toError(error));
    }

    if (result.timedOut) {
      throw ScriptExecutionError.timeout(timeoutSeconds, result);
    }
    if (result.exitCode !== 0) {
      throw ScriptExecutionError.nonZeroExit(result);
    }

    this.reporter.success(successMessage);
    const output = result.stdout.trim();
    if (output) {
      this.reporter.info('Script output:');
      this.reporter.output(output);
    }
    return result;
  }
}
