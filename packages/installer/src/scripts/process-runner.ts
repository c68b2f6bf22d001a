import { spawn, type ChildProcess } from 'child_process';
import { createLogger } from '@agentos/core';
import { handleSpawnError } from './spawn-error-handler.js';

const logger = createLogger('process-runner');

/**
 * Options for running a process to completion.
 * @internal
 */
export interface ProcessRunOptions {
  command: string;
  args: readonly string[];
  /** Complete environment; nothing is inherited. */
  env: Readonly<Record<string, string>>;
  cwd?: string;
  timeoutMs: number;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

export interface IProcessRunner {
  /**
   * @throws {ProcessSpawnError} When the process cannot be started
   */
  run(options: ProcessRunOptions): Promise<ProcessResult>;
}

/**
 * Runs a command without a shell, captures both output streams, and kills
 * it with SIGKILL once the timeout expires.
 *
 * A timed-out run resolves as soon as the kill is sent, with whatever output
 * had arrived by then.
 * @internal
 */
export class NodeProcessRunner implements IProcessRunner {
  public run(options: ProcessRunOptions): Promise<ProcessResult> {
    const { command, args, env, cwd, timeoutMs } = options;

    return new Promise((resolve, reject) => {
      let stdout = '';
      let stderr = '';
      let settled = false;

      const settle = (finish: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        finish();
      };

      let child: ChildProcess;
      try {
        child = spawn(command, [...args], {
          env: { ...env },
          cwd,
          shell: false,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        reject(handleSpawnError(error, command));
        return;
      }

      const timer = setTimeout(() => {
        logger.warn({ command, timeoutMs }, 'Process timed out, killing');
        child.kill('SIGKILL');
        settle(() =>
          resolve({ exitCode: null, signal: 'SIGKILL', stdout, stderr, timedOut: true }),
        );
      }, timeoutMs);

      child.stdout?.setEncoding('utf8');
      child.stderr?.setEncoding('utf8');
      child.stdout?.on('data', (chunk: string) => {
        stdout += chunk;
      });
      child.stderr?.on('data', (chunk: string) => {
        stderr += chunk;
      });

      child.on('error', (error) => {
        settle(() => reject(handleSpawnError(error, command)));
      });

      child.on('close', (exitCode, signal) => {
        logger.debug({ command, exitCode, signal }, 'Process exited');
        settle(() => resolve({ exitCode, signal, stdout, stderr, timedOut: false }));
      });
    });
  }
}
