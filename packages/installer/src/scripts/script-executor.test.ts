import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { RecordingReporter, ScriptExecutionError } from '@agentos/core';
import { ScriptExecutor } from './script-executor.js';
import type { IProcessRunner, ProcessResult, ProcessRunOptions } from './process-runner.js';
import { createTempWorkspace, writeScript, type TempWorkspace } from '../__tests__/test-utils.js';

async function executionError(promise: Promise<unknown>): Promise<ScriptExecutionError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ScriptExecutionError) {
      return error;
    }
    throw error;
  }
  throw new Error('execute did not throw');
}

describe('ScriptExecutor', () => {
  let workspace: TempWorkspace;
  let reporter: RecordingReporter;

  beforeEach(async () => {
    workspace = await createTempWorkspace();
    reporter = new RecordingReporter();
  });

  afterEach(async () => {
    await workspace.cleanup();
  });

  describe('with real scripts', () => {
    it('reports success and surfaces trimmed output', async () => {
      const script = join(workspace.root, 'ok.sh');
      await writeScript(script, 'echo "  installed  "');
      const executor = new ScriptExecutor(workspace.settings, { reporter });

      await executor.execute([script], 'Installing things', 'Done');

      expect(reporter.entries).toEqual([
        { level: 'step', message: 'Installing things...' },
        { level: 'success', message: 'Done' },
        { level: 'info', message: 'Script output:' },
        { level: 'output', message: 'installed' },
      ]);
    });

    it('omits the output heading when stdout is blank', async () => {
      const script = join(workspace.root, 'quiet.sh');
      await writeScript(script, 'exit 0');
      const executor = new ScriptExecutor(workspace.settings, { reporter });

      await executor.execute([script], 'Quiet', 'Done');

      expect(reporter.messages('info')).toEqual([]);
    });

    it('fails with exit details and both streams', async () => {
      const script = join(workspace.root, 'fail.sh');
      await writeScript(script, 'echo partial\necho boom >&2\nexit 2');
      const executor = new ScriptExecutor(workspace.settings, { reporter });

      const error = await executionError(executor.execute([script], 'Failing', 'Done'));

      expect(error.kind).toBe('exit');
      expect(error.exitCode).toBe(2);
      expect(error.message).toBe(
        'Script failed with exit code 2\nError output: boom\nStandard output: partial',
      );
      expect(reporter.messages('success')).toEqual([]);
    });

    it('runs the script with exactly the restricted environment', async () => {
      const script = join(workspace.root, 'env.sh');
      await writeScript(
        script,
        'printf "%s\\n" "$PATH" "$HOME" "$USER" "$LANG" "${AGENTOS_TEST_LEAK:-unset}"',
      );
      const executor = new ScriptExecutor(workspace.settings, { reporter });
      process.env.AGENTOS_TEST_LEAK = 'test-secret';

      try {
        const result = await executor.execute([script], 'Env', 'Done');

        expect(result.stdout).toBe(
          [
            '/usr/local/bin:/usr/bin:/bin',
            workspace.settings.paths.homeDir,
            'dev',
            'en_US.UTF-8',
            'unset',
            '',
          ].join('\n'),
        );
      } finally {
        delete process.env.AGENTOS_TEST_LEAK;
      }
    });

    it('times out after the configured seconds', async () => {
      const timed = await createTempWorkspace({ scriptTimeoutSeconds: 1 });
      try {
        const script = join(timed.root, 'hang.sh');
        await writeScript(script, 'exec sleep 5');
        const executor = new ScriptExecutor(timed.settings, { reporter });

        const error = await executionError(executor.execute([script], 'Hanging', 'Done'));

        expect(error.kind).toBe('timeout');
        expect(error.message).toBe(
          'Script execution timed out after 1 seconds. ' +
            'The installation may be taking longer than expected or may have hung.',
        );
      } finally {
        await timed.cleanup();
      }
    });

    it('maps a missing script to a spawn failure', async () => {
      const missing = join(workspace.root, 'nope.sh');
      const executor = new ScriptExecutor(workspace.settings, { reporter });

      const error = await executionError(executor.execute([missing], 'Missing', 'Done'));

      expect(error.kind).toBe('spawn');
      expect(error.message).toBe(`Failed to execute installation script: Command not found: ${missing}`);
    });
  });

  describe('with a fake runner', () => {
    class CapturingRunner implements IProcessRunner {
      public options?: ProcessRunOptions;

      public constructor(private readonly outcome: ProcessResult | Error) {}

      public async run(options: ProcessRunOptions): Promise<ProcessResult> {
        this.options = options;
        if (this.outcome instanceof Error) throw this.outcome;
        return this.outcome;
      }
    }

    const ok: ProcessResult = { exitCode: 0, signal: null, stdout: '', stderr: '', timedOut: false };

    it('passes the timeout in milliseconds and the working directory', async () => {
      const runner = new CapturingRunner(ok);
      const executor = new ScriptExecutor(workspace.settings, { runner });

      await executor.execute(['/x/base.sh', '--cursor'], 'Run', 'Done');

      expect(runner.options).toMatchObject({
        command: '/x/base.sh',
        args: ['--cursor'],
        cwd: workspace.settings.paths.cwd,
        timeoutMs: 600_000,
      });
    });

    it('wraps any other runner failure as unexpected', async () => {
      const executor = new ScriptExecutor(workspace.settings, {
        runner: new CapturingRunner(new TypeError('bad state')),
      });

      const error = await executionError(executor.execute(['/x/base.sh'], 'Run', 'Done'));

      expect(error.kind).toBe('unexpected');
      expect(error.message).toBe('Unexpected error during script execution: bad state');
    });

    it('reports a signal death as an exit failure', async () => {
      const executor = new ScriptExecutor(workspace.settings, {
        runner: new CapturingRunner({ ...ok, exitCode: null, signal: 'SIGTERM' }),
      });

      const error = await executionError(executor.execute(['/x/base.sh'], 'Run', 'Done'));

      expect(error.kind).toBe('exit');
      expect(error.message).toBe('Script terminated by signal SIGTERM');
    });

    it('rejects an empty argument list', async () => {
      const executor = new ScriptExecutor(workspace.settings, { runner: new CapturingRunner(ok) });

      const error = await executionError(executor.execute([], 'Run', 'Done'));

      expect(error.kind).toBe('unexpected');
    });
  });
});
