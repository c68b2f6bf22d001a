import { createSettings, RecordingReporter } from '@agentos/core';
import type { InstallationStatus, ScopeSelector } from '@agentos/models';
import type { InstallRequestInput } from '@agentos/schemas';
import { AutoConfirmPrompter, type IInstaller } from '@agentos/installer';
import type { CliContext } from '../context.js';

export class FakeInstaller implements IInstaller {
  public readonly installs: InstallRequestInput[] = [];
  public readonly updates: ScopeSelector[] = [];
  public readonly uninstalls: ScopeSelector[] = [];
  public failure?: Error;
  public statusFailure?: Error;
  public status: InstallationStatus = {
    baseInstalled: false,
    projectInstalled: false,
    projectAgents: [],
  };

  public async install(request: InstallRequestInput): Promise<void> {
    this.installs.push(request);
    this.fail();
  }

  public async update(selector: ScopeSelector): Promise<void> {
    this.updates.push(selector);
    this.fail();
  }

  public async uninstall(selector: ScopeSelector): Promise<void> {
    this.uninstalls.push(selector);
    this.fail();
  }

  public getInstallStatus(): InstallationStatus {
    if (this.statusFailure) {
      throw this.statusFailure;
    }
    return this.status;
  }

  private fail(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

export interface TestCli {
  context: CliContext;
  installer: FakeInstaller;
  reporter: RecordingReporter;
  /** Every prompter handed out, with the `--yes` flag it was built for. */
  prompters: Array<{ assumeYes: boolean; prompter: AutoConfirmPrompter }>;
  stdout: string[];
  stderr: string[];
}

/**
 * @param answer - What the prompter answers when `--yes` is not given
 */
export function createTestCli(answer = false): TestCli {
  const installer = new FakeInstaller();
  const reporter = new RecordingReporter();
  const prompters: TestCli['prompters'] = [];
  const stdout: string[] = [];
  const stderr: string[] = [];

  const context: CliContext = {
    settings: createSettings({ homeDir: '/home/dev', cwd: '/work' }),
    reporter,
    createPrompter: (assumeYes) => {
      const prompter = new AutoConfirmPrompter(assumeYes || answer);
      prompters.push({ assumeYes, prompter });
      return prompter;
    },
    createInstaller: () => installer,
    output: {
      writeOut: (text) => stdout.push(text),
      writeErr: (text) => stderr.push(text),
    },
  };

  return { context, installer, reporter, prompters, stdout, stderr };
}
