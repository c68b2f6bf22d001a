import {
  ConsoleReporter,
  type IReporter,
  type Settings,
  settingsFromEnv,
} from '@agentos/core';
import {
  AutoConfirmPrompter,
  createInstaller,
  ReadlinePrompter,
  type IInstaller,
  type IPrompter,
} from '@agentos/installer';

/**
 * Everything a command needs from its surroundings. Tests build one with
 * fakes; the binary builds one from the process.
 */
export interface CliContext {
  settings: Settings;
  reporter: IReporter;
  createPrompter(assumeYes: boolean): IPrompter;
  createInstaller(prompter: IPrompter): IInstaller;
  /** Commander's own help and error text. */
  output?: {
    writeOut(text: string): void;
    writeErr(text: string): void;
  };
}

/**
 * @param env - Normally `process.env`
 * @throws {ConfigurationError} When an environment override is invalid
 */
export function createCliContext(env: Record<string, string | undefined>): CliContext {
  const settings = settingsFromEnv(env);
  const reporter = new ConsoleReporter();
  return {
    settings,
    reporter,
    createPrompter: (assumeYes) =>
      assumeYes ? new AutoConfirmPrompter(true) : new ReadlinePrompter(),
    createInstaller: (prompter) => createInstaller(settings, { reporter, prompter }),
  };
}
