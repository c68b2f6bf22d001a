import chalk from 'chalk';

/**
 * User-facing output. Kept apart from the diagnostic logger so that status
 * lines are printed even when logging is silent.
 * @public
 */
export interface IReporter {
  /** Heading for a step that is about to run. */
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Raw text, e.g. captured script output. */
  output(text: string): void;
}

/**
 * Reporter that prints coloured lines; errors and warnings go to stderr.
 * @public
 */
export class ConsoleReporter implements IReporter {
  public step(message: string): void {
    console.info(chalk.bold.blue(message));
  }

  public info(message: string): void {
    console.info(message);
  }

  public success(message: string): void {
    console.info(chalk.green(message));
  }

  public warn(message: string): void {
    console.warn(chalk.yellow(`⚠️ ${message}`));
  }

  public error(message: string): void {
    console.error(chalk.bold.red(`❌ ${message}`));
  }

  public output(text: string): void {
    console.info(chalk.dim(text));
  }
}

/**
 * Discards everything.
 * @public
 */
export class NoOpReporter implements IReporter {
  public step(): void {}
  public info(): void {}
  public success(): void {}
  public warn(): void {}
  public error(): void {}
  public output(): void {}
}

export type ReportLevel = keyof IReporter;

export interface ReportEntry {
  level: ReportLevel;
  message: string;
}

/**
 * Keeps every line in memory. Used by tests and by callers that render the
 * transcript themselves.
 * @public
 */
export class RecordingReporter implements IReporter {
  public readonly entries: ReportEntry[] = [];

  public step(message: string): void {
    this.entries.push({ level: 'step', message });
  }

  public info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  public success(message: string): void {
    this.entries.push({ level: 'success', message });
  }

  public warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  public error(message: string): void {
    this.entries.push({ level: 'error', message });
  }

  public output(text: string): void {
    this.entries.push({ level: 'output', message: text });
  }

  public messages(level: ReportLevel): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
