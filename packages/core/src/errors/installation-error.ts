import { AgentOsError, AgentOsErrorCode } from './agentos-error.js';

/**
 * Umbrella for install, update and uninstall failures: missing scripts,
 * unmet scope preconditions, and wrapped lower-level faults.
 */
export class InstallationError extends AgentOsError {
  public constructor(message: string, cause?: Error, code = AgentOsErrorCode.INSTALLATION) {
    super(message, code, cause);
    this.name = 'InstallationError';
  }

  public static scriptNotFound(scriptName: string, hint: string): InstallationError {
    return new InstallationError(`${scriptName} not found. ${hint}`);
  }

  /**
   * Prefixes the failure with the step that was running, keeping the
   * original error as `cause`.
   */
  public static wrap(step: string, c: Error): InstallationError {
    return new InstallationError(`${step} failed: ${c.message}`, c);
  }
}

export type ScriptFailureKind = 'exit' | 'timeout' | 'spawn' | 'unexpected';

export interface ScriptFailureDetails {
  exitCode?: number | null;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
}

/**
 * A script ran (or tried to) and did not succeed. `kind` tells the four
 * failure modes apart; the message always carries captured output.
 */
export class ScriptExecutionError extends InstallationError {
  public readonly kind: ScriptFailureKind;
  public readonly exitCode?: number | null;
  public readonly stdout?: string;
  public readonly stderr?: string;

  public constructor(
    message: string,
    kind: ScriptFailureKind,
    details: ScriptFailureDetails = {},
    cause?: Error,
  ) {
    super(message, cause, AgentOsErrorCode.SCRIPT_EXECUTION);
    this.name = 'ScriptExecutionError';
    this.kind = kind;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }

  public static nonZeroExit(details: ScriptFailureDetails): ScriptExecutionError {
    const stderr = details.stderr?.trim() ?? '';
    const stdout = details.stdout?.trim() ?? '';
    let message =
      details.exitCode === null && details.signal
        ? `Script terminated by signal ${details.signal}`
        : `Script failed with exit code ${details.exitCode}`;
    if (stderr) {
      message += `\nError output: ${stderr}`;
    }
    if (stdout) {
      message += `\nStandard output: ${stdout}`;
    }
    return new ScriptExecutionError(message, 'exit', details);
  }

  public static timeout(seconds: number, details: ScriptFailureDetails = {}): ScriptExecutionError {
    return new ScriptExecutionError(
      `Script execution timed out after ${seconds} seconds. ` +
        'The installation may be taking longer than expected or may have hung.',
      'timeout',
      details,
    );
  }

  public static spawnFailed(c: Error): ScriptExecutionError {
    return new ScriptExecutionError(
      `Failed to execute installation script: ${c.message}`,
      'spawn',
      {},
      c,
    );
  }

  public static unexpected(c: Error): ScriptExecutionError {
    return new ScriptExecutionError(
      `Unexpected error during script execution: ${c.message}`,
      'unexpected',
      {},
      c,
    );
  }
}
