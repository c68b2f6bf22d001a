/**
 * Error codes shared by every failure the CLI can report.
 */
export enum AgentOsErrorCode {
  CONFIGURATION = 'configuration',
  INSTALLATION = 'installation',
  SCRIPT_EXECUTION = 'script_execution',
  INVALID_TOKEN = 'invalid_token',
  VERSION_CHECK = 'version_check',
  INTERRUPTED = 'interrupted',
}

/**
 * Root of the error taxonomy. Commands catch this type and print its message
 * as a single line.
 */
export class AgentOsError extends Error {
  public readonly code: AgentOsErrorCode;
  public readonly cause?: Error;

  public constructor(message: string, code: AgentOsErrorCode, cause?: Error) {
    super(message);
    this.name = 'AgentOsError';
    this.code = code;
    this.cause = cause;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Convert the error to a JSON representation (used by the event log)
   * @returns JSON object containing error details
   */
  public toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      stack: this.stack,
      cause: this.cause?.message,
    };
  }
}

/**
 * Converts an unknown thrown value into an Error suitable for `cause`.
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
