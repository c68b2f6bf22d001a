/**
 * Maps errors raised while starting a child process to readable messages.
 * @internal
 */

/**
 * The child process could not be started at all.
 */
export class ProcessSpawnError extends Error {
  public readonly code?: string;
  public readonly cause?: Error;

  public constructor(message: string, code?: string, cause?: Error) {
    super(message);
    this.name = 'ProcessSpawnError';
    this.code = code;
    this.cause = cause;
  }
}

function errorCode(error: unknown): string | undefined {
  if (error !== null && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Converts a spawn failure into a ProcessSpawnError based on its errno code:
 * - ENOENT: Command not found
 * - EACCES: Permission denied
 * - ENOTDIR: Invalid path
 * - EMFILE/ENFILE: Too many open files
 * - Other errors keep their own message
 * @param error - Error from child_process spawn
 * @param command - Command that was attempted
 */
export function handleSpawnError(error: unknown, command: string): ProcessSpawnError {
  const code = errorCode(error);
  const cause = error instanceof Error ? error : undefined;

  switch (code) {
    case 'ENOENT':
      return new ProcessSpawnError(`Command not found: ${command}`, code, cause);
    case 'EACCES':
      return new ProcessSpawnError(`Permission denied executing: ${command}`, code, cause);
    case 'ENOTDIR':
      return new ProcessSpawnError(`Invalid path: ${command}`, code, cause);
    case 'EMFILE':
    case 'ENFILE':
      return new ProcessSpawnError(`Too many open files while starting: ${command}`, code, cause);
    default:
      return new ProcessSpawnError(cause?.message ?? String(error), code, cause);
  }
}
