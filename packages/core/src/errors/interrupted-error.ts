import { AgentOsError, AgentOsErrorCode } from './agentos-error.js';

/**
 * The user pressed Ctrl+C while a prompt was waiting for input.
 */
export class OperationInterruptedError extends AgentOsError {
  public constructor() {
    super('Interrupted by user', AgentOsErrorCode.INTERRUPTED);
    this.name = 'OperationInterruptedError';
  }
}
