import { AgentOsError, AgentOsErrorCode } from './agentos-error.js';

/**
 * An untrusted token (the project type) failed the safe-token grammar.
 * Raised before any subprocess argument list is built.
 */
export class InvalidTokenError extends AgentOsError {
  public readonly token: string;

  public constructor(message: string, token: string) {
    super(message, AgentOsErrorCode.INVALID_TOKEN);
    this.name = 'InvalidTokenError';
    this.token = token;
  }
}
