import { AgentOsError, AgentOsErrorCode } from './agentos-error.js';

/**
 * The latest-release lookup failed: transport fault or timeout, non-2xx
 * status, unparsable body, or a missing tag.
 */
export class VersionCheckError extends AgentOsError {
  public readonly statusCode?: number;

  public constructor(message: string, statusCode?: number, cause?: Error) {
    super(message, AgentOsErrorCode.VERSION_CHECK, cause);
    this.name = 'VersionCheckError';
    this.statusCode = statusCode;
  }
}

