import { AgentOsError, AgentOsErrorCode } from './agentos-error.js';

export type ConfigurationErrorReason =
  | 'not_found'
  | 'invalid_syntax'
  | 'invalid_schema'
  | 'unreadable'
  | 'invalid_shape';

/**
 * Raised when the base `config.yml` cannot be loaded. Never retried; the user
 * recovers by re-running `agentos install`.
 */
export class ConfigurationError extends AgentOsError {
  public readonly reason: ConfigurationErrorReason;
  public readonly path: string;

  public constructor(
    message: string,
    reason: ConfigurationErrorReason,
    path: string,
    cause?: Error,
  ) {
    super(message, AgentOsErrorCode.CONFIGURATION, cause);
    this.name = 'ConfigurationError';
    this.reason = reason;
    this.path = path;
  }

  public static notFound(path: string): ConfigurationError {
    return new ConfigurationError(
      `Base configuration not found at ${path}. Run 'agentos install' to set up base installation.`,
      'not_found',
      path,
    );
  }

  public static invalidSyntax(path: string, c: Error): ConfigurationError {
    return new ConfigurationError(
      `Invalid YAML in configuration file ${path}: ${c.message}`,
      'invalid_syntax',
      path,
      c,
    );
  }

  public static invalidShape(path: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid configuration format in ${path}. Expected YAML dictionary.`,
      'invalid_shape',
      path,
    );
  }

  public static invalidSchema(path: string, details: string, c?: Error): ConfigurationError {
    return new ConfigurationError(
      `Configuration validation failed for ${path}: ${details}`,
      'invalid_schema',
      path,
      c,
    );
  }

  public static unreadable(path: string, c: Error): ConfigurationError {
    return new ConfigurationError(
      `Failed to read configuration file ${path}: ${c.message}`,
      'unreadable',
      path,
      c,
    );
  }
}
