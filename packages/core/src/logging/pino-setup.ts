/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Diagnostic output only; user-facing lines go through a reporter.
 */

import pino from 'pino';

/**
 * Paths censored in every logged object. Environment maps passed to or
 * inherited by scripts are the main source of these keys.
 */
export const REDACT_PATHS: readonly string[] = [
  'password',
  '*.password',
  'token',
  '*.token',
  'api_key',
  '*.api_key',
  'authorization',
  '*.authorization',
  'GITHUB_TOKEN',
  '*.GITHUB_TOKEN',
  'ANTHROPIC_API_KEY',
  '*.ANTHROPIC_API_KEY',
  'AWS_SECRET_ACCESS_KEY',
  '*.AWS_SECRET_ACCESS_KEY',
  'SSH_AUTH_SOCK',
  '*.SSH_AUTH_SOCK',
  '*.secret',
  '*.SECRET',
];

/**
 * Builds a logger with the shared redaction and error serializer.
 * @param level - Pino level name, `silent` disables output
 * @param destination - Where lines are written
 * @public
 */
export function createRedactingLogger(
  level: string,
  destination: pino.DestinationStream,
): pino.Logger {
  return pino(
    {
      level,
      redact: {
        paths: [...REDACT_PATHS],
        censor: '[REDACTED]',
        remove: false,
      },
      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    destination,
  );
}

/**
 * Maps a requested level to one pino accepts; unknown names mean `silent`.
 * @param requested - Usually `AGENTOS_LOG_LEVEL`
 * @public
 */
export function resolveLogLevel(requested: string | undefined): string {
  const level = requested?.trim().toLowerCase();
  if (!level) {
    return 'silent';
  }
  return level === 'silent' || Object.hasOwn(pino.levels.values, level) ? level : 'silent';
}

/**
 * Root diagnostic logger, written to stderr.
 *
 * Silent unless `AGENTOS_LOG_LEVEL` names a pino level.
 *
 * @example
 * ```typescript
 * rootLogger.level = 'debug';
 * rootLogger.debug({ env: { GITHUB_TOKEN: 'test-token' } }); // GITHUB_TOKEN: '[REDACTED]'
 * ```
 * @public
 */
const rootLogger = createRedactingLogger(
  resolveLogLevel(process.env.AGENTOS_LOG_LEVEL),
  pino.destination(2),
);

/**
 * Child logger tagged with the component name.
 * @param component - Short identifier such as `script-locator`
 * @public
 */
export function createLogger(component: string): pino.Logger {
  return rootLogger.child({ component });
}

export { rootLogger };
