/**
 * Logging infrastructure exports
 */

export {
  rootLogger,
  createLogger,
  createRedactingLogger,
  resolveLogLevel,
  REDACT_PATHS,
} from './pino-setup.js';

export { logEvent, logError, getEventLogPath } from '../logger.js';
export type { LogLevel } from '../logger.js';
