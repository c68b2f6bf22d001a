import { appendFileSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const LOG_DIR = resolve(__dirname, '../.logs');

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVELS, value);
}

/**
 * Reads the current level from AGENTOS_EVENT_LEVEL, defaulting to 'info'.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.AGENTOS_EVENT_LEVEL || '').toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

function enabled(min: LogLevel): boolean {
  return LEVELS[currentLevel()] >= LEVELS[min];
}

/**
 * Stable per-process identifier so entries from one command run correlate.
 * @internal
 */
function runId(): string {
  if (!process.env.AGENTOS_RUN_ID) {
    process.env.AGENTOS_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.AGENTOS_RUN_ID;
}

/**
 * Path of the JSON Lines event log for the current run.
 * @public
 */
export function getEventLogPath(): string {
  return resolve(LOG_DIR, `run-${runId()}.jsonl`);
}

/**
 * Appends a structured event to the run's JSON Lines log.
 *
 * Written only when AGENTOS_LOG is `1` or `true`, or when the level is
 * `error`. Never throws.
 * @param level - Log severity level
 * @param event - Event identifier, e.g. `cli:install_started`
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  const loggingEnabled =
    process.env.AGENTOS_LOG === '1' || process.env.AGENTOS_LOG === 'true' || level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    appendFileSync(getEventLogPath(), JSON.stringify(entry) + '\n', {
      encoding: 'utf8',
    });
  } catch {
    // ignore: read-only install dir
  }
}

/**
 * Logs an error event with the message, stack, code and process context.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(context: string, rawError: unknown, extra?: unknown): void {
  const err = rawError instanceof Error ? rawError : undefined;
  const code =
    rawError !== null && typeof rawError === 'object' && 'code' in rawError
      ? rawError.code
      : undefined;
  logEvent('error', `error:${context}`, {
    message: err?.message ?? String(rawError),
    stack: err?.stack,
    code,
    extra,
    argv: process.argv,
    cwd: process.cwd(),
  });
}
