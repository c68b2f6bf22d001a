/**
 * Environment handed to install scripts.
 *
 * Nothing is inherited from the parent process: the scripts see a fixed
 * PATH, the user's home and name, and a UTF-8 locale.
 */
import { basename } from 'path';

export const SCRIPT_PATH = '/usr/local/bin:/usr/bin:/bin';
export const SCRIPT_LANG = 'en_US.UTF-8';

/**
 * The only variables a script may see, in this order.
 */
export const SCRIPT_ENV_KEYS = ['PATH', 'HOME', 'USER', 'LANG'] as const;

export type ScriptEnvironment = Readonly<Record<(typeof SCRIPT_ENV_KEYS)[number], string>>;

/**
 * Builds the replacement environment for a script run.
 * @param homeDir - Real home directory; USER is its last path segment
 * @returns Exactly PATH, HOME, USER and LANG
 * @example
 * ```typescript
 * buildScriptEnvironment('/home/dev');
 * // { PATH: '/usr/local/bin:/usr/bin:/bin', HOME: '/home/dev', USER: 'dev', LANG: 'en_US.UTF-8' }
 * ```
 */
export function buildScriptEnvironment(homeDir: string): ScriptEnvironment {
  return Object.freeze({
    PATH: SCRIPT_PATH,
    HOME: homeDir,
    USER: basename(homeDir),
    LANG: SCRIPT_LANG,
  });
}
