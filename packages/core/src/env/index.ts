export {
  buildScriptEnvironment,
  SCRIPT_ENV_KEYS,
  SCRIPT_LANG,
  SCRIPT_PATH,
} from './script-environment.js';
export type { ScriptEnvironment } from './script-environment.js';
