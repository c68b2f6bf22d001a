export { ScriptLocator } from './script-locator.js';
export type { ScriptLocatorOptions } from './script-locator.js';
export { ScriptExecutor } from './script-executor.js';
export type { ScriptExecutorOptions } from './script-executor.js';
export { NodeProcessRunner } from './process-runner.js';
export type { IProcessRunner, ProcessResult, ProcessRunOptions } from './process-runner.js';
export { ProcessSpawnError, handleSpawnError } from './spawn-error-handler.js';
export {
  ScriptRunner,
  buildBaseInstallArgs,
  buildProjectInstallArgs,
  BASE_SCRIPT,
  PROJECT_SCRIPT,
} from './script-runner.js';
