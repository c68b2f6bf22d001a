export { AgentOsError, AgentOsErrorCode, toError } from './agentos-error.js';
export { ConfigurationError } from './configuration-error.js';
export type { ConfigurationErrorReason } from './configuration-error.js';
export { InstallationError, ScriptExecutionError } from './installation-error.js';
export type { ScriptFailureKind, ScriptFailureDetails } from './installation-error.js';
export { InvalidTokenError } from './invalid-token-error.js';
export { VersionCheckError } from './version-check-error.js';
export { OperationInterruptedError } from './interrupted-error.js';
