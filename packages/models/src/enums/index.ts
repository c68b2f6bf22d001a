export { AgentKind, ALL_AGENTS } from './agent.js';
export { InstallationScope, ScopeSelector } from './scope.js';
