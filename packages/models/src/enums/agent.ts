/**
 * Agent integrations that a project installation can carry markers for.
 *
 * Values match the keys used under `agents:` in the base `config.yml`.
 */
export const AgentKind = {
  CLAUDE_CODE: 'claude_code',
  CURSOR: 'cursor',
} as const;

export type AgentKind = (typeof AgentKind)[keyof typeof AgentKind];

/**
 * Canonical agent order used whenever agents are listed.
 */
export const ALL_AGENTS: readonly AgentKind[] = [AgentKind.CLAUDE_CODE, AgentKind.CURSOR];
