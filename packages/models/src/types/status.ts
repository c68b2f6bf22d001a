import type { AgentKind } from '../enums/agent.js';

/**
 * Snapshot of what is installed on this machine and in the current project.
 * Derived on demand from the filesystem; never persisted.
 */
export interface InstallationStatus {
  baseInstalled: boolean;
  baseRoot?: string;
  baseVersion?: string;
  projectInstalled: boolean;
  projectRoot?: string;
  /** Agents with a marker present in the project root, in canonical order. */
  projectAgents: AgentKind[];
  projectType?: string;
}
