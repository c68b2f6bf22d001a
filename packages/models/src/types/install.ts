import type { InstallationScope } from '../enums/scope.js';

/**
 * Input to an install run. Produced by parsing CLI flags through
 * `InstallRequestSchema`, which validates `projectType`.
 */
export interface InstallRequest {
  scope: InstallationScope;
  enableClaudeCode: boolean;
  enableCursor: boolean;
  projectType: string;
  overwriteInstructions: boolean;
  overwriteStandards: boolean;
  overwriteConfig: boolean;
  skipBaseRequirement: boolean;
}

/**
 * Flags forwarded to either install script.
 */
export interface ScriptInstallOptions {
  claudeCode: boolean;
  cursor: boolean;
  projectType: string;
  overwriteInstructions: boolean;
  overwriteStandards: boolean;
  overwriteConfig: boolean;
}
