/**
 * Installation targets. BASE lives under the user's home directory,
 * PROJECT under the current working directory.
 */
export const InstallationScope = {
  BASE: 'base',
  PROJECT: 'project',
} as const;

export type InstallationScope = (typeof InstallationScope)[keyof typeof InstallationScope];

/**
 * Which scopes an update or uninstall touches.
 */
export const ScopeSelector = {
  PROJECT_ONLY: 'project-only',
  BOTH: 'both',
} as const;

export type ScopeSelector = (typeof ScopeSelector)[keyof typeof ScopeSelector];
