/**
 * Builds argument lists for `base.sh` and `project.sh` and runs them.
 *
 * The two scripts disagree on how they take the project type: `base.sh`
 * expects `--project-type VALUE`, `project.sh` expects `--project-type=VALUE`.
 * @public
 */
import type { ScriptInstallOptions } from '@agentos/models';
import { InstallationError, validateToken } from '@agentos/core';
import type { IInstallScripts } from '../types/index.js';
import type { ScriptExecutor } from './script-executor.js';
import type { ScriptLocator } from './script-locator.js';

export const BASE_SCRIPT = 'base.sh';
export const PROJECT_SCRIPT = 'project.sh';

function flagArgs(options: ScriptInstallOptions): string[] {
  const args: string[] = [];
  if (options.claudeCode) args.push('--claude-code');
  if (options.cursor) args.push('--cursor');
  if (options.overwriteInstructions) args.push('--overwrite-instructions');
  if (options.overwriteStandards) args.push('--overwrite-standards');
  if (options.overwriteConfig) args.push('--overwrite-config');
  return args;
}

/**
 * @example
 * ```typescript
 * buildBaseInstallArgs('/x/base.sh', { ...opts, claudeCode: true, projectType: 'python' });
 * // ['/x/base.sh', '--claude-code', '--project-type', 'python']
 * ```
 * @throws {InvalidTokenError} When the project type is unsafe
 */
export function buildBaseInstallArgs(scriptPath: string, options: ScriptInstallOptions): string[] {
  validateToken(options.projectType);
  const args = [scriptPath, ...flagArgs(options)];
  if (options.projectType !== 'default') {
    args.push('--project-type', options.projectType);
  }
  return args;
}

/**
 * @throws {InvalidTokenError} When the project type is unsafe
 */
export function buildProjectInstallArgs(
  scriptPath: string,
  options: ScriptInstallOptions,
): string[] {
  validateToken(options.projectType);
  const args = [scriptPath, ...flagArgs(options)];
  if (options.projectType !== 'default') {
    args.push(`--project-type=${options.projectType}`);
  }
  return args;
}

export class ScriptRunner implements IInstallScripts {
  public constructor(
    private readonly locator: ScriptLocator,
    private readonly executor: ScriptExecutor,
  ) {}

  /**
   * @throws {InvalidTokenError} Before any lookup when the project type is unsafe
   * @throws {InstallationError} When `base.sh` cannot be found
   * @throws {ScriptExecutionError} When the script fails
   */
  public async runBaseInstall(options: ScriptInstallOptions): Promise<void> {
    validateToken(options.projectType);
    const scriptPath = this.locator.locate(BASE_SCRIPT);
    if (!scriptPath) {
      throw InstallationError.scriptNotFound(
        `Base installation script '${BASE_SCRIPT}'`,
        'Please ensure AgentOS is properly installed or available.',
      );
    }
    await this.executor.execute(
      buildBaseInstallArgs(scriptPath, options),
      'Installing AgentOS base components',
      '✅ Base installation completed successfully',
    );
  }

  /**
   * @throws {InvalidTokenError} Before any lookup when the project type is unsafe
   * @throws {InstallationError} When `project.sh` cannot be found
   * @throws {ScriptExecutionError} When the script fails
   */
  public async runProjectInstall(options: ScriptInstallOptions): Promise<void> {
    validateToken(options.projectType);
    const scriptPath = this.locator.locate(PROJECT_SCRIPT);
    if (!scriptPath) {
      throw InstallationError.scriptNotFound(
        `Project installation script '${PROJECT_SCRIPT}'`,
        'Please ensure AgentOS base installation is complete.',
      );
    }
    await this.executor.execute(
      buildProjectInstallArgs(scriptPath, options),
      'Installing AgentOS project components',
      '✅ Project installation completed successfully',
    );
  }
}
