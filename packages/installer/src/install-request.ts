import { InstallRequestSchema } from '@agentos/schemas';
import type { InstallRequest, ScriptInstallOptions } from '@agentos/models';
import { InstallationError, InvalidTokenError, formatZodIssues } from '@agentos/core';

function rawProjectType(input: unknown): string {
  if (input !== null && typeof input === 'object' && 'projectType' in input) {
    return String(input.projectType);
  }
  return '';
}

/**
 * Validates raw install options.
 * @param input - Usually an `InstallRequestInput`; anything else is rejected
 * @throws {InvalidTokenError} When `projectType` is unsafe
 * @throws {InstallationError} For any other invalid field
 */
export function parseInstallRequest(input: unknown): InstallRequest {
  const result = InstallRequestSchema.safeParse(input);
  if (result.success) {
    return result.data;
  }

  const tokenIssue = result.error.issues.find((issue) => issue.path[0] === 'projectType');
  if (tokenIssue) {
    throw new InvalidTokenError(tokenIssue.message, rawProjectType(input));
  }
  throw new InstallationError(`Invalid install request: ${formatZodIssues(result.error)}`);
}

/**
 * Flags forwarded to the install script for a request.
 */
export function toScriptOptions(request: InstallRequest): ScriptInstallOptions {
  return {
    claudeCode: request.enableClaudeCode,
    cursor: request.enableCursor,
    projectType: request.projectType,
    overwriteInstructions: request.overwriteInstructions,
    overwriteStandards: request.overwriteStandards,
    overwriteConfig: request.overwriteConfig,
  };
}
