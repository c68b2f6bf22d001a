/**
 * Validation helpers shared by the installer and the CLI.
 * @public
 */
import type { ZodError } from 'zod';
import { findProjectTypeViolation } from '@agentos/schemas';
import { InvalidTokenError } from './errors/index.js';

/**
 * Rejects a project-type token that is unsafe to pass to a script.
 *
 * Must run before the token is interpolated into any argument list.
 * @param value - Untrusted token
 * @throws {InvalidTokenError} When the token breaks the grammar
 * @example
 * ```typescript
 * validateToken('python-modern'); // ok
 * validateToken('../etc');        // throws InvalidTokenError
 * ```
 */
export function validateToken(value: string): void {
  const violation = findProjectTypeViolation(value);
  if (violation) {
    throw new InvalidTokenError(violation, value);
  }
}

/**
 * Flattens zod issues into one line: `path: message; path: message`.
 */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
