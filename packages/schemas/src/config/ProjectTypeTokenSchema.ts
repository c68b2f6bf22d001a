import { z } from 'zod';

const SAFE_TOKEN_REGEX = /^[a-zA-Z0-9_-]+$/;

// Rejected even though the character class above already excludes them.
const DANGEROUS_PATTERNS: readonly string[] = [
  '$',
  '|',
  ';',
  '&',
  '`',
  '(',
  ')',
  '{',
  '}',
  '[',
  ']',
  '<',
  '>',
  '!',
  '\n',
  '\t',
  '\\n',
  '\\t',
];

/**
 * Checks a project-type token against the grammar accepted by the install
 * scripts.
 * @param value - Untrusted token, typically from `--project-type`
 * @returns A message describing the first violated rule, or undefined when the token is safe
 * @public
 */
export function findProjectTypeViolation(value: string): string | undefined {
  if (!value) {
    return 'Project type cannot be empty';
  }

  if (value.includes('..') || value.includes('/') || value.includes('\\')) {
    return `Invalid project type: ${value}`;
  }

  if (!SAFE_TOKEN_REGEX.test(value)) {
    return `Project type must contain only alphanumeric characters, dashes, and underscores: ${value}`;
  }

  if (/^[-_]|[-_]$/.test(value)) {
    return `Project type cannot start or end with dash or underscore: ${value}`;
  }

  if (DANGEROUS_PATTERNS.some((pattern) => value.includes(pattern))) {
    return `Invalid character in project type: ${value}`;
  }

  return undefined;
}

export const ProjectTypeTokenSchema = z.string().superRefine((value, ctx) => {
  const violation = findProjectTypeViolation(value);
  if (violation) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: violation });
  }
});
