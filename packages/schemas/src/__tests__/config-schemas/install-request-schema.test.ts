import { describe, it, expect } from 'vitest';
import { InstallRequestSchema, ProjectTypeTokenSchema, findProjectTypeViolation } from '../../index.js';

describe('InstallRequestSchema', () => {
  it('should fill every flag with its default', () => {
    expect(InstallRequestSchema.parse({ scope: 'project' })).toEqual({
      scope: 'project',
      enableClaudeCode: false,
      enableCursor: false,
      projectType: 'default',
      overwriteInstructions: false,
      overwriteStandards: false,
      overwriteConfig: false,
      skipBaseRequirement: false,
    });
  });

  it('should reject an unknown scope', () => {
    expect(InstallRequestSchema.safeParse({ scope: 'global' }).success).toBe(false);
  });

  it('should report an unsafe project type against projectType', () => {
    const result = InstallRequestSchema.safeParse({ scope: 'base', projectType: 'a;b' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['projectType']);
      expect(result.error.issues[0]?.message).toBe(
        'Project type must contain only alphanumeric characters, dashes, and underscores: a;b',
      );
    }
  });
});

describe('ProjectTypeTokenSchema', () => {
  it('should accept safe tokens', () => {
    expect(ProjectTypeTokenSchema.parse('python-web')).toBe('python-web');
  });

  it('should reject an empty token', () => {
    expect(ProjectTypeTokenSchema.safeParse('').success).toBe(false);
  });
});

describe('findProjectTypeViolation', () => {
  it('should check path traversal before the character class', () => {
    expect(findProjectTypeViolation('..')).toBe('Invalid project type: ..');
  });

  it('should check edges after the character class', () => {
    expect(findProjectTypeViolation('_x')).toBe(
      'Project type cannot start or end with dash or underscore: _x',
    );
  });

  it('should return undefined for a safe token', () => {
    expect(findProjectTypeViolation('go')).toBeUndefined();
  });
});
