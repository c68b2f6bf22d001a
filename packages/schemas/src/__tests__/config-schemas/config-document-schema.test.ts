import { describe, it, expect } from 'vitest';
import { ConfigDocumentSchema } from '../../index.js';

const validDocument = {
  agent_os_version: '1.4.3',
  agents: {
    claude_code: { enabled: true },
    cursor: { enabled: false, additional_config: { rules_dir: '.cursor/rules' } },
  },
  project_types: {
    default: { instructions: '~/.agent-os/instructions', standards: '~/.agent-os/standards' },
    python: { instructions: 'py/instructions', standards: 'py/standards' },
  },
  default_project_type: 'python',
};

describe('ConfigDocumentSchema', () => {
  describe('valid documents', () => {
    it('should accept a complete document', () => {
      const result = ConfigDocumentSchema.parse(validDocument);

      expect(result.agent_os_version).toBe('1.4.3');
      expect(result.agents.cursor?.additional_config).toEqual({ rules_dir: '.cursor/rules' });
      expect(result.default_project_type).toBe('python');
    });

    it('should default default_project_type to "default"', () => {
      const { default_project_type: _omitted, ...rest } = validDocument;

      expect(ConfigDocumentSchema.parse(rest).default_project_type).toBe('default');
    });

    it('should accept a null additional_config', () => {
      const result = ConfigDocumentSchema.parse({
        ...validDocument,
        agents: { claude_code: { enabled: true, additional_config: null } },
      });

      expect(result.agents.claude_code?.additional_config).toBeNull();
    });
  });

  describe('cross-field check', () => {
    it('should reject a default_project_type missing from project_types', () => {
      const result = ConfigDocumentSchema.safeParse({
        ...validDocument,
        default_project_type: 'rust',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues).toHaveLength(1);
        expect(result.error.issues[0]?.path).toEqual(['default_project_type']);
        expect(result.error.issues[0]?.message).toBe(
          "Default project type 'rust' not found in project_types",
        );
      }
    });

    it('should reject an omitted default when project_types lacks "default"', () => {
      const result = ConfigDocumentSchema.safeParse({
        agent_os_version: '1.0.0',
        agents: {},
        project_types: { python: { instructions: 'a', standards: 'b' } },
      });

      expect(result.success).toBe(false);
    });
  });

  describe('field validation', () => {
    it('should reject unknown agent kinds', () => {
      const result = ConfigDocumentSchema.safeParse({
        ...validDocument,
        agents: { vim: { enabled: true } },
      });

      expect(result.success).toBe(false);
    });

    it('should reject a project type entry without standards', () => {
      const result = ConfigDocumentSchema.safeParse({
        ...validDocument,
        project_types: { default: { instructions: 'x' } },
        default_project_type: 'default',
      });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]?.path).toEqual(['project_types', 'default', 'standards']);
      }
    });

    it('should reject a non-string version', () => {
      expect(ConfigDocumentSchema.safeParse({ ...validDocument, agent_os_version: 1.4 }).success).toBe(
        false,
      );
    });
  });
});
