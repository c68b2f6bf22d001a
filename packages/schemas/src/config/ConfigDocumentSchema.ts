import { z } from 'zod';
import { AgentKindSchema, AgentSettingSchema } from './AgentSettingSchema.js';
import { ProjectTypeConfigSchema } from './ProjectTypeConfigSchema.js';

/**
 * Shape of `~/.agent-os/config.yml`.
 *
 * `default_project_type` must name an entry of `project_types`; the check runs
 * after the field-level parse so the issue is reported against that key.
 */
export const ConfigDocumentSchema = z
  .object({
    agent_os_version: z.string(),
    agents: z.record(AgentKindSchema, AgentSettingSchema),
    project_types: z.record(z.string(), ProjectTypeConfigSchema),
    default_project_type: z.string().default('default'),
  })
  .superRefine((doc, ctx) => {
    if (!Object.hasOwn(doc.project_types, doc.default_project_type)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['default_project_type'],
        message: `Default project type '${doc.default_project_type}' not found in project_types`,
      });
    }
  });
