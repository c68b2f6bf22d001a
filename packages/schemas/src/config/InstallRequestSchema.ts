import { z } from 'zod';
import { ProjectTypeTokenSchema } from './ProjectTypeTokenSchema.js';

export const InstallationScopeSchema = z.enum(['base', 'project']);

export const InstallRequestSchema = z.object({
  scope: InstallationScopeSchema,
  enableClaudeCode: z.boolean().default(false),
  enableCursor: z.boolean().default(false),
  projectType: ProjectTypeTokenSchema.default('default'),
  overwriteInstructions: z.boolean().default(false),
  overwriteStandards: z.boolean().default(false),
  overwriteConfig: z.boolean().default(false),
  skipBaseRequirement: z.boolean().default(false),
});
