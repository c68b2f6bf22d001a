import { z } from 'zod';

export const ProjectTypeConfigSchema = z.object({
  instructions: z.string(),
  standards: z.string(),
});
