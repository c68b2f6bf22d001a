import { z } from 'zod';

export const AgentKindSchema = z.enum(['claude_code', 'cursor']);

export const AgentSettingSchema = z.object({
  enabled: z.boolean(),
  // Free-form per-agent settings passed through to the install scripts
  additional_config: z.record(z.string(), z.string()).nullable().optional(),
});
